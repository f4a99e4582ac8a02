import { z } from 'zod'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

/** Environment variables read by the core. Every entry has a default. */
export const CoreEnvSchema = z.object({
  ASSET_CORE_HOME: z.string().min(1).optional(),
  ASSET_CORE_API_URL: z.string().url().default('https://api.app.layer.ai/graphql'),
  ASSET_CORE_QUOTA_LIMIT: positiveInt(600),
  ASSET_CORE_POLL_INTERVAL_MS: positiveInt(5_000),
  ASSET_CORE_MAX_WAIT_MS: positiveInt(300_000),
  ASSET_CORE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  ASSET_CORE_REQUEST_TIMEOUT_MS: positiveInt(60_000),
  ASSET_CORE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LAYER_API_TOKEN: z.string().trim().optional(),
  LAYER_WORKSPACE_ID: z.string().trim().optional()
})
