import { CoreEnvSchema } from '@shared/schemas/config.schema'
import type { LogThreshold } from '../diagnostics/log-ring'
import { AssetJobError } from '../errors/asset-job-error'
import { resolveDefaultDataDir } from '../platform/app-paths'

/** Resolved, immutable configuration of the core. */
export interface CoreConfig {
  dataDir: string
  apiUrl: string
  quotaLimit: number
  pollIntervalMs: number
  maxWaitMs: number
  maxAttempts: number
  requestTimeoutMs: number
  logLevel: LogThreshold
  envCredential: { token: string; workspaceId: string } | null
}

/**
 * Reads the core configuration from environment variables.
 *
 * Empty variables count as unset. Every value has a documented default, so
 * an empty environment yields a working configuration.
 *
 * @throws {AssetJobError} `Configuration`, listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<CoreConfig> {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value
    }
  }

  const result = CoreEnvSchema.safeParse(present)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw AssetJobError.configuration(`Invalid configuration: ${issues.join(', ')}`)
  }

  const parsed = result.data
  const token = parsed.LAYER_API_TOKEN
  const workspaceId = parsed.LAYER_WORKSPACE_ID

  return Object.freeze({
    dataDir: parsed.ASSET_CORE_HOME ?? resolveDefaultDataDir(env),
    apiUrl: parsed.ASSET_CORE_API_URL,
    quotaLimit: parsed.ASSET_CORE_QUOTA_LIMIT,
    pollIntervalMs: parsed.ASSET_CORE_POLL_INTERVAL_MS,
    maxWaitMs: parsed.ASSET_CORE_MAX_WAIT_MS,
    maxAttempts: parsed.ASSET_CORE_MAX_ATTEMPTS,
    requestTimeoutMs: parsed.ASSET_CORE_REQUEST_TIMEOUT_MS,
    logLevel: parsed.ASSET_CORE_LOG_LEVEL,
    envCredential: token && workspaceId ? { token, workspaceId } : null
  })
}
