import { z } from 'zod'

export const UsageRecordSchema = z.object({
  version: z.literal(1),
  count: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  lastResetAt: z.string().datetime().nullable(),
  updatedAt: z.string().datetime()
})

export type UsageRecord = z.infer<typeof UsageRecordSchema>
