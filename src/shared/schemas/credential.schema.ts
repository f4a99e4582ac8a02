import { z } from 'zod'

export const API_TOKEN_PATTERN = /^pat_[A-Za-z0-9_-]+$/
export const WORKSPACE_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

export const CredentialSchema = z
  .object({
    token: z.string().min(50).max(200).regex(API_TOKEN_PATTERN),
    workspaceId: z.string().regex(WORKSPACE_ID_PATTERN)
  })
  .strict()

export type Credential = z.infer<typeof CredentialSchema>
