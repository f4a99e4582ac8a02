import { CredentialSchema, type Credential } from '@shared/schemas/credential.schema'

/**
 * Parses decrypted vault plaintext into a credential.
 *
 * @returns The credential, or `null` when the plaintext is not JSON or the
 *   token/workspace fail format validation. Never echoes the input.
 */
export function parseCredential(plaintext: string): Credential | null {
  let raw: unknown
  try {
    raw = JSON.parse(plaintext)
  } catch {
    return null
  }
  const result = CredentialSchema.safeParse(raw)
  return result.success ? result.data : null
}

export function isValidCredential(value: unknown): value is Credential {
  return CredentialSchema.safeParse(value).success
}

/**
 * Names the fields that failed validation, without their values.
 */
export function describeCredentialProblem(value: unknown): string {
  const result = CredentialSchema.safeParse(value)
  if (result.success) {
    return 'none'
  }
  const fields = new Set(result.error.issues.map((i) => i.path.join('.') || 'credential'))
  return `invalid ${[...fields].join(', ')}`
}
