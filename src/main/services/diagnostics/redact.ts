const MIN_REVEAL_LENGTH = 8
const REVEALED_PREFIX = 4

/**
 * Renders a secret for logs and error messages: the first four characters,
 * an ellipsis and the length. Short values are fully hidden.
 *
 * @example
 * ```ts
 * redactSecret('pat_0123456789abcdef') // 'pat_…(20 chars)'
 * redactSecret('abc')                  // '[redacted]'
 * ```
 */
export function redactSecret(value: string): string {
  if (value.length < MIN_REVEAL_LENGTH) {
    return '[redacted]'
  }
  return `${value.slice(0, REVEALED_PREFIX)}…(${value.length} chars)`
}
