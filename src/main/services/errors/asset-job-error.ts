/**
 * Typed error taxonomy shared by every component of the core.
 *
 * Errors carry a stable code, the category the code belongs to, and enough
 * structure (status, retry hint, remediation, cause) for the outer layer to
 * render a message without parsing strings. Messages never contain a
 * plaintext credential.
 */

export enum AssetJobErrorCode {
  WrongPassphrase = 'WRONG_PASSPHRASE',
  InvalidPassphrase = 'INVALID_PASSPHRASE',
  VaultCorrupt = 'VAULT_CORRUPT',
  InsecurePermissions = 'INSECURE_PERMISSIONS',
  VaultLocked = 'VAULT_LOCKED',
  VaultMissing = 'VAULT_MISSING',
  InvalidCredential = 'INVALID_CREDENTIAL',
  CredentialUnavailable = 'CREDENTIAL_UNAVAILABLE',
  QuotaExceeded = 'QUOTA_EXCEEDED',
  LedgerCorrupt = 'LEDGER_CORRUPT',
  AuthRejected = 'AUTH_REJECTED',
  Malformed = 'MALFORMED',
  Unavailable = 'UNAVAILABLE',
  RateLimited = 'RATE_LIMITED',
  RetriesExhausted = 'RETRIES_EXHAUSTED',
  CircuitOpen = 'CIRCUIT_OPEN',
  TimedOut = 'TIMED_OUT',
  Cancelled = 'CANCELLED',
  GenerationFailed = 'GENERATION_FAILED',
  Configuration = 'CONFIGURATION'
}

export type AssetJobErrorCategory = 'secrecy' | 'admission' | 'transport' | 'orchestration'

const CATEGORY_BY_CODE: Record<AssetJobErrorCode, AssetJobErrorCategory> = {
  [AssetJobErrorCode.WrongPassphrase]: 'secrecy',
  [AssetJobErrorCode.InvalidPassphrase]: 'secrecy',
  [AssetJobErrorCode.VaultCorrupt]: 'secrecy',
  [AssetJobErrorCode.InsecurePermissions]: 'secrecy',
  [AssetJobErrorCode.VaultLocked]: 'secrecy',
  [AssetJobErrorCode.VaultMissing]: 'secrecy',
  [AssetJobErrorCode.InvalidCredential]: 'secrecy',
  [AssetJobErrorCode.CredentialUnavailable]: 'secrecy',
  [AssetJobErrorCode.QuotaExceeded]: 'admission',
  [AssetJobErrorCode.LedgerCorrupt]: 'admission',
  [AssetJobErrorCode.AuthRejected]: 'transport',
  [AssetJobErrorCode.Malformed]: 'transport',
  [AssetJobErrorCode.Unavailable]: 'transport',
  [AssetJobErrorCode.RateLimited]: 'transport',
  [AssetJobErrorCode.RetriesExhausted]: 'orchestration',
  [AssetJobErrorCode.CircuitOpen]: 'orchestration',
  [AssetJobErrorCode.TimedOut]: 'orchestration',
  [AssetJobErrorCode.Cancelled]: 'orchestration',
  [AssetJobErrorCode.GenerationFailed]: 'orchestration',
  [AssetJobErrorCode.Configuration]: 'orchestration'
}

/** Structured details attached to an {@link AssetJobError}. */
export interface AssetJobErrorDetails {
  /** HTTP status code of the response that produced the error. */
  statusCode?: number
  /** Server-suggested delay before retrying, in milliseconds. */
  retryAfterMs?: number
  /**
   * Whether the request may have reached the remote service. `false` only
   * when the connection failed before anything was sent.
   */
  delivered?: boolean
  /** What the user can do about it. */
  remediation?: string
  /** Originating error. */
  cause?: Error
}

export class AssetJobError extends Error {
  readonly code: AssetJobErrorCode
  readonly category: AssetJobErrorCategory
  readonly details: AssetJobErrorDetails

  constructor(code: AssetJobErrorCode, message: string, details: AssetJobErrorDetails = {}) {
    super(message)
    this.name = 'AssetJobError'
    this.code = code
    this.category = CATEGORY_BY_CODE[code]
    this.details = details

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AssetJobError)
    }
  }

  /**
   * Only transient transport failures are worth retrying.
   */
  isRetryable(): boolean {
    return this.code === AssetJobErrorCode.Unavailable || this.code === AssetJobErrorCode.RateLimited
  }

  static wrongPassphrase(): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.WrongPassphrase, 'Passphrase does not unlock the credential vault', {
      remediation: 'Check the passphrase, or run setup again to store a new credential'
    })
  }

  static invalidPassphrase(): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.InvalidPassphrase, 'Passphrase must not be empty', {
      remediation: 'Choose a non-empty passphrase for the credential vault'
    })
  }

  static vaultCorrupt(reason: string, cause?: Error): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.VaultCorrupt, `Credential vault is corrupt: ${reason}`, {
      cause,
      remediation: 'Delete the vault file and store the credential again'
    })
  }

  static insecurePermissions(path: string, mode: number): AssetJobError {
    return new AssetJobError(
      AssetJobErrorCode.InsecurePermissions,
      `"${path}" is accessible by other users (mode ${(mode & 0o777).toString(8)})`,
      { remediation: `Restrict it to the owner, e.g. chmod go-rwx "${path}"` }
    )
  }

  static vaultLocked(): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.VaultLocked, 'Credential vault must be unlocked before rotation', {
      remediation: 'Unlock the vault with the current passphrase first'
    })
  }

  static vaultMissing(path: string): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.VaultMissing, `No credential stored at "${path}"`, {
      remediation: 'Store a credential first'
    })
  }

  static invalidCredential(hint: string): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.InvalidCredential, `Credential has an invalid format: ${hint}`, {
      remediation: 'API tokens start with "pat_"; the workspace ID is a UUID'
    })
  }

  static credentialUnavailable(): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.CredentialUnavailable, 'No usable API credential found', {
      remediation:
        'Store a credential in the vault and provide its passphrase, or set LAYER_API_TOKEN and LAYER_WORKSPACE_ID'
    })
  }

  static quotaExceeded(count: number, limit: number): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.QuotaExceeded, `Usage quota exhausted (${count}/${limit})`, {
      remediation: 'Raise ASSET_CORE_QUOTA_LIMIT or reset the usage ledger'
    })
  }

  static ledgerCorrupt(path: string, reason: string): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.LedgerCorrupt, `Usage ledger "${path}" is invalid: ${reason}`, {
      remediation: 'Fix or remove the usage file; removing it resets the count to zero'
    })
  }

  static authRejected(statusCode?: number): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.AuthRejected, 'Remote service rejected the API credential', {
      statusCode,
      remediation: 'Rotate the stored credential'
    })
  }

  static malformed(message: string, statusCode?: number): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.Malformed, message, { statusCode })
  }

  static unavailable(message: string, details: { statusCode?: number; delivered: boolean; cause?: Error }): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.Unavailable, message, details)
  }

  static rateLimited(retryAfterMs?: number): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.RateLimited, 'Remote service rate limit reached', {
      statusCode: 429,
      retryAfterMs,
      delivered: false
    })
  }

  static retriesExhausted(attempts: number, lastError: AssetJobError): AssetJobError {
    return new AssetJobError(
      AssetJobErrorCode.RetriesExhausted,
      `Gave up after ${attempts} attempts: ${lastError.message}`,
      { cause: lastError, statusCode: lastError.details.statusCode }
    )
  }

  static circuitOpen(retryInMs: number): AssetJobError {
    return new AssetJobError(
      AssetJobErrorCode.CircuitOpen,
      'Circuit breaker open: remote service temporarily considered unavailable',
      { retryAfterMs: retryInMs }
    )
  }

  static timedOut(maxWaitMs: number, cause?: Error): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.TimedOut, `Generation did not finish within ${maxWaitMs}ms`, {
      cause,
      remediation: 'Increase ASSET_CORE_MAX_WAIT_MS or check the job later'
    })
  }

  static cancelled(message = 'Generation cancelled by caller'): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.Cancelled, message)
  }

  static generationFailed(remoteId: string, remoteStatus: string): AssetJobError {
    return new AssetJobError(
      AssetJobErrorCode.GenerationFailed,
      `Remote generation ${remoteId} ended with status ${remoteStatus}`
    )
  }

  static configuration(message: string): AssetJobError {
    return new AssetJobError(AssetJobErrorCode.Configuration, message)
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      statusCode: this.details.statusCode,
      retryAfterMs: this.details.retryAfterMs,
      remediation: this.details.remediation,
      cause: this.details.cause?.message
    }
  }
}

export function isAssetJobError(err: unknown): err is AssetJobError {
  return err instanceof AssetJobError
}

/**
 * Normalizes anything thrown below the transport boundary into a typed
 * error. Unknown failures count as an unavailable service whose delivery
 * state is unknown.
 */
export function toAssetJobError(err: unknown): AssetJobError {
  if (err instanceof AssetJobError) {
    return err
  }
  const cause = err instanceof Error ? err : new Error(String(err))
  return AssetJobError.unavailable(cause.message, { delivered: true, cause })
}
