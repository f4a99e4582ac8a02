import type { Credential } from '@shared/schemas/credential.schema'
import { LogRing } from '../diagnostics/log-ring'
import { AssetJobError } from '../errors/asset-job-error'
import { describeCredentialProblem, isValidCredential } from './credential-format'
import type { CredentialVault } from './credential-vault'

const logger = LogRing.getInstance()

export type CredentialSourceKind = 'vault' | 'env'

export interface ResolvedCredential {
  credential: Credential
  source: CredentialSourceKind
}

export interface ResolveCredentialOptions {
  vault: CredentialVault
  /** Passphrase for the vault; without it the vault is skipped. */
  passphrase?: string
  /** Credential read from LAYER_API_TOKEN / LAYER_WORKSPACE_ID. */
  envCredential: { token: string; workspaceId: string } | null
}

/**
 * Finds a usable credential: the vault first (when a passphrase is given and
 * a record exists), then the environment.
 *
 * Vault secrecy failures (wrong passphrase, corrupt record, insecure
 * permissions) propagate instead of falling back, so a broken vault is
 * never silently masked by the environment.
 *
 * @throws {AssetJobError} `CredentialUnavailable` when no source yields a credential.
 */
export async function resolveCredential(options: ResolveCredentialOptions): Promise<ResolvedCredential> {
  const { vault, passphrase, envCredential } = options

  if (passphrase !== undefined && vault.exists()) {
    const credential = await vault.unlock(passphrase)
    logger.info('Using credential from vault')
    return { credential, source: 'vault' }
  }

  if (envCredential) {
    if (isValidCredential(envCredential)) {
      logger.info('Using credential from environment')
      return { credential: envCredential, source: 'env' }
    }
    logger.warn('Ignoring environment credential', { problem: describeCredentialProblem(envCredential) })
  }

  throw AssetJobError.credentialUnavailable()
}
