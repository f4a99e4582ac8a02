/**
 * Single-credential vault backed by an encrypted file in an owner-only
 * directory.
 *
 * The record is sealed under a passphrase (see {@link sealCredential}) and
 * written atomically with mode 0600. The plaintext credential only lives in
 * memory for the session after a successful {@link CredentialVault.unlock}.
 */

import { join } from 'path'
import { existsSync } from 'fs'
import { stat, unlink } from 'fs/promises'
import { platform } from 'os'
import type { Credential } from '@shared/schemas/credential.schema'
import { LogRing } from '../diagnostics/log-ring'
import { redactSecret } from '../diagnostics/redact'
import { AssetJobError } from '../errors/asset-job-error'
import { ensurePrivateDir } from '../platform/app-paths'
import { atomicReadBuffer, atomicWriteFile, withFileLock } from '../platform/atomic-fs'
import { sealCredential, openCredential, encodeRecord, decodeRecord, MIN_PBKDF2_ITERATIONS } from './crypto'
import { describeCredentialProblem, isValidCredential, parseCredential } from './credential-format'
import type { VaultStatus } from './types'

const VAULT_FILE_NAME = 'credential.vault'
const FILE_MODE = 0o600

export interface CredentialVaultOptions {
  /** Directory holding the record; created with mode 0700. */
  directory: string
  /** PBKDF2 iterations for new records (never below 100,000). */
  iterations?: number
}

/**
 * @example
 * ```ts
 * const vault = new CredentialVault({ directory: getVaultPath(config.dataDir) })
 * await vault.store({ token: 'pat_...', workspaceId }, passphrase)
 * const credential = await vault.unlock(passphrase)
 * ```
 */
export class CredentialVault {
  private readonly logger = LogRing.getInstance()
  private readonly directory: string
  private readonly filePath: string
  private readonly iterations: number
  private session: Credential | null = null

  constructor(options: CredentialVaultOptions) {
    this.directory = options.directory
    this.filePath = join(options.directory, VAULT_FILE_NAME)
    this.iterations = Math.max(options.iterations ?? MIN_PBKDF2_ITERATIONS, MIN_PBKDF2_ITERATIONS)
  }

  /**
   * Decrypts the stored credential and keeps it in memory for the session.
   *
   * @throws {AssetJobError} `VaultMissing`, `InsecurePermissions`,
   *   `VaultCorrupt` or `WrongPassphrase`.
   */
  async unlock(passphrase: string): Promise<Credential> {
    try {
      if (!existsSync(this.filePath)) {
        throw AssetJobError.vaultMissing(this.filePath)
      }

      await this.verifyPermissions(this.directory)
      await this.verifyPermissions(this.filePath)

      const record = decodeRecord(await atomicReadBuffer(this.filePath))
      const plaintext = await openCredential(record, passphrase)

      const credential = parseCredential(plaintext)
      if (!credential) {
        throw AssetJobError.wrongPassphrase()
      }

      this.session = credential
      this.logger.info('Credential vault unlocked', { token: redactSecret(credential.token) })
      return credential
    } catch (err) {
      this.logger.error('Failed to unlock credential vault', {
        error: err instanceof Error ? err.message : String(err)
      })
      throw err
    }
  }

  /**
   * Seals and writes the credential, replacing any prior record.
   *
   * @throws {AssetJobError} `InvalidCredential` if the credential fails format
   *   validation, `InvalidPassphrase` for an empty passphrase.
   */
  async store(credential: Credential, passphrase: string): Promise<void> {
    try {
      if (!isValidCredential(credential)) {
        throw AssetJobError.invalidCredential(describeCredentialProblem(credential))
      }
      if (passphrase.length === 0) {
        throw AssetJobError.invalidPassphrase()
      }

      ensurePrivateDir(this.directory)
      const record = await sealCredential(JSON.stringify(credential), passphrase, this.iterations)

      await atomicWriteFile(this.filePath, encodeRecord(record), { mode: FILE_MODE })

      this.session = credential
      this.logger.info('Credential stored', { token: redactSecret(credential.token) })
    } catch (err) {
      this.logger.error('Failed to store credential', {
        error: err instanceof Error ? err.message : String(err)
      })
      throw err
    }
  }

  /**
   * Replaces the stored credential. Only allowed after a successful
   * {@link unlock} (or {@link store}) in this session.
   *
   * @param passphrase - Passphrase for the new record; may differ from the old one.
   * @throws {AssetJobError} `VaultLocked` when the vault was never unlocked.
   */
  async rotate(newCredential: Credential, passphrase: string): Promise<void> {
    if (!this.session) {
      this.logger.warn('Rejected credential rotation on a locked vault')
      throw AssetJobError.vaultLocked()
    }

    const previous = redactSecret(this.session.token)
    await this.store(newCredential, passphrase)
    this.logger.info('Credential rotated', { previous, current: redactSecret(newCredential.token) })
  }

  /** Whether a record exists on disk. */
  exists(): boolean {
    return existsSync(this.filePath)
  }

  /** The credential unlocked in this session, if any. */
  getSessionCredential(): Credential | null {
    return this.session
  }

  /** Forgets the in-memory credential. */
  lock(): void {
    this.session = null
  }

  /**
   * Deletes the record and locks the vault.
   */
  async clear(): Promise<void> {
    this.lock()
    if (!this.exists()) {
      return
    }
    await withFileLock(this.filePath, () => unlink(this.filePath))
    this.logger.info('Credential vault cleared')
  }

  /**
   * Describes the vault without touching secrets. A record that cannot be
   * decoded reports `null` format fields.
   */
  async getStatus(): Promise<VaultStatus> {
    if (!this.exists()) {
      return { exists: false, unlocked: this.session !== null, formatVersion: null, iterations: null }
    }

    try {
      const record = decodeRecord(await atomicReadBuffer(this.filePath))
      return {
        exists: true,
        unlocked: this.session !== null,
        formatVersion: record.formatVersion,
        iterations: record.iterations
      }
    } catch (err) {
      this.logger.warn('Vault record could not be decoded for status', {
        error: err instanceof Error ? err.message : String(err)
      })
      return { exists: true, unlocked: this.session !== null, formatVersion: null, iterations: null }
    }
  }

  getFilePath(): string {
    return this.filePath
  }

  /**
   * Rejects group/other access bits. Windows has no POSIX modes to check.
   */
  private async verifyPermissions(path: string): Promise<void> {
    if (platform() === 'win32') {
      return
    }

    const { mode } = await stat(path)
    if ((mode & 0o077) !== 0) {
      throw AssetJobError.insecurePermissions(path, mode)
    }
  }
}
