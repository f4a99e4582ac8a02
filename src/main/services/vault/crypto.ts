/**
 * Passphrase-based AES-256-GCM sealing for the credential record, plus the
 * binary codec of the record file.
 *
 * Each seal call generates a fresh salt and IV. PBKDF2-HMAC-SHA256 stretches
 * the passphrase into 64 bytes: an encryption key and a key-check key. The
 * key-check value lets a wrong passphrase be told apart from a damaged file.
 */

import { randomBytes, createCipheriv, createDecipheriv, createHmac, pbkdf2, timingSafeEqual } from 'crypto'
import { promisify } from 'util'
import { AssetJobError } from '../errors/asset-job-error'
import type { CredentialRecord, VaultKeys } from './types'

const pbkdf2Async = promisify(pbkdf2)

const ALGORITHM = 'aes-256-gcm'
const KEY_LENGTH = 32
const IV_LENGTH = 12
const SALT_LENGTH = 16
const AUTH_TAG_LENGTH = 16
const KEY_CHECK_LENGTH = 16
const PBKDF2_DIGEST = 'sha256'
const KEY_CHECK_LABEL = 'asset-job-core/key-check'

export const MIN_PBKDF2_ITERATIONS = 100_000
export const RECORD_MAGIC = Buffer.from('AJCV', 'ascii')
export const RECORD_FORMAT_VERSION = 1

const HEADER_LENGTH = RECORD_MAGIC.length + 1 + 4 + SALT_LENGTH + IV_LENGTH + KEY_CHECK_LENGTH + AUTH_TAG_LENGTH

/**
 * Derives the encryption and key-check keys from a passphrase.
 *
 * @throws {AssetJobError} `InvalidPassphrase` for an empty passphrase,
 *   `VaultCorrupt` for a salt shorter than 16 bytes.
 */
export async function deriveVaultKeys(passphrase: string, salt: Buffer, iterations: number): Promise<VaultKeys> {
  if (passphrase.length === 0) {
    throw AssetJobError.invalidPassphrase()
  }
  if (salt.length < SALT_LENGTH) {
    throw AssetJobError.vaultCorrupt(`salt must be at least ${SALT_LENGTH} bytes, got ${salt.length}`)
  }

  const material = await pbkdf2Async(passphrase, salt, iterations, KEY_LENGTH * 2, PBKDF2_DIGEST)
  return {
    encryptionKey: material.subarray(0, KEY_LENGTH),
    checkKey: material.subarray(KEY_LENGTH)
  }
}

function computeKeyCheck(checkKey: Buffer): Buffer {
  return createHmac('sha256', checkKey).update(KEY_CHECK_LABEL).digest().subarray(0, KEY_CHECK_LENGTH)
}

/**
 * Encrypts plaintext under a passphrase.
 *
 * @example
 * ```ts
 * const record = await sealCredential(JSON.stringify(credential), 'correct horse')
 * await atomicWriteFile(path, encodeRecord(record))
 * ```
 */
export async function sealCredential(
  plaintext: string,
  passphrase: string,
  iterations = MIN_PBKDF2_ITERATIONS
): Promise<CredentialRecord> {
  if (iterations < MIN_PBKDF2_ITERATIONS) {
    throw AssetJobError.configuration(`PBKDF2 iterations must be at least ${MIN_PBKDF2_ITERATIONS}, got ${iterations}`)
  }

  const salt = randomBytes(SALT_LENGTH)
  const iv = randomBytes(IV_LENGTH)
  const keys = await deriveVaultKeys(passphrase, salt, iterations)

  const cipher = createCipheriv(ALGORITHM, keys.encryptionKey, iv, { authTagLength: AUTH_TAG_LENGTH })
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()])

  return {
    formatVersion: RECORD_FORMAT_VERSION,
    iterations,
    salt,
    iv,
    keyCheck: computeKeyCheck(keys.checkKey),
    authTag: cipher.getAuthTag(),
    ciphertext
  }
}

/**
 * Decrypts a record back to its plaintext.
 *
 * @throws {AssetJobError} `WrongPassphrase` if the passphrase derives a
 *   different key-check value, `VaultCorrupt` if GCM authentication fails.
 */
export async function openCredential(record: CredentialRecord, passphrase: string): Promise<string> {
  // An empty passphrase can never have sealed a record.
  if (passphrase.length === 0) {
    throw AssetJobError.wrongPassphrase()
  }
  const keys = await deriveVaultKeys(passphrase, record.salt, record.iterations)

  if (!timingSafeEqual(computeKeyCheck(keys.checkKey), record.keyCheck)) {
    throw AssetJobError.wrongPassphrase()
  }

  try {
    const decipher = createDecipheriv(ALGORITHM, keys.encryptionKey, record.iv, { authTagLength: AUTH_TAG_LENGTH })
    decipher.setAuthTag(record.authTag)
    return Buffer.concat([decipher.update(record.ciphertext), decipher.final()]).toString('utf8')
  } catch (err) {
    throw AssetJobError.vaultCorrupt(
      'ciphertext failed integrity validation',
      err instanceof Error ? err : undefined
    )
  }
}

/**
 * Serializes a record: magic, version, iterations (uint32 BE), salt, IV,
 * key check, auth tag, ciphertext.
 */
export function encodeRecord(record: CredentialRecord): Buffer {
  const header = Buffer.alloc(RECORD_MAGIC.length + 1 + 4)
  RECORD_MAGIC.copy(header, 0)
  header.writeUInt8(record.formatVersion, RECORD_MAGIC.length)
  header.writeUInt32BE(record.iterations, RECORD_MAGIC.length + 1)

  return Buffer.concat([header, record.salt, record.iv, record.keyCheck, record.authTag, record.ciphertext])
}

/**
 * Parses the binary record file.
 *
 * @throws {AssetJobError} `VaultCorrupt` on a truncated buffer, wrong magic,
 *   unknown version or an iteration count below the minimum.
 */
export function decodeRecord(buffer: Buffer): CredentialRecord {
  if (buffer.length <= HEADER_LENGTH) {
    throw AssetJobError.vaultCorrupt(`record is truncated (${buffer.length} bytes)`)
  }
  if (!buffer.subarray(0, RECORD_MAGIC.length).equals(RECORD_MAGIC)) {
    throw AssetJobError.vaultCorrupt('unrecognized file header')
  }

  let offset = RECORD_MAGIC.length
  const formatVersion = buffer.readUInt8(offset)
  offset += 1
  if (formatVersion !== RECORD_FORMAT_VERSION) {
    throw AssetJobError.vaultCorrupt(`unsupported format version ${formatVersion}`)
  }

  const iterations = buffer.readUInt32BE(offset)
  offset += 4
  if (iterations < MIN_PBKDF2_ITERATIONS) {
    throw AssetJobError.vaultCorrupt(`iteration count ${iterations} is below the minimum`)
  }

  const take = (length: number): Buffer => {
    const slice = Buffer.from(buffer.subarray(offset, offset + length))
    offset += length
    return slice
  }

  const salt = take(SALT_LENGTH)
  const iv = take(IV_LENGTH)
  const keyCheck = take(KEY_CHECK_LENGTH)
  const authTag = take(AUTH_TAG_LENGTH)
  const ciphertext = Buffer.from(buffer.subarray(offset))

  return { formatVersion, iterations, salt, iv, keyCheck, authTag, ciphertext }
}
