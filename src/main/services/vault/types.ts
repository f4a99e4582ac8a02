/**
 * Vault type definitions for the encrypted credential record.
 */

/** Decoded form of the binary credential file. */
export interface CredentialRecord {
  /** On-disk format version. */
  formatVersion: number
  /** PBKDF2 iteration count used to derive the keys. */
  iterations: number
  /** 16-byte PBKDF2 salt. */
  salt: Buffer
  /** 12-byte AES-GCM initialization vector. */
  iv: Buffer
  /** 16-byte value proving the passphrase derived the right key. */
  keyCheck: Buffer
  /** 16-byte GCM authentication tag. */
  authTag: Buffer
  /** Encrypted credential JSON. */
  ciphertext: Buffer
}

/** Keys derived from a passphrase for one record. */
export interface VaultKeys {
  encryptionKey: Buffer
  checkKey: Buffer
}

/** Non-secret status snapshot of the vault. */
export interface VaultStatus {
  exists: boolean
  unlocked: boolean
  formatVersion: number | null
  iterations: number | null
}
