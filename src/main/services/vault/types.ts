/**
 * Vault type definitions for the encrypted vault engine.
 *
 * These types are shared by the cipher, codec, envelope and store modules
 * to describe encrypted payloads, typed results and the file system seam.
 */

import type { LogRing } from '../diagnostics/log-ring'

export type VaultLogger = Pick<LogRing, 'debug' | 'info' | 'warn' | 'error'>

/** Failure categories surfaced at the vault store boundary. */
export type VaultErrorCode =
  | 'NOT_FOUND'
  | 'WRONG_PASSWORD_OR_CORRUPT'
  | 'MALFORMED_ENVELOPE'
  | 'DECODE_ERROR'
  | 'IO_ERROR'
  | 'INVALID_PASSWORD'

/** Structured description of a failed vault operation. */
export interface VaultFailure {
  code: VaultErrorCode
  message: string
  /** Set when the failure moved the vault file aside. */
  quarantinePath?: string
  cause?: unknown
}

export type VaultResult<T> =
  | { success: true; data: T }
  | { success: false; error: VaultFailure }

/** Outcome of opening an AEAD payload. One failure category, by construction. */
export type CipherResult =
  | { success: true; data: Buffer }
  | { success: false; error: 'AUTHENTICATION_FAILED' }

/**
 * The three binary parts of a persisted vault.
 *
 * `ciphertext` carries the GCM tag in its last 16 bytes.
 */
export interface SealedVault {
  salt: Buffer
  nonce: Buffer
  ciphertext: Buffer
}

/**
 * File system operations the vault store needs. The default implementation
 * lives in `platform/atomic-fs`; tests may substitute their own.
 */
export interface VaultFileSystem {
  readFile(path: string): Promise<Buffer>
  /** Replaces `path` so readers see either the old or the new bytes, never a mix. */
  writeFileAtomic(path: string, content: Buffer | string, mode?: number): Promise<void>
  rename(from: string, to: string): Promise<void>
  unlink(path: string): Promise<void>
  exists(path: string): Promise<boolean>
  isDirectory(path: string): Promise<boolean>
  mkdirp(dirPath: string): Promise<void>
}

export interface VaultStoreOptions {
  /** Absolute path of the vault file. */
  vaultPath: string
  /** Older location checked and migrated from when `vaultPath` is absent. */
  legacyVaultPath?: string
  fs?: VaultFileSystem
  logger?: VaultLogger
}

export interface VaultPaths {
  vaultPath: string
  legacyVaultPath: string | null
  quarantinePath: string
}
