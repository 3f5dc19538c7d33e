/**
 * Vault store backed by a single encrypted file.
 *
 * Every create and save re-encrypts the whole record collection under a
 * fresh salt, a freshly derived key and a fresh nonce, then replaces the file
 * atomically (via {@link atomicWriteFile}). Loads map every lower-level
 * failure onto the {@link VaultErrorCode} taxonomy; structural corruption
 * moves the file aside to `<path>.corrupted`, a failed tag check does not.
 *
 * All operations on one path are serialized through {@link withPathLock}.
 */

import { dirname } from 'path'
import type { RecordCollection } from '@shared/schemas/vault.schema'
import { emptyRecordCollection } from '@shared/schemas/vault.schema'
import { LogRing } from '../diagnostics/log-ring'
import { createNodeFileSystem } from '../platform/atomic-fs'
import { quarantinePathFor } from '../platform/app-paths'
import { withPathLock } from '../platform/path-lock'
import { decodeRecords, encodeRecords } from './codec'
import { deriveKey, generateNonce, generateSalt, open, seal, wipe } from './crypto'
import { packEnvelope, unpackEnvelope } from './envelope'
import {
  VaultError,
  corruptionMessage,
  fail,
  ioError,
  ioFailure,
  notFound,
  ok,
  wrongPasswordOrCorrupt
} from './errors'
import type {
  VaultFileSystem,
  VaultLogger,
  VaultPaths,
  VaultResult,
  VaultStoreOptions
} from './types'

const VAULT_FILE_MODE = 0o600

/**
 * Encrypted vault persistence for one file path.
 *
 * @example
 * ```ts
 * const store = new VaultStore({ vaultPath: '/data/lockwell/vault.dat' })
 * if (!(await store.exists())) {
 *   await store.create('Tr0ub4dor&3')
 * }
 * const result = await store.load('Tr0ub4dor&3')
 * if (result.success) {
 *   console.log(result.data.entries.length)
 * }
 * ```
 */
export class VaultStore {
  private readonly vaultPath: string
  private readonly legacyVaultPath: string | null
  private readonly quarantinePath: string
  private readonly fs: VaultFileSystem
  private readonly logger: VaultLogger

  constructor(options: VaultStoreOptions) {
    this.vaultPath = options.vaultPath
    this.legacyVaultPath = options.legacyVaultPath ?? null
    this.quarantinePath = quarantinePathFor(options.vaultPath)
    this.fs = options.fs ?? createNodeFileSystem()
    this.logger = options.logger ?? LogRing.getInstance()
  }

  getPaths(): VaultPaths {
    return {
      vaultPath: this.vaultPath,
      legacyVaultPath: this.legacyVaultPath,
      quarantinePath: this.quarantinePath
    }
  }

  /**
   * Reports whether a vault file is present, migrating one from the legacy
   * location first when only that exists.
   *
   * @throws {VaultError} `IO_ERROR` if the file system cannot be queried or the migration fails.
   */
  async exists(): Promise<boolean> {
    return withPathLock(this.vaultPath, async () => {
      try {
        return await this.resolvePresence()
      } catch (err) {
        this.logger.error('Failed to check vault presence', { path: this.vaultPath, error: err })
        throw new VaultError(ioFailure(err))
      }
    })
  }

  /**
   * Encrypts `records` and writes them as the vault file, replacing any
   * existing file. Callers that must not overwrite should check
   * {@link exists} first.
   */
  async create(
    password: string,
    records: RecordCollection = emptyRecordCollection()
  ): Promise<VaultResult<void>> {
    return withPathLock(this.vaultPath, () => this.writeSealed(password, records, 'created'))
  }

  /**
   * Re-encrypts the full collection with a new salt and nonce and replaces
   * the vault file. Never patches the file in place.
   */
  async save(password: string, records: RecordCollection): Promise<VaultResult<void>> {
    return withPathLock(this.vaultPath, () => this.writeSealed(password, records, 'saved'))
  }

  /**
   * Reads, verifies and decodes the vault file.
   *
   * Failure codes: `NOT_FOUND`, `MALFORMED_ENVELOPE` (file quarantined),
   * `WRONG_PASSWORD_OR_CORRUPT` (file left in place), `DECODE_ERROR` (file
   * quarantined) and `IO_ERROR`.
   */
  async load(password: string): Promise<VaultResult<RecordCollection>> {
    return withPathLock(this.vaultPath, async () => {
      let raw: Buffer
      try {
        if (!(await this.resolvePresence())) {
          this.logger.warn('Vault load requested but no vault file exists', { path: this.vaultPath })
          return notFound<RecordCollection>()
        }
        raw = await this.fs.readFile(this.vaultPath)
      } catch (err) {
        this.logger.error('Failed to read vault file', { path: this.vaultPath, error: err })
        return ioError<RecordCollection>(err)
      }

      const envelope = unpackEnvelope(raw)
      if (!envelope.success) {
        return this.quarantineCorrupted<RecordCollection>('MALFORMED_ENVELOPE', envelope.error.message)
      }

      const { salt, nonce, ciphertext } = envelope.data
      const key = await deriveKey(password, salt)
      const opened = open(key, nonce, ciphertext)
      wipe(key)

      if (!opened.success) {
        this.logger.warn('Vault authentication failed', { path: this.vaultPath })
        return wrongPasswordOrCorrupt<RecordCollection>()
      }

      const decoded = decodeRecords(opened.data)
      wipe(opened.data)

      if (!decoded.success) {
        return this.quarantineCorrupted<RecordCollection>('DECODE_ERROR', decoded.error.message)
      }

      this.logger.info('Vault loaded', {
        path: this.vaultPath,
        entries: decoded.data.entries.length
      })
      return ok(decoded.data)
    })
  }

  /**
   * Renames the vault file to its `.corrupted` sibling, replacing an older
   * quarantined copy. Resolves to the quarantine path, or `null` when there
   * was no vault file to move.
   */
  async quarantine(): Promise<VaultResult<string | null>> {
    return withPathLock(this.vaultPath, async () => {
      try {
        return ok(await this.moveAside())
      } catch (err) {
        this.logger.error('Failed to quarantine vault file', { path: this.vaultPath, error: err })
        return ioError<string | null>(err)
      }
    })
  }

  private async writeSealed(
    password: string,
    records: RecordCollection,
    action: 'created' | 'saved'
  ): Promise<VaultResult<void>> {
    let plaintext: Buffer
    try {
      plaintext = encodeRecords(records)
    } catch (err) {
      if (err instanceof VaultError) {
        this.logger.error('Refusing to write an invalid record collection', { code: err.code })
        return fail(err.code, err.message, err.cause !== undefined ? { cause: err.cause } : {})
      }
      throw err
    }

    const salt = generateSalt()
    const nonce = generateNonce()
    const key = await deriveKey(password, salt)
    let ciphertext: Buffer
    try {
      ciphertext = seal(key, nonce, plaintext)
    } finally {
      wipe(key, plaintext)
    }

    try {
      if (await this.fs.isDirectory(this.vaultPath)) {
        throw new Error(
          `Vault path "${this.vaultPath}" is a directory, not a file. Remove it and try again.`
        )
      }
      await this.fs.mkdirp(dirname(this.vaultPath))
      await this.fs.writeFileAtomic(
        this.vaultPath,
        packEnvelope({ salt, nonce, ciphertext }),
        VAULT_FILE_MODE
      )
    } catch (err) {
      this.logger.error('Failed to write vault file', { path: this.vaultPath, error: err })
      return ioError(err)
    }

    this.logger.info(`Vault ${action}`, { path: this.vaultPath, entries: records.entries.length })
    return ok(undefined)
  }

  private async quarantineCorrupted<T>(
    code: 'MALFORMED_ENVELOPE' | 'DECODE_ERROR',
    detail: string
  ): Promise<VaultResult<T>> {
    this.logger.error('Vault file is corrupt', { path: this.vaultPath, code, detail })
    try {
      await this.moveAside()
    } catch (err) {
      this.logger.error('Failed to quarantine vault file', { path: this.vaultPath, error: err })
      return ioError<T>(err)
    }
    return fail<T>(code, corruptionMessage(this.quarantinePath, detail), {
      quarantinePath: this.quarantinePath
    })
  }

  private async moveAside(): Promise<string | null> {
    if (!(await this.fs.exists(this.vaultPath))) {
      return null
    }
    if (await this.fs.exists(this.quarantinePath)) {
      await this.fs.unlink(this.quarantinePath)
    }
    await this.fs.rename(this.vaultPath, this.quarantinePath)
    this.logger.warn('Vault file quarantined', {
      path: this.vaultPath,
      quarantinePath: this.quarantinePath
    })
    return this.quarantinePath
  }

  /** True when the vault file is present, after a legacy migration if one applies. */
  private async resolvePresence(): Promise<boolean> {
    if (await this.fs.exists(this.vaultPath)) {
      return true
    }
    if (!this.legacyVaultPath || !(await this.fs.exists(this.legacyVaultPath))) {
      return false
    }

    await this.fs.mkdirp(dirname(this.vaultPath))
    await this.fs.rename(this.legacyVaultPath, this.vaultPath)
    this.logger.info('Vault migrated from legacy location', {
      from: this.legacyVaultPath,
      to: this.vaultPath
    })
    return true
  }
}
