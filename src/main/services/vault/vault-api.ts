/**
 * Throwing facade over {@link VaultStore} for the UI and CRUD layers.
 *
 * Binds one store to the process configuration on first use. Every failure
 * is raised as a {@link VaultError} whose `code` names the taxonomy kind.
 */

import { MasterPasswordSchema, emptyRecordCollection } from '@shared/schemas/vault.schema'
import type { RecordCollection } from '@shared/schemas/vault.schema'
import { LogRing } from '../diagnostics/log-ring'
import { getVaultConfig } from '../platform/config'
import { VaultError, unwrapResult } from './errors'
import { VaultStore } from './vault-store'

let defaultStore: VaultStore | null = null

/** Returns the store for the configured vault path, creating it on first access. */
export function getDefaultVaultStore(): VaultStore {
  if (!defaultStore) {
    const config = getVaultConfig()
    const logger = LogRing.getInstance()
    logger.setLevel(config.logLevel)
    defaultStore = new VaultStore({
      vaultPath: config.vaultPath,
      ...(config.legacyVaultPath ? { legacyVaultPath: config.legacyVaultPath } : {}),
      logger
    })
  }
  return defaultStore
}

export function resetDefaultVaultStore(): void {
  defaultStore = null
}

export async function vaultExists(): Promise<boolean> {
  return getDefaultVaultStore().exists()
}

/**
 * Creates (or overwrites) the vault under a new master password.
 *
 * @throws {VaultError} `INVALID_PASSWORD` if the password is shorter than the
 *   minimum length, `IO_ERROR` if the file cannot be written.
 */
export async function createVault(
  masterPassword: string,
  initialRecords: RecordCollection = emptyRecordCollection()
): Promise<void> {
  const policy = MasterPasswordSchema.safeParse(masterPassword)
  if (!policy.success) {
    throw new VaultError({
      code: 'INVALID_PASSWORD',
      message: policy.error.issues[0]?.message ?? 'Master password is invalid'
    })
  }
  unwrapResult(await getDefaultVaultStore().create(masterPassword, initialRecords))
}

/** @throws {VaultError} `IO_ERROR` if the file cannot be written. */
export async function saveVault(masterPassword: string, records: RecordCollection): Promise<void> {
  unwrapResult(await getDefaultVaultStore().save(masterPassword, records))
}

/**
 * Unlocks the vault.
 *
 * @throws {VaultError} `NOT_FOUND`, `WRONG_PASSWORD_OR_CORRUPT`,
 *   `MALFORMED_ENVELOPE`, `DECODE_ERROR` or `IO_ERROR`.
 */
export async function loadVault(masterPassword: string): Promise<RecordCollection> {
  return unwrapResult(await getDefaultVaultStore().load(masterPassword))
}
