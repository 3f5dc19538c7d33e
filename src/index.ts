export {
  vaultExists,
  createVault,
  saveVault,
  loadVault,
  getDefaultVaultStore,
  resetDefaultVaultStore
} from './main/services/vault/vault-api'
export { VaultStore } from './main/services/vault/vault-store'
export { VaultError, VAULT_MESSAGES, unwrapResult } from './main/services/vault/errors'
export { deriveKey, seal, open, KDF_ITERATIONS } from './main/services/vault/crypto'
export { encodeRecords, decodeRecords } from './main/services/vault/codec'
export { packEnvelope, unpackEnvelope, ENVELOPE_VERSION } from './main/services/vault/envelope'
export { loadVaultConfig, getVaultConfig, resetVaultConfig } from './main/services/platform/config'
export { LogRing } from './main/services/diagnostics/log-ring'
export {
  RecordCollectionSchema,
  VaultEntrySchema,
  MasterPasswordSchema,
  emptyRecordCollection
} from './shared/schemas/vault.schema'
export type { RecordCollection, VaultEntry } from './shared/schemas/vault.schema'
export type {
  VaultErrorCode,
  VaultFailure,
  VaultResult,
  CipherResult,
  SealedVault,
  VaultFileSystem,
  VaultStoreOptions,
  VaultPaths
} from './main/services/vault/types'
export type { VaultConfig } from './main/services/platform/config'
