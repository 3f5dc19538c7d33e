import { isAbsolute } from 'path'
import { z } from 'zod'
import {
  DEFAULT_VAULT_FILE_NAME,
  logsDirFor,
  resolveBaseDataDir,
  vaultFilePath
} from './app-paths'

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

const absolutePath = z.string().refine((value) => isAbsolute(value), 'must be an absolute path')

const EnvSchema = z.object({
  LOCKWELL_DATA_DIR: absolutePath.optional(),
  LOCKWELL_VAULT_FILE: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must be a file name, not a path')
    .default(DEFAULT_VAULT_FILE_NAME),
  LOCKWELL_LEGACY_VAULT_PATH: absolutePath.optional(),
  LOCKWELL_LOG_LEVEL: LogLevelSchema.default('info')
})

/** Resolved, immutable settings for one process. */
export interface VaultConfig {
  dataDir: string
  vaultPath: string
  legacyVaultPath: string | null
  logsDir: string
  logLevel: z.infer<typeof LogLevelSchema>
}

/**
 * Builds the vault configuration from environment variables.
 *
 * @throws If any variable fails validation; the message lists every issue.
 *
 * @example
 * ```ts
 * const config = loadVaultConfig({ LOCKWELL_DATA_DIR: '/srv/lockwell' })
 * // config.vaultPath === '/srv/lockwell/vault.dat'
 * ```
 */
export function loadVaultConfig(env: NodeJS.ProcessEnv = process.env): VaultConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new Error(`Invalid vault configuration:\n${details}`)
  }

  const values = parsed.data
  const dataDir = values.LOCKWELL_DATA_DIR ?? resolveBaseDataDir(env)

  return Object.freeze({
    dataDir,
    vaultPath: vaultFilePath(dataDir, values.LOCKWELL_VAULT_FILE),
    legacyVaultPath: values.LOCKWELL_LEGACY_VAULT_PATH ?? null,
    logsDir: logsDirFor(dataDir),
    logLevel: values.LOCKWELL_LOG_LEVEL
  })
}

let cachedConfig: VaultConfig | null = null

/** Returns the process-wide configuration, resolving it on first access. */
export function getVaultConfig(): VaultConfig {
  if (!cachedConfig) {
    cachedConfig = loadVaultConfig()
  }
  return cachedConfig
}

/** Drops the cached configuration so the next access re-reads the environment. */
export function resetVaultConfig(): void {
  cachedConfig = null
}
