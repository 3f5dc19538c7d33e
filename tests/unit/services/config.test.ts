import { describe, it, expect, afterEach } from 'vitest'
import { join } from 'path'
import {
  getVaultConfig,
  loadVaultConfig,
  resetVaultConfig
} from '../../../src/main/services/platform/config'
import {
  quarantinePathFor,
  resolveBaseDataDir
} from '../../../src/main/services/platform/app-paths'

describe('loadVaultConfig', () => {
  it('should place the vault and logs under an explicit data directory', () => {
    const config = loadVaultConfig({ LOCKWELL_DATA_DIR: '/srv/lockwell' })

    expect(config).toEqual({
      dataDir: '/srv/lockwell',
      vaultPath: join('/srv/lockwell', 'vault.dat'),
      legacyVaultPath: null,
      logsDir: join('/srv/lockwell', 'logs'),
      logLevel: 'info'
    })
  })

  it('should honour a custom file name, legacy path and log level', () => {
    const config = loadVaultConfig({
      LOCKWELL_DATA_DIR: '/srv/lockwell',
      LOCKWELL_VAULT_FILE: 'secrets.dat',
      LOCKWELL_LEGACY_VAULT_PATH: '/opt/old/vault.dat',
      LOCKWELL_LOG_LEVEL: 'debug'
    })

    expect(config.vaultPath).toBe(join('/srv/lockwell', 'secrets.dat'))
    expect(config.legacyVaultPath).toBe('/opt/old/vault.dat')
    expect(config.logLevel).toBe('debug')
  })

  it('should fall back to the platform data directory', () => {
    const env = { HOME: '/home/test', XDG_CONFIG_HOME: '/home/test/.cfg' }

    expect(loadVaultConfig(env).dataDir).toBe(resolveBaseDataDir(env))
  })

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadVaultConfig({ LOCKWELL_DATA_DIR: '/srv/lockwell' }))).toBe(true)
  })

  it('should list every invalid variable', () => {
    expect(() =>
      loadVaultConfig({
        LOCKWELL_DATA_DIR: 'relative/dir',
        LOCKWELL_VAULT_FILE: 'nested/vault.dat',
        LOCKWELL_LOG_LEVEL: 'verbose'
      })
    ).toThrow(
      'Invalid vault configuration:\n' +
        '  - LOCKWELL_DATA_DIR: must be an absolute path\n' +
        '  - LOCKWELL_VAULT_FILE: must be a file name, not a path\n' +
        "  - LOCKWELL_LOG_LEVEL: Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error', received 'verbose'"
    )
  })
})

describe('getVaultConfig', () => {
  const saved = process.env['LOCKWELL_DATA_DIR']

  afterEach(() => {
    if (saved === undefined) {
      delete process.env['LOCKWELL_DATA_DIR']
    } else {
      process.env['LOCKWELL_DATA_DIR'] = saved
    }
    resetVaultConfig()
  })

  it('should cache until reset', () => {
    process.env['LOCKWELL_DATA_DIR'] = '/srv/first'
    resetVaultConfig()
    const first = getVaultConfig()

    process.env['LOCKWELL_DATA_DIR'] = '/srv/second'
    expect(getVaultConfig()).toBe(first)

    resetVaultConfig()
    expect(getVaultConfig().dataDir).toBe('/srv/second')
  })
})

describe('app paths', () => {
  it('should resolve the data directory per platform', () => {
    expect(resolveBaseDataDir({}, 'darwin', '/Users/test')).toBe(
      join('/Users/test', 'Library', 'Application Support', 'Lockwell')
    )
    expect(resolveBaseDataDir({ XDG_CONFIG_HOME: '/xdg' }, 'linux', '/home/test')).toBe(
      join('/xdg', 'lockwell')
    )
    expect(resolveBaseDataDir({}, 'linux', '/home/test')).toBe(
      join('/home/test', '.config', 'lockwell')
    )
    expect(resolveBaseDataDir({ APPDATA: '/appdata' }, 'win32', '/home/test')).toBe(
      join('/appdata', 'Lockwell')
    )
  })

  it('should quarantine beside the vault file', () => {
    expect(quarantinePathFor('/data/vault.dat')).toBe('/data/vault.dat.corrupted')
  })
})
