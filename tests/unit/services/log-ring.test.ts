import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, statSync } from 'fs'
import { tmpdir } from 'os'
import { basename, dirname, join } from 'path'
import { LogRing } from '../../../src/main/services/diagnostics/log-ring'

describe('LogRing', () => {
  let logger: LogRing

  beforeEach(() => {
    logger = LogRing.getInstance()
    logger.clear()
    logger.setLevel('debug')
  })

  it('should be a process-wide singleton', () => {
    expect(LogRing.getInstance()).toBe(logger)
  })

  it('should return entries oldest-first with their level and message', () => {
    logger.info('Vault created')
    logger.warn('Vault file quarantined')

    const entries = logger.getEntries()
    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ['info', 'Vault created'],
      ['warn', 'Vault file quarantined']
    ])
    expect(entries[0]?.data).toBeUndefined()
  })

  it('should return only the most recent entries when a count is given', () => {
    logger.debug('one')
    logger.debug('two')
    logger.debug('three')

    expect(logger.getEntries(2).map((e) => e.message)).toEqual(['two', 'three'])
  })

  it('should keep only the last 1000 entries', () => {
    for (let i = 0; i < 1005; i++) {
      logger.info(`entry ${i}`)
    }

    const entries = logger.getEntries()
    expect(entries).toHaveLength(1000)
    expect(entries[0]?.message).toBe('entry 5')
    expect(entries[999]?.message).toBe('entry 1004')
  })

  it('should drop entries below the configured level', () => {
    logger.setLevel('warn')

    logger.debug('noise')
    logger.info('noise')
    logger.warn('kept')
    logger.error('kept too')

    expect(logger.getLevel()).toBe('warn')
    expect(logger.getEntries().map((e) => e.message)).toEqual(['kept', 'kept too'])
  })

  describe('redaction', () => {
    it('should redact secret-looking keys at every depth', () => {
      logger.info('Unlock attempt', {
        path: '/data/vault.dat',
        masterPassword: 'test-secret',
        nested: { apiKey: 'test-key', authToken: 'test-token', label: 'visible' },
        list: [{ plaintext: 'hidden' }]
      })

      expect(logger.getEntries()[0]?.data).toEqual({
        path: '/data/vault.dat',
        masterPassword: '[REDACTED]',
        nested: { apiKey: '[REDACTED]', authToken: '[REDACTED]', label: 'visible' },
        list: [{ plaintext: '[REDACTED]' }]
      })
    })

    it('should store buffers as their length only', () => {
      logger.debug('Sealed payload', { ciphertext: Buffer.alloc(48) })

      expect(logger.getEntries()[0]?.data).toEqual({ ciphertext: '<48 bytes>' })
    })

    it('should convert errors to plain objects', () => {
      const err = new Error('EBUSY: resource busy')
      logger.error('Quarantine failed', err)

      expect(logger.getEntries()[0]?.data).toEqual({
        name: 'Error',
        message: 'EBUSY: resource busy',
        stack: err.stack
      })
    })

    it('should mark circular references', () => {
      const data: Record<string, unknown> = { path: '/data/vault.dat' }
      data['self'] = data

      logger.info('Cycle', data)

      expect(logger.getEntries()[0]?.data).toEqual({ path: '/data/vault.dat', self: '[Circular]' })
    })
  })

  describe('flush', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'log-ring-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should write every entry to a timestamped JSON file', () => {
      logger.info('Vault loaded', { entries: 3 })
      const logsDir = join(dir, 'logs')

      const filePath = logger.flush(logsDir)

      expect(dirname(filePath)).toBe(logsDir)
      expect(basename(filePath)).toMatch(/^log-ring-\d{4}-\d{2}-\d{2}T[\d-]+Z\.json$/)
      const written: unknown = JSON.parse(readFileSync(filePath, 'utf-8'))
      expect(written).toEqual([
        expect.objectContaining({ level: 'info', message: 'Vault loaded', data: { entries: 3 } })
      ])
    })

    it('should restrict the file to its owner', () => {
      logger.info('Vault loaded')

      const filePath = logger.flush(dir)

      expect(statSync(filePath).mode & 0o777).toBe(0o600)
    })
  })
})
