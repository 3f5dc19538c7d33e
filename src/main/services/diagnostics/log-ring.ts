import { join } from 'path'
import { writeFileSync } from 'fs'
import { ensureDir } from '../platform/app-paths'
import { getVaultConfig } from '../platform/config'

/** Severity levels for log entries. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** A single structured log entry. */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  data?: unknown
}

const MAX_ENTRIES = 1000
const REDACTED = '[REDACTED]'
const SECRET_KEY_PATTERN = /password|secret|key|token|plaintext/i

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

/**
 * In-memory ring buffer logger that keeps the last {@link MAX_ENTRIES} log entries.
 *
 * Designed as a singleton for the process. Structured data is redacted before
 * it is stored: any property whose name looks like a password, key, token or
 * plaintext is replaced with `[REDACTED]` at every depth. Entries can be
 * flushed to disk for post-mortem analysis.
 *
 * @example
 * ```ts
 * const logger = LogRing.getInstance()
 * logger.info('Vault saved', { path: '/data/vault.dat', entries: 12 })
 * logger.warn('Login attempt', { masterPassword: 'hunter2' }) // stored as [REDACTED]
 *
 * const recent = logger.getEntries(50) // last 50 entries
 * logger.flush()                       // persist to disk
 * ```
 */
export class LogRing {
  private static instance: LogRing | null = null

  private readonly entries: LogEntry[] = []
  private head = 0
  private count = 0
  private minLevel: LogLevel = 'debug'

  private constructor() {}

  /**
   * Returns the singleton LogRing instance, creating it on first access.
   */
  static getInstance(): LogRing {
    if (!LogRing.instance) {
      LogRing.instance = new LogRing()
    }
    return LogRing.instance
  }

  /** Entries below `level` are dropped. */
  setLevel(level: LogLevel): void {
    this.minLevel = level
  }

  getLevel(): LogLevel {
    return this.minLevel
  }

  debug(message: string, data?: unknown): void {
    this.append('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.append('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.append('warn', message, data)
  }

  /**
   * Logs an error-level message.
   *
   * @param message - Human-readable log message.
   * @param data - Optional structured data (e.g. Error object, failure code).
   */
  error(message: string, data?: unknown): void {
    this.append('error', message, data)
  }

  /**
   * Returns the most recent log entries, ordered oldest-first.
   *
   * @param count - Number of entries to return. Defaults to all stored entries.
   */
  getEntries(count?: number): LogEntry[] {
    const total = Math.min(count ?? this.count, this.count)
    const result: LogEntry[] = []

    const startIdx = (this.head - this.count + MAX_ENTRIES) % MAX_ENTRIES
    const skipCount = this.count - total

    for (let i = 0; i < total; i++) {
      const entry = this.entries[(startIdx + skipCount + i) % MAX_ENTRIES]
      if (entry) {
        result.push(entry)
      }
    }

    return result
  }

  /** Empties the buffer. */
  clear(): void {
    this.entries.length = 0
    this.head = 0
    this.count = 0
  }

  /**
   * Persists all buffered log entries to a timestamped JSON file.
   *
   * @param logsDir - Target directory; defaults to the configured logs directory.
   * @returns Absolute path to the written log file.
   * @throws If writing to disk fails.
   */
  flush(logsDir: string = getVaultConfig().logsDir): string {
    const entries = this.getEntries()
    ensureDir(logsDir)

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const filePath = join(logsDir, `log-ring-${timestamp}.json`)

    try {
      writeFileSync(filePath, JSON.stringify(entries, null, 2), { encoding: 'utf-8', mode: 0o600 })
    } catch (err) {
      throw new Error(
        `Failed to flush log ring to "${filePath}": ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      )
    }

    return filePath
  }

  private append(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      data: data !== undefined ? this.serializeData(data, new WeakSet()) : undefined
    }

    if (this.count < MAX_ENTRIES) {
      this.entries.push(entry)
      this.count++
      this.head = this.count % MAX_ENTRIES
    } else {
      this.entries[this.head] = entry
      this.head = (this.head + 1) % MAX_ENTRIES
    }
  }

  /**
   * Converts Error instances to plain objects and redacts secret-looking
   * properties. Buffers are never stored, only their length.
   */
  private serializeData(data: unknown, seen: WeakSet<object>): unknown {
    if (data instanceof Error) {
      return {
        name: data.name,
        message: data.message,
        stack: data.stack
      }
    }
    if (Buffer.isBuffer(data)) {
      return `<${data.length} bytes>`
    }
    if (data === null || typeof data !== 'object') {
      return data
    }
    if (seen.has(data)) {
      return '[Circular]'
    }
    seen.add(data)

    if (Array.isArray(data)) {
      return data.map((item) => this.serializeData(item, seen))
    }

    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      result[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : this.serializeData(value, seen)
    }
    return result
  }
}
