import type { ZodError } from 'zod'
import type { VaultErrorCode, VaultFailure, VaultResult } from './types'

export const VAULT_MESSAGES = {
  NOT_FOUND: 'Vault file not found.',
  WRONG_PASSWORD_OR_CORRUPT:
    'Decryption failed. Master password may be incorrect or data is corrupt.'
} as const

/**
 * Error thrown by the vault facade. Mirrors {@link VaultFailure} so callers
 * can branch on `code` instead of parsing messages.
 */
export class VaultError extends Error {
  readonly code: VaultErrorCode
  readonly quarantinePath?: string

  constructor(failure: VaultFailure) {
    super(failure.message, failure.cause !== undefined ? { cause: failure.cause } : undefined)
    this.name = 'VaultError'
    this.code = failure.code
    if (failure.quarantinePath !== undefined) {
      this.quarantinePath = failure.quarantinePath
    }
  }
}

export function ok<T>(data: T): VaultResult<T> {
  return { success: true, data }
}

export function fail<T = never>(
  code: VaultErrorCode,
  message: string,
  extra: Pick<VaultFailure, 'quarantinePath' | 'cause'> = {}
): VaultResult<T> {
  return { success: false, error: { code, message, ...extra } }
}

export function notFound<T = never>(): VaultResult<T> {
  return fail('NOT_FOUND', VAULT_MESSAGES.NOT_FOUND)
}

export function wrongPasswordOrCorrupt<T = never>(): VaultResult<T> {
  return fail('WRONG_PASSWORD_OR_CORRUPT', VAULT_MESSAGES.WRONG_PASSWORD_OR_CORRUPT)
}

export function ioFailure(err: unknown): VaultFailure {
  return { code: 'IO_ERROR', message: `Vault I/O failed: ${errorMessage(err)}`, cause: err }
}

export function ioError<T = never>(err: unknown): VaultResult<T> {
  return { success: false, error: ioFailure(err) }
}

export function corruptionMessage(quarantinePath: string, detail: string): string {
  return `Vault file is corrupt and has been renamed to '${quarantinePath}'. ${detail}`
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** `path: message` for every issue, joined with `; `. Root-level issues use `(root)`. */
export function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Returns the data of a successful result, or throws its failure as a
 * {@link VaultError}.
 */
export function unwrapResult<T>(result: VaultResult<T>): T {
  if (!result.success) {
    throw new VaultError(result.error)
  }
  return result.data
}
