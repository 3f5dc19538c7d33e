/**
 * Serializes the vault's record collection to the plaintext bytes that get
 * sealed, and back. Output is canonical: keys follow the schema's order.
 */

import { RecordCollectionSchema } from '@shared/schemas/vault.schema'
import type { RecordCollection } from '@shared/schemas/vault.schema'
import { VaultError, describeIssues, errorMessage } from './errors'

export type CodecResult<T> =
  | { success: true; data: T }
  | { success: false; error: { code: 'DECODE_ERROR'; message: string } }

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Encodes a record collection as UTF-8 JSON.
 *
 * @throws {VaultError} `DECODE_ERROR` if `records` does not match the record
 *   schema or holds a value JSON cannot represent (a BigInt, a cycle).
 */
export function encodeRecords(records: RecordCollection): Buffer {
  const parsed = RecordCollectionSchema.safeParse(records)
  if (!parsed.success) {
    throw new VaultError({
      code: 'DECODE_ERROR',
      message: `Record collection cannot be encoded: ${describeIssues(parsed.error)}`
    })
  }
  let json: string
  try {
    json = JSON.stringify(parsed.data)
  } catch (err) {
    throw new VaultError({
      code: 'DECODE_ERROR',
      message: `Record collection cannot be encoded: ${errorMessage(err)}`,
      cause: err
    })
  }
  return Buffer.from(json, 'utf8')
}

/** Decodes plaintext bytes produced by {@link encodeRecords}. */
export function decodeRecords(bytes: Buffer): CodecResult<RecordCollection> {
  let json: unknown
  try {
    json = JSON.parse(utf8.decode(bytes))
  } catch (err) {
    return {
      success: false,
      error: { code: 'DECODE_ERROR', message: `Vault payload is not valid JSON: ${errorMessage(err)}` }
    }
  }

  const parsed = RecordCollectionSchema.safeParse(json)
  if (!parsed.success) {
    return {
      success: false,
      error: {
        code: 'DECODE_ERROR',
        message: `Vault payload has an invalid structure: ${describeIssues(parsed.error)}`
      }
    }
  }
  return { success: true, data: parsed.data }
}
