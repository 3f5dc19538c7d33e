/**
 * On-disk envelope: binds salt, nonce and ciphertext into one JSON document
 * with base64-encoded fields.
 *
 * Writers emit exactly `salt`, `nonce` and `ciphertext`. Readers also accept
 * an optional `version` field; an absent one means {@link ENVELOPE_VERSION}.
 */

import { VaultEnvelopeSchema } from '@shared/schemas/vault.schema'
import type { VaultEnvelopeJson } from '@shared/schemas/vault.schema'
import { AUTH_TAG_LENGTH, NONCE_LENGTH, SALT_LENGTH } from './crypto'
import { describeIssues, errorMessage } from './errors'
import type { SealedVault } from './types'

export const ENVELOPE_VERSION = 1

const ENVELOPE_FIELDS = ['salt', 'nonce', 'ciphertext'] as const

export type EnvelopeResult =
  | { success: true; data: SealedVault }
  | { success: false; error: { code: 'MALFORMED_ENVELOPE'; message: string } }

function malformed(message: string): EnvelopeResult {
  return { success: false, error: { code: 'MALFORMED_ENVELOPE', message } }
}

/** Serializes a sealed vault as pretty-printed JSON. */
export function packEnvelope(sealed: SealedVault): string {
  const json: VaultEnvelopeJson = {
    salt: sealed.salt.toString('base64'),
    nonce: sealed.nonce.toString('base64'),
    ciphertext: sealed.ciphertext.toString('base64')
  }
  return JSON.stringify(json, null, 2)
}

/**
 * Parses an envelope written by {@link packEnvelope}.
 *
 * Fails with `MALFORMED_ENVELOPE` for unparseable JSON, missing or non-string
 * fields, values that are not canonical base64, wrong salt or nonce sizes,
 * a ciphertext too short to hold the tag, or an unsupported version.
 */
export function unpackEnvelope(raw: string | Buffer): EnvelopeResult {
  let json: unknown
  try {
    json = JSON.parse(typeof raw === 'string' ? raw : raw.toString('utf8'))
  } catch (err) {
    return malformed(`Envelope is not valid JSON: ${errorMessage(err)}`)
  }

  const parsed = VaultEnvelopeSchema.safeParse(json)
  if (!parsed.success) {
    return malformed(`Envelope structure is invalid: ${describeIssues(parsed.error)}`)
  }

  const envelope = parsed.data
  if (envelope.version !== undefined && envelope.version !== ENVELOPE_VERSION) {
    return malformed(`Unsupported envelope version ${envelope.version}`)
  }

  const salt = Buffer.from(envelope.salt, 'base64')
  const nonce = Buffer.from(envelope.nonce, 'base64')
  const ciphertext = Buffer.from(envelope.ciphertext, 'base64')

  // Buffer.from ignores non-zero padding bits; re-encoding exposes them.
  const decoded = { salt, nonce, ciphertext }
  for (const field of ENVELOPE_FIELDS) {
    if (decoded[field].toString('base64') !== envelope[field]) {
      return malformed(`Envelope ${field} is not canonical base64`)
    }
  }

  if (salt.length !== SALT_LENGTH) {
    return malformed(`Envelope salt must be ${SALT_LENGTH} bytes, got ${salt.length}`)
  }
  if (nonce.length !== NONCE_LENGTH) {
    return malformed(`Envelope nonce must be ${NONCE_LENGTH} bytes, got ${nonce.length}`)
  }
  if (ciphertext.length < AUTH_TAG_LENGTH) {
    return malformed(
      `Envelope ciphertext must be at least ${AUTH_TAG_LENGTH} bytes, got ${ciphertext.length}`
    )
  }

  return { success: true, data: { salt, nonce, ciphertext } }
}
