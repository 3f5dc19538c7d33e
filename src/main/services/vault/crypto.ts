/**
 * Key derivation and AES-256-GCM sealing for the vault engine.
 *
 * All operations use the Node.js built-in `crypto` module. Callers supply
 * the nonce; the vault store generates a fresh salt and nonce for every
 * encryption so a (key, nonce) pair is never reused.
 */

import { randomBytes, createCipheriv, createDecipheriv, pbkdf2 } from 'crypto'
import { promisify } from 'util'
import type { CipherResult } from './types'

const pbkdf2Async = promisify(pbkdf2)

const ALGORITHM = 'aes-256-gcm'
export const KEY_LENGTH = 32
export const NONCE_LENGTH = 12
export const SALT_LENGTH = 16
export const AUTH_TAG_LENGTH = 16
/** OWASP 2023 guidance for PBKDF2-HMAC-SHA256. */
export const KDF_ITERATIONS = 480_000
const KDF_DIGEST = 'sha256'

/** Returns 16 fresh random bytes for key derivation. */
export function generateSalt(): Buffer {
  return randomBytes(SALT_LENGTH)
}

/** Returns 12 fresh random bytes for a single GCM encryption. */
export function generateNonce(): Buffer {
  return randomBytes(NONCE_LENGTH)
}

/**
 * Derives a 32-byte key from the master password with PBKDF2-HMAC-SHA256.
 *
 * Deterministic for a given password and salt. An empty password is accepted
 * here; password policy is enforced by callers before a vault is created.
 *
 * @example
 * ```ts
 * const salt = generateSalt()
 * const key = await deriveKey('correct horse battery staple', salt)
 * // key.length === 32
 * ```
 */
export async function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return pbkdf2Async(Buffer.from(password, 'utf8'), salt, KDF_ITERATIONS, KEY_LENGTH, KDF_DIGEST)
}

/**
 * Encrypts `plaintext` and returns the ciphertext with the 16-byte tag appended.
 *
 * @throws If the key is not 32 bytes or the nonce is not 12 bytes.
 */
export function seal(key: Buffer, nonce: Buffer, plaintext: Buffer): Buffer {
  if (key.length !== KEY_LENGTH) {
    throw new Error(`Key must be ${KEY_LENGTH} bytes, got ${key.length}`)
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new Error(`Nonce must be ${NONCE_LENGTH} bytes, got ${nonce.length}`)
  }

  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH })
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()])
  return Buffer.concat([encrypted, cipher.getAuthTag()])
}

/**
 * Verifies and decrypts a sealed payload.
 *
 * Every failure (bad tag, truncated input, wrong key or nonce size) collapses
 * to `AUTHENTICATION_FAILED`. No plaintext is returned unless the tag verified.
 */
export function open(key: Buffer, nonce: Buffer, ciphertextWithTag: Buffer): CipherResult {
  if (
    key.length !== KEY_LENGTH ||
    nonce.length !== NONCE_LENGTH ||
    ciphertextWithTag.length < AUTH_TAG_LENGTH
  ) {
    return { success: false, error: 'AUTHENTICATION_FAILED' }
  }

  const encrypted = ciphertextWithTag.subarray(0, -AUTH_TAG_LENGTH)
  const authTag = ciphertextWithTag.subarray(-AUTH_TAG_LENGTH)

  try {
    const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH })
    decipher.setAuthTag(authTag)
    const head = decipher.update(encrypted)
    const tail = decipher.final()
    return { success: true, data: Buffer.concat([head, tail]) }
  } catch {
    return { success: false, error: 'AUTHENTICATION_FAILED' }
  }
}

/** Overwrites key or plaintext material once a flow is done with it. */
export function wipe(...buffers: Buffer[]): void {
  for (const buffer of buffers) {
    buffer.fill(0)
  }
}
