import { describe, it, expect } from 'vitest'
import { randomBytes } from 'crypto'
import {
  deriveKey,
  generateNonce,
  generateSalt,
  open,
  seal,
  wipe,
  KDF_ITERATIONS
} from '../../../src/main/services/vault/crypto'

describe('Vault crypto', () => {
  describe('generateSalt / generateNonce', () => {
    it('should produce 16-byte salts and 12-byte nonces', () => {
      expect(generateSalt()).toHaveLength(16)
      expect(generateNonce()).toHaveLength(12)
    })

    it('should produce unique values on each call', () => {
      expect(generateSalt().equals(generateSalt())).toBe(false)
      expect(generateNonce().equals(generateNonce())).toBe(false)
    })
  })

  describe('deriveKey', () => {
    it('should use 480,000 iterations', () => {
      expect(KDF_ITERATIONS).toBe(480_000)
    })

    it('should derive the same 32-byte key for the same password and salt', async () => {
      const salt = Buffer.alloc(16, 7)

      const first = await deriveKey('correct horse battery staple', salt)
      const second = await deriveKey('correct horse battery staple', salt)

      expect(first).toHaveLength(32)
      expect(first.equals(second)).toBe(true)
    })

    it('should derive different keys for different salts', async () => {
      const a = await deriveKey('same-password', Buffer.alloc(16, 1))
      const b = await deriveKey('same-password', Buffer.alloc(16, 2))

      expect(a.equals(b)).toBe(false)
    })

    it('should accept an empty password', async () => {
      const key = await deriveKey('', Buffer.alloc(16))
      expect(key).toHaveLength(32)
    })
  })

  describe('seal / open roundtrip', () => {
    it('should decrypt to the original plaintext', () => {
      const key = randomBytes(32)
      const nonce = generateNonce()
      const plaintext = Buffer.from('{"entries":[]}', 'utf8')

      const sealed = seal(key, nonce, plaintext)
      const opened = open(key, nonce, sealed)

      expect(opened).toEqual({ success: true, data: plaintext })
    })

    it('should append a 16-byte tag', () => {
      const sealed = seal(randomBytes(32), generateNonce(), Buffer.from('abc'))
      expect(sealed).toHaveLength(3 + 16)
    })

    it('should handle an empty payload', () => {
      const key = randomBytes(32)
      const nonce = generateNonce()

      const opened = open(key, nonce, seal(key, nonce, Buffer.alloc(0)))

      expect(opened).toEqual({ success: true, data: Buffer.alloc(0) })
    })

    it('should handle unicode content', () => {
      const key = randomBytes(32)
      const nonce = generateNonce()
      const plaintext = Buffer.from('🔑 Ключ доступа 密码', 'utf8')

      const opened = open(key, nonce, seal(key, nonce, plaintext))

      expect(opened.success && opened.data.toString('utf8')).toBe('🔑 Ключ доступа 密码')
    })
  })

  describe('open fails closed', () => {
    const key = randomBytes(32)
    const nonce = generateNonce()
    const sealed = seal(key, nonce, Buffer.from('secret-value'))
    const failure = { success: false, error: 'AUTHENTICATION_FAILED' }

    it('should reject a different key', () => {
      expect(open(randomBytes(32), nonce, sealed)).toEqual(failure)
    })

    it('should reject a different nonce', () => {
      expect(open(key, generateNonce(), sealed)).toEqual(failure)
    })

    it('should reject a modified ciphertext byte', () => {
      const tampered = Buffer.from(sealed)
      tampered[0] = (tampered[0] ?? 0) ^ 0xff
      expect(open(key, nonce, tampered)).toEqual(failure)
    })

    it('should reject a modified tag byte', () => {
      const tampered = Buffer.from(sealed)
      const last = tampered.length - 1
      tampered[last] = (tampered[last] ?? 0) ^ 0x01
      expect(open(key, nonce, tampered)).toEqual(failure)
    })

    it('should reject input shorter than the tag', () => {
      expect(open(key, nonce, Buffer.alloc(15))).toEqual(failure)
    })

    it('should reject keys and nonces of the wrong size', () => {
      expect(open(Buffer.alloc(16), nonce, sealed)).toEqual(failure)
      expect(open(key, Buffer.alloc(8), sealed)).toEqual(failure)
    })
  })

  describe('seal argument validation', () => {
    it('should reject a key that is not 32 bytes', () => {
      expect(() => seal(Buffer.alloc(16), generateNonce(), Buffer.from('x'))).toThrow(
        'Key must be 32 bytes, got 16'
      )
    })

    it('should reject a nonce that is not 12 bytes', () => {
      expect(() => seal(randomBytes(32), Buffer.alloc(16), Buffer.from('x'))).toThrow(
        'Nonce must be 12 bytes, got 16'
      )
    })
  })

  describe('wipe', () => {
    it('should zero every buffer it is given', () => {
      const a = Buffer.from('key material')
      const b = Buffer.from('plaintext')

      wipe(a, b)

      expect(a.every((byte) => byte === 0)).toBe(true)
      expect(b.every((byte) => byte === 0)).toBe(true)
    })
  })
})
