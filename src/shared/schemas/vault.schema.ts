import { z } from 'zod'

export const MIN_MASTER_PASSWORD_LENGTH = 8

/** Unknown keys pass through encode and decode unchanged. */
export const VaultEntrySchema = z
  .object({
    id: z.string().optional(),
    service: z.string(),
    username: z.string(),
    password: z.string(),
    url: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
    category: z.string(),
    created_at: z.string().optional(),
    updated_at: z.string().optional()
  })
  .passthrough()

export type VaultEntry = z.infer<typeof VaultEntrySchema>

export const RecordCollectionSchema = z
  .object({
    entries: z.array(VaultEntrySchema),
    categories: z.array(z.string()).optional(),
    settings: z.record(z.string(), z.unknown()).nullable().optional()
  })
  .passthrough()

export type RecordCollection = z.infer<typeof RecordCollectionSchema>

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

const base64Field = z.string().regex(BASE64_PATTERN, 'must be base64')

export const VaultEnvelopeSchema = z.object({
  version: z.number().int().optional(),
  salt: base64Field,
  nonce: base64Field,
  ciphertext: base64Field
})

export type VaultEnvelopeJson = z.infer<typeof VaultEnvelopeSchema>

export const MasterPasswordSchema = z
  .string()
  .min(1, 'Master password is required')
  .min(
    MIN_MASTER_PASSWORD_LENGTH,
    `Master password must be at least ${MIN_MASTER_PASSWORD_LENGTH} characters`
  )

export function emptyRecordCollection(): RecordCollection {
  return { entries: [] }
}
