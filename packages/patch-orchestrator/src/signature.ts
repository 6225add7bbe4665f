/**
 * @gridwarden/patch-orchestrator — Patch Signatures
 *
 * Ed25519 over a canonical message binding the image to its destination:
 *
 *   gridwarden-patch/v1\n<component>\n<target_version>\n<sha256(payload) hex>
 *
 * A valid signature for one component or version is worthless for another.
 */

import { createHash, createPublicKey, generateKeyPairSync, sign, verify, type KeyObject } from 'crypto'
import { z } from 'zod'
import { SignatureInvalidError } from '@gridwarden/errors'
import type { SignedPayload, TrustedKeyring } from './types'

export const SIGNATURE_SCHEME = 'gridwarden-patch/v1'
const ED25519_SIGNATURE_BYTES = 64
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

const SignedPayloadSchema = z.object({
  key_id:    z.string().min(1),
  payload:   z.string(),
  signature: z.string(),
})

export interface PatchTarget {
  component: string
  target_version: string
}

export type VerificationResult =
  | { valid: true; checksum: string; payload: Buffer; key_id: string }
  | { valid: false; checksum: string; error: SignatureInvalidError }

export function sha256Hex(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex')
}

export function canonicalMessage(target: PatchTarget, checksum: string): string {
  return [SIGNATURE_SCHEME, target.component, target.target_version, checksum].join('\n')
}

function decodeBase64(value: string): Buffer | null {
  const compact = value.replace(/\s+/g, '')
  if (!BASE64.test(compact)) return null
  return Buffer.from(compact, 'base64')
}

function loadEd25519Key(pem: string): KeyObject | null {
  try {
    const key = createPublicKey(pem)
    return key.asymmetricKeyType === 'ed25519' ? key : null
  } catch (err) {
    console.warn('[patch-orchestrator] Trusted key failed to parse:', err instanceof Error ? err.message : err)
    return null
  }
}

/**
 * Checks a signed payload for a rollout target. Never throws: a malformed
 * envelope is just another kind of invalid signature.
 */
export function verifySignedPayload(
  raw: unknown,
  target: PatchTarget,
  keyring: TrustedKeyring
): VerificationResult {
  const parsed = SignedPayloadSchema.safeParse(raw)
  if (!parsed.success) {
    return invalid('malformed signed payload envelope', target, sha256Hex(''))
  }
  const { key_id, payload, signature } = parsed.data

  const image = decodeBase64(payload)
  if (!image) return invalid('payload is not valid base64', target, sha256Hex(payload), key_id)
  const checksum = sha256Hex(image)
  if (image.length === 0) return invalid('payload is empty', target, checksum, key_id)

  const sig = decodeBase64(signature)
  if (!sig) return invalid('signature is not valid base64', target, checksum, key_id)
  if (sig.length !== ED25519_SIGNATURE_BYTES) {
    return invalid(`signature must be ${ED25519_SIGNATURE_BYTES} bytes, got ${sig.length}`, target, checksum, key_id)
  }

  const pem = Object.prototype.hasOwnProperty.call(keyring, key_id) ? keyring[key_id] : undefined
  if (!pem) return invalid(`unknown signing key "${key_id}"`, target, checksum, key_id)
  const key = loadEd25519Key(pem)
  if (!key) return invalid(`trusted key "${key_id}" is not an Ed25519 public key`, target, checksum, key_id)

  const message = Buffer.from(canonicalMessage(target, checksum), 'utf8')
  if (!verify(null, message, key, sig)) {
    return invalid('signature does not match payload and target', target, checksum, key_id)
  }

  return { valid: true, checksum, payload: image, key_id }
}

function invalid(reason: string, target: PatchTarget, checksum: string, key_id?: string): VerificationResult {
  return {
    valid: false,
    checksum,
    error: new SignatureInvalidError(reason, { ...target, ...(key_id ? { key_id } : {}) }),
  }
}

// ─── Vendor side ──────────────────────────────────────────────────────────────

export interface SigningKeyPair {
  publicKey: string    // PEM (SPKI)
  privateKey: string   // PEM (PKCS#8)
}

export function generateSigningKeyPair(): SigningKeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519')
  return {
    publicKey:  publicKey.export({ type: 'spki', format: 'pem' }).toString(),
    privateKey: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
  }
}

export function signPatchPayload(
  image: Buffer,
  target: PatchTarget,
  privateKeyPem: string,
  key_id: string
): SignedPayload {
  const message = Buffer.from(canonicalMessage(target, sha256Hex(image)), 'utf8')
  return {
    key_id,
    payload:   image.toString('base64'),
    signature: sign(null, message, privateKeyPem).toString('base64'),
  }
}
