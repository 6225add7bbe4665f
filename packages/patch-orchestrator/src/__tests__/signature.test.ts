import { describe, expect, it } from '@jest/globals'
import {
  canonicalMessage,
  generateSigningKeyPair,
  sha256Hex,
  signPatchPayload,
  verifySignedPayload,
} from '../signature'

const vendor = generateSigningKeyPair()
const stranger = generateSigningKeyPair()
const keyring = { 'vendor-1': vendor.publicKey }
const target = { component: 'inverter-01', target_version: '2.0.0' }
const image = Buffer.from('firmware image 2.0.0')

function reasonOf(result: ReturnType<typeof verifySignedPayload>): string | null {
  return result.valid ? null : String(result.error.metadata.reason)
}

describe('patch signatures', () => {
  it('builds the canonical message', () => {
    expect(canonicalMessage(target, 'abc123')).toBe('gridwarden-patch/v1\ninverter-01\n2.0.0\nabc123')
  })

  it('accepts a payload signed for this component and version', () => {
    const result = verifySignedPayload(signPatchPayload(image, target, vendor.privateKey, 'vendor-1'), target, keyring)
    expect(result.valid).toBe(true)
    expect(result.checksum).toBe(sha256Hex(image))
    if (result.valid) expect(result.payload.equals(image)).toBe(true)
  })

  it('rejects a signature made for another version', () => {
    const signed = signPatchPayload(image, { ...target, target_version: '1.9.9' }, vendor.privateKey, 'vendor-1')
    expect(reasonOf(verifySignedPayload(signed, target, keyring))).toBe('signature does not match payload and target')
  })

  it('rejects a tampered image', () => {
    const signed = signPatchPayload(image, target, vendor.privateKey, 'vendor-1')
    const tampered = { ...signed, payload: Buffer.from('firmware image 2.0.1').toString('base64') }
    expect(reasonOf(verifySignedPayload(tampered, target, keyring))).toBe('signature does not match payload and target')
  })

  it('rejects a signature from an untrusted key', () => {
    const signed = signPatchPayload(image, target, stranger.privateKey, 'vendor-1')
    expect(verifySignedPayload(signed, target, keyring).valid).toBe(false)
    const unknown = signPatchPayload(image, target, stranger.privateKey, 'stranger')
    expect(reasonOf(verifySignedPayload(unknown, target, keyring))).toBe('unknown signing key "stranger"')
  })

  it('treats malformed envelopes as invalid signatures', () => {
    const signed = signPatchPayload(image, target, vendor.privateKey, 'vendor-1')
    expect(reasonOf(verifySignedPayload('not-an-object', target, keyring))).toBe('malformed signed payload envelope')
    expect(reasonOf(verifySignedPayload({ ...signed, payload: '' }, target, keyring))).toBe('payload is empty')
    expect(reasonOf(verifySignedPayload({ ...signed, payload: '%%%' }, target, keyring))).toBe('payload is not valid base64')
    expect(reasonOf(verifySignedPayload({ ...signed, signature: 'AAAA' }, target, keyring))).toBe('signature must be 64 bytes, got 3')
  })

  it('rejects a keyring entry that is not an Ed25519 key', () => {
    const signed = signPatchPayload(image, target, vendor.privateKey, 'broken')
    expect(reasonOf(verifySignedPayload(signed, target, { broken: 'not a pem' })))
      .toBe('trusted key "broken" is not an Ed25519 public key')
  })
})
