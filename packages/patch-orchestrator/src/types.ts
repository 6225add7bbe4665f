/**
 * @gridwarden/patch-orchestrator — Types
 */

import type { PatchState } from '@gridwarden/types'

/** What a vendor ships: the firmware image and a detached Ed25519 signature. */
export interface SignedPayload {
  key_id: string
  payload: string      // base64 firmware image
  signature: string    // base64, 64 bytes once decoded
}

/** key_id → Ed25519 public key (PEM, SPKI). */
export type TrustedKeyring = Readonly<Record<string, string>>

export interface RolloutRequest {
  component: string
  target_version: string
  /** Untrusted; validated before anything else looks at it. */
  signed_payload: unknown
  requested_by: string
  notes?: string
  correlation_id?: string
}

export interface RolloutReceipt {
  patch_id: string
  status: PatchState
  reason?: string
}
