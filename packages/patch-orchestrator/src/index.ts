/**
 * @gridwarden/patch-orchestrator — Public API
 */

export * from './types'
export {
  PATCH_TRANSITIONS,
  TERMINAL_STATES,
  advance,
  assertTransition,
  canTransition,
  isTerminal,
} from './state-machine'
export {
  SIGNATURE_SCHEME,
  canonicalMessage,
  generateSigningKeyPair,
  sha256Hex,
  signPatchPayload,
  verifySignedPayload,
} from './signature'
export type { PatchTarget, SigningKeyPair, VerificationResult } from './signature'
export { SimulatedFirmwareApplier } from './firmware-applier'
export type { FirmwareApplier, FirmwareApplyRequest, SimulatedApplierOptions } from './firmware-applier'
export { PatchOrchestrator } from './patch-orchestrator'
export type { IntegrityEventSink, PatchOrchestratorDeps } from './patch-orchestrator'
