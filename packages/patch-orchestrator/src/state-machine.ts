/**
 * @gridwarden/patch-orchestrator — Rollout State Machine
 *
 *   pending   → verifying
 *   verifying → applying | rejected
 *   applying  → succeeded | failed
 *
 * succeeded, rejected and failed are terminal. Every transition is checked
 * against this table; nothing else may move a rollout.
 */

import { InvalidTransitionError } from '@gridwarden/errors'
import type { PatchState, PatchStatus } from '@gridwarden/types'

export const PATCH_TRANSITIONS: Readonly<Record<PatchState, readonly PatchState[]>> = {
  pending:   ['verifying'],
  verifying: ['applying', 'rejected'],
  applying:  ['succeeded', 'failed'],
  succeeded: [],
  rejected:  [],
  failed:    [],
}

export const TERMINAL_STATES: readonly PatchState[] = ['succeeded', 'rejected', 'failed']

export function isTerminal(state: PatchState): boolean {
  return TERMINAL_STATES.includes(state)
}

export function canTransition(from: PatchState, to: PatchState): boolean {
  return PATCH_TRANSITIONS[from].includes(to)
}

export function assertTransition(patch: PatchStatus, to: PatchState): void {
  if (!canTransition(patch.status, to)) {
    throw new InvalidTransitionError(patch.patch_id, patch.status, to)
  }
}

/** Returns the rollout moved to `to`, with the step appended to its history. */
export function advance(patch: PatchStatus, to: PatchState, reason?: string, at: Date = new Date()): PatchStatus {
  assertTransition(patch, to)
  const stamp = at.toISOString()
  return {
    ...patch,
    status:     to,
    notes:      reason ? [patch.notes, reason].filter(Boolean).join('\n') : patch.notes,
    history:    [...patch.history, { from: patch.status, to, at: stamp, ...(reason ? { reason } : {}) }],
    updated_at: stamp,
  }
}
