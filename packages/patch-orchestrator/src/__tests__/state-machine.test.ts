import { describe, expect, it } from '@jest/globals'
import { InvalidTransitionError } from '@gridwarden/errors'
import type { PatchState, PatchStatus } from '@gridwarden/types'
import { PATCH_TRANSITIONS, advance, canTransition, isTerminal } from '../state-machine'

const STATES: PatchState[] = ['pending', 'verifying', 'applying', 'succeeded', 'rejected', 'failed']

function patch(status: PatchState): PatchStatus {
  return {
    patch_id:       'p-1',
    component_id:   'c-1',
    component:      'inverter-01',
    target_version: '2.0.0',
    status,
    requested_by:   'ops-1',
    notes:          'Checksum abc',
    checksum:       'abc',
    history:        [{ from: null, to: 'pending', at: '2026-01-01T00:00:00.000Z' }],
    created_at:     '2026-01-01T00:00:00.000Z',
    updated_at:     '2026-01-01T00:00:00.000Z',
  }
}

describe('rollout state machine', () => {
  it('allows exactly the table transitions', () => {
    const allowed = STATES.flatMap(from => STATES.filter(to => canTransition(from, to)).map(to => `${from}->${to}`))
    expect(allowed).toEqual([
      'pending->verifying',
      'verifying->applying',
      'verifying->rejected',
      'applying->succeeded',
      'applying->failed',
    ])
  })

  it('marks only succeeded, rejected and failed as terminal', () => {
    expect(STATES.filter(isTerminal)).toEqual(['succeeded', 'rejected', 'failed'])
    for (const state of STATES.filter(isTerminal)) expect(PATCH_TRANSITIONS[state]).toEqual([])
  })

  it('appends history and reason on advance', () => {
    const at = new Date('2026-01-02T00:00:00.000Z')
    const next = advance(patch('verifying'), 'rejected', 'bad signature', at)
    expect(next.status).toBe('rejected')
    expect(next.notes).toBe('Checksum abc\nbad signature')
    expect(next.updated_at).toBe('2026-01-02T00:00:00.000Z')
    expect(next.history[1]).toEqual({ from: 'verifying', to: 'rejected', at: '2026-01-02T00:00:00.000Z', reason: 'bad signature' })
  })

  it('throws InvalidTransitionError and leaves the rollout alone', () => {
    const original = patch('succeeded')
    expect(() => advance(original, 'applying')).toThrow(InvalidTransitionError)
    expect(() => advance(patch('pending'), 'applying')).toThrow('Rollout p-1 cannot move from pending to applying')
    expect(original.status).toBe('succeeded')
    expect(original.history).toHaveLength(1)
  })
})
