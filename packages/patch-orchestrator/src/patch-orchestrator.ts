/**
 * @gridwarden/patch-orchestrator — Patch Orchestrator
 *
 * Drives one firmware rollout per component through the state machine:
 *
 *   requestRollout()  pending → verifying → applying | rejected
 *   applyRollout()    applying → succeeded | failed
 *   rollout()         both, back to back
 *
 * Check-and-create runs under `rollout:<component_id>`, so two requests for
 * the same component can never both start. The registry takes the same key
 * to decommission, and calls forget() to drop any staged image. Every
 * transition is saved, then announced on the bus, exactly once.
 *
 * A bad signature is not an error to the caller: the rollout ends `rejected`
 * and a critical patch-integrity event is recorded. The component's firmware
 * version only ever changes on `applying → succeeded`.
 */

import AsyncLock from 'async-lock'
import { v4 as uuidv4 } from 'uuid'
import {
  ComponentNotFoundError,
  PersistenceError,
  RecordNotFoundError,
  RolloutInProgressError,
  ValidationError,
} from '@gridwarden/errors'
import type { Publisher } from '@gridwarden/event-bus'
import type {
  ComponentStore,
  EventCategory,
  EventSeverity,
  GridComponent,
  PatchState,
  PatchStatus,
  PatchStore,
  SecurityEvent,
  SecurityEventContext,
} from '@gridwarden/types'
import type { FirmwareApplier } from './firmware-applier'
import { verifySignedPayload } from './signature'
import { advance, assertTransition, isTerminal } from './state-machine'
import type { RolloutReceipt, RolloutRequest, TrustedKeyring } from './types'

// ─── Collaborators ────────────────────────────────────────────────────────────

/** Where rejected rollouts are reported. The detection sink fits. */
export interface IntegrityEventSink {
  recordAction(input: {
    category: EventCategory
    severity: EventSeverity
    details: string
    actor: string | null
    context?: SecurityEventContext
    correlation_id?: string
  }): Promise<SecurityEvent>
}

export interface PatchOrchestratorDeps {
  components: ComponentStore
  patches: PatchStore
  publisher: Publisher
  sink: IntegrityEventSink
  keyring: TrustedKeyring
  applier: FirmwareApplier
  lock?: AsyncLock
}

interface VerifiedImage {
  component_id: string
  payload: Buffer
  correlation_id: string
}

// ─── Orchestrator ─────────────────────────────────────────────────────────────

export class PatchOrchestrator {
  private components: ComponentStore
  private patches: PatchStore
  private publisher: Publisher
  private sink: IntegrityEventSink
  private keyring: TrustedKeyring
  private applier: FirmwareApplier
  private lock: AsyncLock

  // Verified images waiting for applyRollout(), by patch_id
  private staged = new Map<string, VerifiedImage>()

  constructor(deps: PatchOrchestratorDeps) {
    this.components = deps.components
    this.patches    = deps.patches
    this.publisher  = deps.publisher
    this.sink       = deps.sink
    this.keyring    = deps.keyring
    this.applier    = deps.applier
    this.lock       = deps.lock ?? new AsyncLock()
  }

  async requestRollout(request: RolloutRequest): Promise<RolloutReceipt> {
    const issues: string[] = []
    if (!request.target_version.trim()) issues.push('target_version must not be empty')
    if (!request.requested_by.trim()) issues.push('requested_by must not be empty')
    if (issues.length > 0) throw new ValidationError('rollout request', issues)

    const component = await this.requireComponent(request.component)
    const correlation_id = request.correlation_id ?? uuidv4()

    return this.lock.acquire<RolloutReceipt>(`rollout:${component.component_id}`, async () => {
      if (!(await this.components.findById(component.component_id))) {
        throw new ComponentNotFoundError(component.name)
      }

      const active = await this.patches.latestForComponent(component.component_id)
      if (active && !isTerminal(active.status)) {
        throw new RolloutInProgressError(component.name, active.patch_id, active.status)
      }

      const target = { component: component.name, target_version: request.target_version }
      const verdict = verifySignedPayload(request.signed_payload, target, this.keyring)

      const now = new Date().toISOString()
      let patch: PatchStatus = {
        patch_id:       uuidv4(),
        component_id:   component.component_id,
        component:      component.name,
        target_version: request.target_version,
        status:         'pending',
        requested_by:   request.requested_by,
        notes:          [request.notes?.trim(), `Checksum ${verdict.checksum}`].filter(Boolean).join('\n'),
        checksum:       verdict.checksum,
        history:        [{ from: null, to: 'pending', at: now }],
        created_at:     now,
        updated_at:     now,
      }

      try {
        await this.patches.create(patch)
      } catch (err) {
        throw new PersistenceError('patch_status.create', err)
      }
      this.announce(patch, null, correlation_id)

      patch = await this.move(patch, 'verifying', undefined, correlation_id)

      if (!verdict.valid) {
        const reason = verdict.error.message
        patch = await this.move(patch, 'rejected', reason, correlation_id)
        console.warn(`[patch-orchestrator] Rejected ${target.target_version} for ${component.name}: ${reason}`)

        await this.sink.recordAction({
          category: 'patch-integrity',
          severity: 'critical',
          details:  `Rejected firmware ${request.target_version} for ${component.name}: ${reason}`,
          actor:    request.requested_by,
          context:  {
            component:        component.name,
            patch_id:         patch.patch_id,
            target_version:   request.target_version,
            checksum:         verdict.checksum,
            firmware_version: component.firmware_version,
            error_code:       verdict.error.code,
            ...verdict.error.metadata,
            mitigation:       `Rollout blocked; ${component.name} stays on ${component.firmware_version}`,
          },
          correlation_id,
        })
        return { patch_id: patch.patch_id, status: patch.status, reason }
      }

      patch = await this.move(patch, 'applying', `Signature verified with key ${verdict.key_id}`, correlation_id)
      this.staged.set(patch.patch_id, { component_id: component.component_id, payload: verdict.payload, correlation_id })
      return { patch_id: patch.patch_id, status: patch.status }
    })
  }

  /** Installs a verified rollout: applying → succeeded | failed. */
  async applyRollout(patch_id: string): Promise<PatchStatus> {
    const found = await this.patches.findById(patch_id)
    if (!found) throw new RecordNotFoundError('patch_status', patch_id)

    return this.lock.acquire<PatchStatus>(`rollout:${found.component_id}`, async () => {
      const patch = await this.patches.findById(patch_id)
      if (!patch) throw new RecordNotFoundError('patch_status', patch_id)
      assertTransition(patch, 'succeeded')

      const component = await this.components.findById(patch.component_id)
      if (!component) throw new ComponentNotFoundError(patch.component)

      const staged = this.staged.get(patch_id)
      this.staged.delete(patch_id)
      const correlation_id = staged?.correlation_id ?? uuidv4()

      const failure = staged
        ? await this.install(component, patch, staged.payload)
        : 'verified image is no longer staged; request the rollout again'

      if (failure) {
        console.warn(`[patch-orchestrator] Rollout ${patch_id} failed on ${component.name}: ${failure}`)
        return this.move(patch, 'failed', failure, correlation_id)
      }

      let updated: GridComponent
      try {
        updated = await this.components.update(component.component_id, { firmware_version: patch.target_version })
      } catch (err) {
        throw new PersistenceError('component.update', err)
      }
      const done = await this.move(patch, 'succeeded', 'Patch applied successfully.', correlation_id)
      this.publisher.componentUpdated({
        component_id:   updated.component_id,
        component:      updated.name,
        field:          'firmware_version',
        previous_value: component.firmware_version,
        new_value:      updated.firmware_version,
      }, correlation_id)
      return done
    })
  }

  /** Request then, if verified, apply. Returns the final state. */
  async rollout(request: RolloutRequest): Promise<PatchStatus> {
    const receipt = await this.requestRollout(request)
    if (receipt.status === 'applying') return this.applyRollout(receipt.patch_id)
    return this.getRollout(receipt.patch_id)
  }

  async getRollout(patch_id: string): Promise<PatchStatus> {
    const patch = await this.patches.findById(patch_id)
    if (!patch) throw new RecordNotFoundError('patch_status', patch_id)
    return patch
  }

  /** Newest first. */
  async listRollouts(component: string): Promise<PatchStatus[]> {
    const found = await this.requireComponent(component)
    return this.patches.listForComponent(found.component_id)
  }

  /** Drops images staged for a component whose rollouts were cascaded away. */
  forget(component_id: string): void {
    for (const [patch_id, image] of this.staged) {
      if (image.component_id === component_id) this.staged.delete(patch_id)
    }
  }

  /** Number of verified images waiting for applyRollout(). */
  stagedCount(): number {
    return this.staged.size
  }

  // ─── Private ──────────────────────────────────────────────────────────────

  private async requireComponent(name: string): Promise<GridComponent> {
    const component = await this.components.findByName(name)
    if (!component) throw new ComponentNotFoundError(name)
    return component
  }

  /** Returns a failure reason, or null when the applier succeeded. */
  private async install(component: GridComponent, patch: PatchStatus, payload: Buffer): Promise<string | null> {
    try {
      await this.applier.apply({
        component,
        target_version: patch.target_version,
        payload,
        checksum:       patch.checksum,
      })
      return null
    } catch (err) {
      return err instanceof Error ? err.message : String(err)
    }
  }

  private async move(
    patch: PatchStatus,
    to: PatchState,
    reason: string | undefined,
    correlation_id: string
  ): Promise<PatchStatus> {
    const next = advance(patch, to, reason)
    try {
      await this.patches.save(next)
    } catch (err) {
      throw new PersistenceError('patch_status.save', err)
    }
    this.announce(next, patch.status, correlation_id, reason)
    return next
  }

  private announce(
    patch: PatchStatus,
    previous: PatchState | null,
    correlation_id: string,
    reason?: string
  ): void {
    this.publisher.patchStatusChanged({
      patch_id:        patch.patch_id,
      component:       patch.component,
      target_version:  patch.target_version,
      previous_status: previous,
      new_status:      patch.status,
      ...(reason ? { reason } : {}),
    }, correlation_id)
  }
}
