import { beforeEach, describe, expect, it } from '@jest/globals'
import { createMemoryStores, type GridStores } from '@gridwarden/db-adapters'
import { GridWardenEventBus, createPublisher } from '@gridwarden/event-bus'
import {
  ComponentNotFoundError,
  InvalidTransitionError,
  RolloutInProgressError,
  ValidationError,
} from '@gridwarden/errors'
import type { PatchStatusChangedEvent, PlatformEvent, SecurityEvent } from '@gridwarden/types'
import { SimulatedFirmwareApplier, type FirmwareApplier } from '../firmware-applier'
import { PatchOrchestrator, type IntegrityEventSink } from '../patch-orchestrator'
import { generateSigningKeyPair, signPatchPayload } from '../signature'

const vendor = generateSigningKeyPair()
const image = Buffer.from('inverter firmware 2.0.0')

class RecordingSink implements IntegrityEventSink {
  events: SecurityEvent[] = []
  async recordAction(input: Parameters<IntegrityEventSink['recordAction']>[0]): Promise<SecurityEvent> {
    const now = new Date().toISOString()
    const event: SecurityEvent = {
      event_id:   `e-${this.events.length + 1}`,
      severity:   input.severity,
      category:   input.category,
      details:    input.details,
      actor:      input.actor,
      context:    input.context ?? {},
      created_at: now,
      updated_at: now,
    }
    this.events.push(event)
    return event
  }
}

describe('PatchOrchestrator', () => {
  let stores: GridStores
  let sink: RecordingSink
  let published: PlatformEvent[]

  function orchestrator(applier: FirmwareApplier = new SimulatedFirmwareApplier()): PatchOrchestrator {
    const bus = new GridWardenEventBus()
    bus.subscribeAll('test', async (event) => { published.push(event) })
    return new PatchOrchestrator({
      components: stores.components,
      patches:    stores.patches,
      publisher:  createPublisher(bus),
      sink,
      keyring:    { 'vendor-1': vendor.publicKey },
      applier,
    })
  }

  function signed(target_version = '2.0.0', component = 'inverter-01') {
    return signPatchPayload(image, { component, target_version }, vendor.privateKey, 'vendor-1')
  }

  function transitions(): string[] {
    return published
      .filter((e): e is PatchStatusChangedEvent => e.type === 'patch.status_changed')
      .map(e => `${e.previous_status ?? 'none'}->${e.new_status}`)
  }

  async function firmware(): Promise<string | undefined> {
    return (await stores.components.findByName('inverter-01'))?.firmware_version
  }

  beforeEach(async () => {
    stores = createMemoryStores()
    sink = new RecordingSink()
    published = []
    const now = new Date().toISOString()
    await stores.components.create({
      component_id:     'comp-1',
      name:             'inverter-01',
      category:         'inverter',
      firmware_version: '1.0.0',
      network_address:  '10.0.0.1',
      criticality:      'high',
      created_at:       now,
      updated_at:       now,
    })
  })

  it('takes a valid rollout to succeeded and updates firmware', async () => {
    const final = await orchestrator().rollout({
      component:      'inverter-01',
      target_version: '2.0.0',
      signed_payload: signed(),
      requested_by:   'ops-1',
    })

    expect(final.status).toBe('succeeded')
    expect(final.history.map(h => h.to)).toEqual(['pending', 'verifying', 'applying', 'succeeded'])
    expect(await firmware()).toBe('2.0.0')
    expect(transitions()).toEqual(['none->pending', 'pending->verifying', 'verifying->applying', 'applying->succeeded'])
    expect(published.some(e => e.type === 'component.updated')).toBe(true)
    expect(sink.events).toEqual([])
  })

  it('rejects a tampered signature and leaves firmware unchanged', async () => {
    const tampered = { ...signed(), payload: Buffer.from('evil firmware').toString('base64') }
    const receipt = await orchestrator().requestRollout({
      component:      'inverter-01',
      target_version: '2.0.0',
      signed_payload: tampered,
      requested_by:   'ops-1',
    })

    expect(receipt.status).toBe('rejected')
    expect(receipt.reason).toBe('Patch signature invalid: signature does not match payload and target')
    expect(transitions()).toEqual(['none->pending', 'pending->verifying', 'verifying->rejected'])
    expect(await firmware()).toBe('1.0.0')

    expect(sink.events).toHaveLength(1)
    expect(sink.events[0]).toMatchObject({ category: 'patch-integrity', severity: 'critical', actor: 'ops-1' })
    expect(sink.events[0]?.context.patch_id).toBe(receipt.patch_id)
  })

  it('rejects a malformed envelope the same way', async () => {
    const final = await orchestrator().rollout({
      component:      'inverter-01',
      target_version: '2.0.0',
      signed_payload: { key_id: 'vendor-1', payload: 'aGVsbG8=' },
      requested_by:   'ops-1',
    })
    expect(final.status).toBe('rejected')
    expect(await firmware()).toBe('1.0.0')
  })

  it('refuses a second request while the first is applying', async () => {
    const o = orchestrator()
    const first = await o.requestRollout({
      component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1',
    })
    expect(first.status).toBe('applying')

    await expect(o.requestRollout({
      component: 'inverter-01', target_version: '2.1.0', signed_payload: signed('2.1.0'), requested_by: 'ops-2',
    })).rejects.toBeInstanceOf(RolloutInProgressError)

    expect((await o.getRollout(first.patch_id)).status).toBe('applying')
    expect((await o.applyRollout(first.patch_id)).status).toBe('succeeded')
    expect(await stores.patches.count()).toBe(1)
  })

  it('lets exactly one of two concurrent requests through', async () => {
    const o = orchestrator()
    const results = await Promise.allSettled([
      o.requestRollout({ component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1' }),
      o.requestRollout({ component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-2' }),
    ])
    expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1)
    const rejected = results.find(r => r.status === 'rejected')
    expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(RolloutInProgressError)
  })

  it('allows a new rollout once the previous one is terminal', async () => {
    const o = orchestrator()
    await o.rollout({ component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1' })
    const second = await o.rollout({
      component: 'inverter-01', target_version: '2.1.0', signed_payload: signed('2.1.0'), requested_by: 'ops-1',
    })
    expect(second.status).toBe('succeeded')
    expect((await o.listRollouts('inverter-01')).map(p => p.target_version)).toEqual(['2.1.0', '2.0.0'])
  })

  it('ends failed when the applier faults', async () => {
    const final = await orchestrator(new SimulatedFirmwareApplier({ failure_rate: 1, random: () => 0.5 })).rollout({
      component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1',
    })
    expect(final.status).toBe('failed')
    expect(final.history.map(h => h.to)).toEqual(['pending', 'verifying', 'applying', 'failed'])
    expect(final.history[3]?.reason).toBe('Firmware 2.0.0 could not be applied to inverter-01: device did not confirm install; rolled back')
    expect(await firmware()).toBe('1.0.0')
  })

  it('fails a no-op update', async () => {
    const final = await orchestrator().rollout({
      component: 'inverter-01', target_version: '1.0.0', signed_payload: signed('1.0.0'), requested_by: 'ops-1',
    })
    expect(final.status).toBe('failed')
  })

  it('refuses to apply a rollout that is not applying', async () => {
    const o = orchestrator()
    const done = await o.rollout({ component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1' })
    const before = published.length

    await expect(o.applyRollout(done.patch_id)).rejects.toBeInstanceOf(InvalidTransitionError)
    expect((await o.getRollout(done.patch_id)).status).toBe('succeeded')
    expect(published).toHaveLength(before)
  })

  it('records the checksum in notes', async () => {
    const final = await orchestrator().rollout({
      component: 'inverter-01', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1', notes: 'Quarterly update',
    })
    expect(final.notes?.split('\n').slice(0, 2)).toEqual(['Quarterly update', `Checksum ${final.checksum}`])
  })

  it('validates the request', async () => {
    await expect(orchestrator().requestRollout({
      component: 'ghost', target_version: '2.0.0', signed_payload: signed(), requested_by: 'ops-1',
    })).rejects.toBeInstanceOf(ComponentNotFoundError)
    await expect(orchestrator().requestRollout({
      component: 'inverter-01', target_version: ' ', signed_payload: signed(), requested_by: 'ops-1',
    })).rejects.toBeInstanceOf(ValidationError)
    expect(await stores.patches.count()).toBe(0)
  })
})
