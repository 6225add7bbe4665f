import { beforeEach, describe, expect, it } from '@jest/globals'
import {
  DuplicateComponentError,
  RecordNotFoundError,
  ReferentialIntegrityError,
} from '@gridwarden/errors'
import type { GridComponent, PatchStatus, SecurityEvent } from '@gridwarden/types'
import { MemoryAuditLedgerStore, createMemoryStores, type GridStores } from '../index'

const AT = '2026-02-01T00:00:00.000Z'

function component(id: string, name: string): GridComponent {
  return {
    component_id:     id,
    name,
    category:         'inverter',
    firmware_version: '1.0.0',
    network_address:  '10.0.0.1',
    criticality:      'medium',
    created_at:       AT,
    updated_at:       AT,
  }
}

function patch(patch_id: string, component_id: string, target_version: string): PatchStatus {
  return {
    patch_id,
    component_id,
    component:    'inverter-01',
    target_version,
    status:       'pending',
    requested_by: 'ops-1',
    notes:        null,
    checksum:     'abc',
    history:      [{ from: null, to: 'pending', at: AT }],
    created_at:   AT,
    updated_at:   AT,
  }
}

describe('memory stores', () => {
  let stores: GridStores

  beforeEach(async () => {
    stores = createMemoryStores()
    await stores.components.create(component('c-1', 'inverter-01'))
  })

  it('keeps component names unique', async () => {
    await expect(stores.components.create(component('c-2', 'inverter-01'))).rejects.toBeInstanceOf(DuplicateComponentError)
  })

  it('assigns arrival order and refuses orphan readings', async () => {
    const base = { component_id: 'c-1', component: 'inverter-01', severity: 'normal' as const, created_at: AT }
    const first = await stores.telemetry.append({ ...base, reading_id: 'r-1', payload: { voltage: 230 } })
    const second = await stores.telemetry.append({ ...base, reading_id: 'r-2', payload: { voltage: 231 } })
    expect([first.sequence, second.sequence]).toEqual([0, 1])
    expect((await stores.telemetry.latest(1)).map(r => r.reading_id)).toEqual(['r-2'])

    await expect(stores.telemetry.append({ ...base, component_id: 'ghost', reading_id: 'r-3', payload: {} }))
      .rejects.toBeInstanceOf(ReferentialIntegrityError)
  })

  it('hands out copies, so callers cannot edit stored readings', async () => {
    const stored = await stores.telemetry.append({
      reading_id: 'r-1', component_id: 'c-1', component: 'inverter-01', payload: { voltage: 230 }, severity: 'normal', created_at: AT,
    })
    stored.payload.voltage = 999
    expect((await stores.telemetry.findById('r-1'))?.payload.voltage).toBe(230)
  })

  it('lists rollouts newest first and cascades on delete', async () => {
    await stores.patches.create(patch('p-1', 'c-1', '1.1.0'))
    await stores.patches.create(patch('p-2', 'c-1', '1.2.0'))
    await stores.telemetry.append({
      reading_id: 'r-1', component_id: 'c-1', component: 'inverter-01', payload: {}, severity: 'normal', created_at: AT,
    })

    expect((await stores.patches.latestForComponent('c-1'))?.patch_id).toBe('p-2')
    expect(await stores.components.delete('c-1')).toEqual({ readings_removed: 1, rollouts_removed: 2 })
    expect(await stores.patches.count()).toBe(0)
    await expect(stores.patches.create(patch('p-3', 'c-1', '1.3.0'))).rejects.toBeInstanceOf(ReferentialIntegrityError)
  })

  it('annotates events without touching their recorded facts', async () => {
    const event: SecurityEvent = {
      event_id:   'e-1',
      severity:   'warning',
      category:   'deviation',
      details:    'voltage drift',
      actor:      null,
      context:    { component: 'inverter-01' },
      created_at: AT,
      updated_at: AT,
    }
    await stores.events.create(event)
    const annotated = await stores.events.annotate({
      event_id: 'e-1', actor: 'ops-1', note: 'field crew notified', annotated_at: '2026-02-02T00:00:00.000Z',
    })

    expect(annotated).toEqual({ ...event, updated_at: '2026-02-02T00:00:00.000Z' })
    expect(await stores.events.annotationsFor('e-1')).toHaveLength(1)
    await expect(stores.events.annotate({ event_id: 'nope', actor: 'a', note: 'n', annotated_at: AT }))
      .rejects.toBeInstanceOf(RecordNotFoundError)
  })

  it('filters events and caps the page at 200', async () => {
    for (let i = 0; i < 205; i++) {
      await stores.events.create({
        event_id: `e-${i}`, severity: i % 2 === 0 ? 'critical' : 'info', category: 'rule-violation',
        details: 'x', actor: null, context: {}, created_at: AT, updated_at: AT,
      })
    }
    expect(await stores.events.list({ limit: 500 })).toHaveLength(200)
    const critical = await stores.events.list({ severity: 'critical', limit: 2 })
    expect(critical.map(e => e.event_id)).toEqual(['e-204', 'e-202'])
  })
})

describe('MemoryAuditLedgerStore', () => {
  it('refuses gaps in the block index', async () => {
    const ledger = new MemoryAuditLedgerStore()
    const entry = {
      block_index: 0, entry_id: 'x', event_type: 'component.registered', source: 's',
      correlation_id: 'c', timestamp: AT, payload_hash: 'p', prev_hash: '0', block_hash: 'b',
    }
    await ledger.append(entry)
    await expect(ledger.append({ ...entry, block_index: 2 })).rejects.toThrow('Ledger gap: expected block 1, got 2')
    expect((await ledger.last())?.block_index).toBe(0)
  })
})
