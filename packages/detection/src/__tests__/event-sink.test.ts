import { beforeEach, describe, expect, it } from '@jest/globals'
import { GridWardenEventBus, createPublisher } from '@gridwarden/event-bus'
import { MemorySecurityEventStore } from '@gridwarden/db-adapters'
import { PersistenceError, RecordNotFoundError, ValidationError } from '@gridwarden/errors'
import type { PlatformEvent, SecurityEvent } from '@gridwarden/types'
import { SecurityEventSink, coalesceFindings } from '../event-sink'
import type { Finding } from '../types'

function finding(overrides: Partial<Finding> = {}): Finding {
  return {
    detector:     'rules',
    component_id: 'c-1',
    component:    'inverter-01',
    reading_id:   'r-1',
    category:     'rule-violation',
    severity:     'warning',
    metric:       'voltage',
    value:        275,
    details:      'Voltage outside safe operating band on inverter-01: 275 outside [200, 260]',
    rule_id:      'voltage-bounds',
    ...overrides,
  }
}

describe('coalesceFindings', () => {
  it('groups by component and category and keeps the highest severity', () => {
    const groups = coalesceFindings([
      finding(),
      finding({ rule_id: 'status-offline', metric: 'status', severity: 'critical' }),
      finding({ detector: 'deviation', category: 'deviation' }),
      finding({ component: 'battery-01', component_id: 'c-2' }),
    ])
    expect(groups.map(g => [g.component, g.category, g.severity, g.findings.length])).toEqual([
      ['inverter-01', 'rule-violation', 'critical', 2],
      ['inverter-01', 'deviation', 'warning', 1],
      ['battery-01', 'rule-violation', 'warning', 1],
    ])
  })
})

describe('SecurityEventSink', () => {
  let store: MemorySecurityEventStore
  let bus: GridWardenEventBus
  let sink: SecurityEventSink
  let published: PlatformEvent[]

  beforeEach(() => {
    store = new MemorySecurityEventStore()
    bus = new GridWardenEventBus()
    sink = new SecurityEventSink(store, createPublisher(bus))
    published = []
    bus.subscribeAll('test', async (event) => { published.push(event) })
  })

  it('records a duplicate violation in one batch as a single event', async () => {
    const events = await sink.record([
      finding(),
      finding({ rule_id: 'status-offline', metric: 'status', value: 'offline', severity: 'critical', details: 'Device offline on inverter-01: status "offline"' }),
    ])

    expect(events).toHaveLength(1)
    expect(events[0]?.severity).toBe('critical')
    expect(events[0]?.details).toBe('Device offline on inverter-01: status "offline" (+1 more)')
    expect(events[0]?.context.component).toBe('inverter-01')
    expect(events[0]?.context.findings).toHaveLength(2)
    expect(await store.count()).toBe(1)
    expect(published.filter(e => e.type === 'security.event_recorded')).toHaveLength(1)
  })

  it('does not coalesce across batches', async () => {
    await sink.record([finding()])
    await sink.record([finding()])
    expect(await store.count()).toBe(2)
  })

  it('records nothing for an empty batch', async () => {
    expect(await sink.record([])).toEqual([])
    expect(await store.count()).toBe(0)
    expect(published).toEqual([])
  })

  it('records the mitigation of the most severe finding', async () => {
    const [event] = await sink.record([
      finding({ mitigation: 'Recalibrate sensor' }),
      finding({ severity: 'critical', mitigation: 'Isolate component' }),
    ])
    expect(event?.context.mitigation).toBe('Isolate component')
  })

  it('stamps actor and shared context', async () => {
    const [event] = await sink.record([finding()], { actor: 'ops-1', context: { synthetic: true } })
    expect(event?.actor).toBe('ops-1')
    expect(event?.context.synthetic).toBe(true)
  })

  it('propagates store failures as PersistenceError and publishes nothing', async () => {
    const failing = new MemorySecurityEventStore()
    failing.create = async () => { throw new Error('disk full') }
    const broken = new SecurityEventSink(failing, createPublisher(bus))

    await expect(broken.record([finding()])).rejects.toBeInstanceOf(PersistenceError)
    expect(published).toEqual([])
  })

  it('contains a failing bus subscriber', async () => {
    bus.subscribe('broken', ['security.event_recorded'], async () => { throw new Error('listener down') })

    const events = await sink.record([finding()])

    expect(events).toHaveLength(1)
    expect(await store.count()).toBe(1)
    await bus.drain()
    expect(bus.getStats().events_dropped).toBe(1)
  })

  it('records operator actions', async () => {
    const event = await sink.recordAction({
      category: 'manual-isolation',
      severity: 'info',
      details:  'Operator isolated inverter-01',
      actor:    'ops-1',
      context:  { component: 'inverter-01' },
    })
    expect(event.category).toBe('manual-isolation')
    expect((await sink.listEvents())[0]?.event_id).toBe(event.event_id)
    await expect(sink.recordAction({ category: 'x', severity: 'info', details: ' ', actor: null }))
      .rejects.toBeInstanceOf(ValidationError)
  })

  describe('annotate', () => {
    let event: SecurityEvent

    beforeEach(async () => {
      const created = await sink.record([finding()])
      const first = created[0]
      if (!first) throw new Error('expected an event')
      event = first
    })

    it('adds a note and moves updated_at only', async () => {
      const updated = await sink.annotate(event.event_id, 'ops-1', ' false alarm, sensor swap ')
      expect(updated.details).toBe(event.details)
      expect(updated.created_at).toBe(event.created_at)
      const notes = await sink.annotations(event.event_id)
      expect(notes).toHaveLength(1)
      expect(notes[0]?.note).toBe('false alarm, sensor swap')
      expect(updated.updated_at).toBe(notes[0]?.annotated_at)
      expect(published.some(e => e.type === 'security.event_annotated')).toBe(true)
    })

    it('rejects unknown events and empty notes', async () => {
      await expect(sink.annotate('missing', 'ops-1', 'note')).rejects.toBeInstanceOf(RecordNotFoundError)
      await expect(sink.annotate(event.event_id, 'ops-1', '')).rejects.toBeInstanceOf(ValidationError)
    })
  })

  it('filters and caps listings', async () => {
    await sink.record([finding()])
    await sink.record([finding({ severity: 'critical' })])
    await sink.record([finding({ category: 'deviation' })])

    expect((await sink.listEvents({ severity: 'critical' })).map(e => e.severity)).toEqual(['critical'])
    expect(await sink.listEvents({ category: 'deviation' })).toHaveLength(1)
    expect(await sink.listEvents({ limit: 1 })).toHaveLength(1)
    expect(await sink.listEvents({ limit: 1000 })).toHaveLength(3)
  })
})
