import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals'
import { ComponentNotFoundError } from '@gridwarden/errors'
import { generateSigningKeyPair, signPatchPayload } from '@gridwarden/patch-orchestrator'
import { bootstrapPlatform, getPlatform, shutdownPlatform } from '../bootstrap'
import { loadConfig, type GridWardenConfig } from '../config'
import { createPlatform, type GridWardenPlatform } from '../platform'
import { verifyAuditChain } from '../audit-subscriber'

const vendor = generateSigningKeyPair()

function config(): GridWardenConfig {
  const base = loadConfig({})
  return { ...base, patch: { ...base.patch, keyring: { 'vendor-1': vendor.publicKey } } }
}

describe('GridWardenPlatform', () => {
  let platform: GridWardenPlatform

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    platform = createPlatform({ config: config() })
    await platform.registry.register({
      name:             'inverter-01',
      category:         'inverter',
      firmware_version: '1.0.0',
      network_address:  '10.0.0.1',
      criticality:      'high',
    })
  })

  afterEach(() => {
    platform.shutdown()
    jest.restoreAllMocks()
  })

  it('turns an out-of-band reading into a summarised event', async () => {
    const result = await platform.ingestReading({
      component: 'inverter-01',
      payload:   { voltage: 300, frequency: 60, status: 'online' },
    })
    expect(result.event_ids).toHaveLength(1)

    const summary = await platform.getActivitySummary()
    expect(summary).toMatchObject({ components: 1, readings: 1, events: 1, rollouts: 0 })
    expect(summary.recent_events[0]).toMatchObject({ category: 'rule-violation', severity: 'warning' })

    const latest = await platform.latestTelemetry()
    expect(latest.map(r => r.severity)).toEqual(['warning'])
  })

  it('ledgers every platform event in an intact chain', async () => {
    await platform.ingestReading({ component: 'inverter-01', payload: { voltage: 300 } })
    await platform.bus.drain()

    const entries = await platform.stores.ledger.list()
    expect(entries.map(e => e.event_type)).toEqual([
      'component.registered',
      'security.event_recorded',
      'telemetry.reading_recorded',
    ])
    expect(verifyAuditChain(entries)).toEqual({ valid: true })
  })

  it('rolls out a signed patch end to end', async () => {
    const signed = signPatchPayload(Buffer.from('inverter firmware 2.0.0'), {
      component:      'inverter-01',
      target_version: '2.0.0',
    }, vendor.privateKey, 'vendor-1')

    const final = await platform.rollout({
      component:      'inverter-01',
      target_version: '2.0.0',
      signed_payload: signed,
      requested_by:   'ops-1',
    })
    expect(final.status).toBe('succeeded')
    expect((await platform.registry.get('inverter-01')).firmware_version).toBe('2.0.0')
  })

  it('never keeps a reading that races a decommission', async () => {
    const decommission = platform.registry.decommission('inverter-01')
    const outcomes = await Promise.all([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11].map(async (ticks) => {
      for (let i = 0; i < ticks; i++) await Promise.resolve()
      try {
        await platform.ingestReading({ component: 'inverter-01', payload: { voltage: 230 } })
        return 'stored'
      } catch (err) {
        expect(err).toBeInstanceOf(ComponentNotFoundError)
        return 'refused'
      }
    }))

    const removed = await decommission
    expect(removed.readings_removed).toBe(outcomes.filter(o => o === 'stored').length)
    expect(await platform.stores.telemetry.count()).toBe(0)
  })

  it('drops a staged firmware image when its component is decommissioned', async () => {
    const signed = signPatchPayload(Buffer.from('inverter firmware 2.0.0'), {
      component:      'inverter-01',
      target_version: '2.0.0',
    }, vendor.privateKey, 'vendor-1')

    const receipt = await platform.requestRollout({
      component:      'inverter-01',
      target_version: '2.0.0',
      signed_payload: signed,
      requested_by:   'ops-1',
    })
    expect(receipt.status).toBe('applying')
    expect(platform.patches.stagedCount()).toBe(1)

    await platform.registry.decommission('inverter-01')
    expect(platform.patches.stagedCount()).toBe(0)
  })

  it('runs a drill through the live detectors without touching telemetry', async () => {
    const result = await platform.simulateAttack({ attack_type: 'dos', component: 'inverter-01' })
    expect(result.events).toHaveLength(3)
    expect(result.events.every(e => e.category === 'simulated-attack')).toBe(true)
    expect(await platform.stores.telemetry.count()).toBe(0)
  })

  it('rebuilds baselines from stored readings', async () => {
    for (const voltage of [229, 231, 230]) {
      await platform.ingestReading({ component: 'inverter-01', payload: { voltage } })
    }
    expect(await platform.resetBaselines()).toBe(3)
  })

  it('warms a second platform from the readings already stored', async () => {
    await platform.ingestReading({ component: 'inverter-01', payload: { voltage: 230 } })
    await platform.ingestReading({ component: 'inverter-01', payload: { voltage: 231 } })

    const restarted = createPlatform({ config: config(), stores: platform.stores })
    try {
      expect(await restarted.primeBaselines()).toBe(2)
    } finally {
      restarted.shutdown()
    }
  })
})

describe('bootstrapPlatform', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    shutdownPlatform()
    jest.restoreAllMocks()
  })

  it('builds the platform once and hands it back afterwards', async () => {
    const first = await bootstrapPlatform({ config: config() })
    expect(await bootstrapPlatform()).toBe(first)
    expect(getPlatform()).toBe(first)
    expect(first.engine.detectorIds()).toEqual(['rules', 'deviation'])
  })

  it('refuses access before bootstrap', () => {
    expect(() => getPlatform()).toThrow('Platform not bootstrapped. Call bootstrapPlatform() first.')
  })
})
