/**
 * Demo Telemetry Feed
 *
 * Plays a fixture microgrid into the ingestion path on a timer, so the
 * detectors and the event listing have something to chew on without real
 * hardware. Every tick each fixture node reports a jittered copy of its
 * telemetry; about one reading in eight drops offline.
 *
 * Lifecycle:
 *   registerNodes() → register any missing fixture nodes
 *   start()  → register, then begin polling
 *   stop()   → clear interval
 *   nudge()  → run one tick now
 *
 * Bulkhead: a failing tick is logged and the feed keeps polling. Within a
 * tick each node stands alone; a node that has been decommissioned is
 * skipped until registerNodes() brings it back.
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import { ComponentNotFoundError } from '@gridwarden/errors'
import type { ComponentRegistry } from '@gridwarden/component-registry'
import type { TelemetryService } from '@gridwarden/detection'
import type { ComponentStore, TelemetryPayload } from '@gridwarden/types'

export const DEFAULT_FIXTURE_PATH = join(__dirname, '..', 'fixtures', 'microgrid-nodes.json')

const OFFLINE_CHANCE = 0.12

const FixtureNodeSchema = z.object({
  name:             z.string().min(1),
  category:         z.string().min(1),
  firmware_version: z.string().min(1),
  network_address:  z.string().min(1),
  criticality:      z.enum(['low', 'medium', 'high', 'critical']).default('medium'),
  telemetry:        z.record(z.string(), z.union([z.number().finite(), z.string(), z.boolean(), z.null()])),
})

export type FixtureNode = z.infer<typeof FixtureNodeSchema>

export function loadFixture(file: string): FixtureNode[] {
  const parsed = z.array(FixtureNodeSchema).safeParse(JSON.parse(readFileSync(file, 'utf8')))
  if (!parsed.success) {
    throw new Error(`[demo-feed] Fixture ${file} is invalid: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
  }
  return parsed.data
}

// ─── Jitter ───────────────────────────────────────────────────────────────────

function uniform(random: () => number, min: number, max: number): number {
  return min + (max - min) * random()
}

function randint(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1))
}

function round(value: number, digits: number): number {
  const f = 10 ** digits
  return Math.round(value * f) / f
}

function jitterNumber(key: string, value: number, random: () => number): number {
  switch (key) {
    case 'voltage':
      return round(Math.max(0, value + uniform(random, -14, 18)), 2)
    case 'frequency':
      return round(value + uniform(random, -1.2, 1.2), 3)
    case 'power_kw':
    case 'soc':
      return round(Math.max(0, value + uniform(random, -22, 28)), 2)
    case 'failed_logins':
      return Math.max(0, Math.round(value) + randint(random, -2, 3))
    default: {
      const span = Math.max(1, Math.abs(value) * 0.08)
      return round(value + uniform(random, -span, span), 2)
    }
  }
}

/** One noisy reading derived from a node's nominal telemetry. */
export function jitterPayload(payload: TelemetryPayload, random: () => number = Math.random): TelemetryPayload {
  const out: TelemetryPayload = {}
  for (const [key, value] of Object.entries(payload)) {
    out[key] = typeof value === 'number' ? jitterNumber(key, value, random) : value
  }

  if (random() < OFFLINE_CHANCE) {
    out.status = 'offline'
    out.voltage = 0
    out.frequency = 0
  } else {
    out.status = out.status ?? 'online'
  }
  if (!('failed_logins' in out)) out.failed_logins = randint(random, 0, 4)
  return out
}

// ─── Feed ─────────────────────────────────────────────────────────────────────

export interface DemoFeedDeps {
  components: ComponentStore
  registry: ComponentRegistry
  telemetry: TelemetryService
}

export interface DemoFeedOptions {
  interval_ms: number
  fixture_path: string
  random: () => number
}

export interface FeedTick {
  readings: number
  events: number
  skipped: number
}

export class DemoTelemetryFeed {
  private timer?: ReturnType<typeof setInterval>
  private readonly options: DemoFeedOptions
  private nodes: FixtureNode[] | null = null
  private missing = new Set<string>()
  private ticks = 0
  private last_error: string | null = null

  constructor(private readonly deps: DemoFeedDeps, options?: Partial<DemoFeedOptions>) {
    this.options = {
      interval_ms:  options?.interval_ms ?? 6000,
      fixture_path: options?.fixture_path ?? DEFAULT_FIXTURE_PATH,
      random:       options?.random ?? Math.random,
    }
  }

  start(): void {
    if (this.timer) return
    console.log(`[demo-feed] Starting — tick every ${this.options.interval_ms / 1000}s`)
    this.timer = setInterval(() => { this.tick().catch(err => this.fail(err)) }, this.options.interval_ms)
    this.tick().catch(err => this.fail(err))
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
      console.log('[demo-feed] Stopped')
    }
  }

  /** Registers any fixture node the registry does not know yet. */
  async registerNodes(): Promise<FixtureNode[]> {
    this.nodes = null
    this.missing.clear()
    return this.ensureNodes()
  }

  /** Force an immediate tick outside the normal poll cycle. */
  async nudge(): Promise<FeedTick> {
    return this.tick()
  }

  getState(): { running: boolean; ticks: number; interval_ms: number; last_error: string | null } {
    return {
      running:     this.timer !== undefined,
      ticks:       this.ticks,
      interval_ms: this.options.interval_ms,
      last_error:  this.last_error,
    }
  }

  private async tick(): Promise<FeedTick> {
    const nodes = await this.ensureNodes()
    let readings = 0
    let events = 0
    let skipped = 0
    for (const node of nodes) {
      try {
        const result = await this.deps.telemetry.ingest({
          component: node.name,
          payload:   jitterPayload(node.telemetry, this.options.random),
        })
        readings++
        events += result.event_ids.length
        this.missing.delete(node.name)
      } catch (err) {
        skipped++
        if (err instanceof ComponentNotFoundError) {
          if (!this.missing.has(node.name)) {
            this.missing.add(node.name)
            console.warn(`[demo-feed] ${node.name} is no longer registered; skipping it`)
          }
          continue
        }
        this.fail(err)
      }
    }
    this.ticks++
    if (events > 0) console.warn(`[demo-feed] Tick ${this.ticks}: ${events} security event(s)`)
    return { readings, events, skipped }
  }

  private async ensureNodes(): Promise<FixtureNode[]> {
    if (this.nodes) return this.nodes
    const nodes = loadFixture(this.options.fixture_path)
    for (const node of nodes) {
      if (await this.deps.components.findByName(node.name)) continue
      await this.deps.registry.register({
        name:             node.name,
        category:         node.category,
        firmware_version: node.firmware_version,
        network_address:  node.network_address,
        criticality:      node.criticality,
      })
    }
    this.nodes = nodes
    return nodes
  }

  private fail(err: unknown): void {
    this.last_error = err instanceof Error ? err.message : String(err)
    console.error('[demo-feed] Tick failed (will retry):', this.last_error)
  }
}
