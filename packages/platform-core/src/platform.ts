/**
 * @gridwarden/platform-core — Platform
 *
 * Wires every module together and exposes the three inbound calls
 * (ingest, request rollout, simulate attack) plus the listings an operator
 * surface needs.
 *
 * Order of operations:
 *   1. Stores (in-memory adapters unless supplied)
 *   2. Event bus + publisher
 *   3. Audit ledger subscriber (records everything)
 *   4. Detection engine, sink, telemetry service, simulator
 *   5. Patch orchestrator and component registry
 *   6. Demo feed (constructed stopped)
 *
 * Ingestion, rollouts and decommission share one keyed lock.
 */

import AsyncLock from 'async-lock'
import { createMemoryStores, type GridStores } from '@gridwarden/db-adapters'
import { ComponentRegistry } from '@gridwarden/component-registry'
import {
  AttackSimulator,
  SecurityEventSink,
  TelemetryService,
  createDetectionEngine,
  type DetectionEngine,
  type IngestRequest,
  type IngestResult,
  type SimulationRequest,
  type SimulationResult,
} from '@gridwarden/detection'
import {
  GridWardenEventBus,
  createPublisher,
  type Publisher,
  type Subscription,
} from '@gridwarden/event-bus'
import {
  PatchOrchestrator,
  SimulatedFirmwareApplier,
  type FirmwareApplier,
  type RolloutReceipt,
  type RolloutRequest,
} from '@gridwarden/patch-orchestrator'
import type { PatchStatus, SecurityEvent, TelemetryReading } from '@gridwarden/types'
import { startAuditSubscriber } from './audit-subscriber'
import { loadConfig, type GridWardenConfig } from './config'
import { DemoTelemetryFeed, type DemoFeedOptions } from './demo-feed'

export interface PlatformOptions {
  config?: GridWardenConfig
  stores?: GridStores
  bus?: GridWardenEventBus
  applier?: FirmwareApplier
  feed?: Partial<Omit<DemoFeedOptions, 'interval_ms'>>
}

export interface ActivitySummary {
  components: number
  readings: number
  events: number
  rollouts: number
  recent_events: SecurityEvent[]
}

const RECENT_EVENTS = 5

function midpoint(min: number, max: number): number {
  return (min + max) / 2
}

export class GridWardenPlatform {
  readonly config: GridWardenConfig
  readonly stores: GridStores
  readonly bus: GridWardenEventBus
  readonly publisher: Publisher
  readonly engine: DetectionEngine
  readonly sink: SecurityEventSink
  readonly telemetry: TelemetryService
  readonly simulator: AttackSimulator
  readonly registry: ComponentRegistry
  readonly patches: PatchOrchestrator
  readonly feed: DemoTelemetryFeed

  private audit: Subscription
  private lock = new AsyncLock()

  constructor(options: PlatformOptions = {}) {
    this.config = options.config ?? loadConfig()
    this.stores = options.stores ?? createMemoryStores()
    this.bus = options.bus ?? new GridWardenEventBus()
    this.publisher = createPublisher(this.bus)
    this.audit = startAuditSubscriber({ bus: this.bus, ledger: this.stores.ledger })

    const { rules, deviation } = this.config.detection
    this.engine = createDetectionEngine(this.config.detection)
    this.sink = new SecurityEventSink(this.stores.events, this.publisher, this.lock)
    this.telemetry = new TelemetryService({
      components: this.stores.components,
      telemetry:  this.stores.telemetry,
      engine:     this.engine,
      sink:       this.sink,
      publisher:  this.publisher,
      lock:       this.lock,
    })
    this.simulator = new AttackSimulator(this.stores.components, this.engine, this.sink, this.publisher, {
      nominal_voltage:   midpoint(rules.voltage_min, rules.voltage_max),
      nominal_frequency: midpoint(rules.frequency_min, rules.frequency_max),
      warmup:            deviation.window,
    })

    this.patches = new PatchOrchestrator({
      components: this.stores.components,
      patches:    this.stores.patches,
      publisher:  this.publisher,
      sink:       this.sink,
      keyring:    this.config.patch.keyring,
      applier:    options.applier ?? new SimulatedFirmwareApplier({ failure_rate: this.config.patch.failure_rate }),
      lock:       this.lock,
    })
    this.registry = new ComponentRegistry({
      components:    this.stores.components,
      patches:       this.stores.patches,
      publisher:     this.publisher,
      state_holders: [this.engine, this.patches],
      lock:          this.lock,
    })

    this.feed = new DemoTelemetryFeed(
      { components: this.stores.components, registry: this.registry, telemetry: this.telemetry },
      { ...options.feed, interval_ms: this.config.feed.interval_ms }
    )
  }

  // ─── Inbound calls ──────────────────────────────────────────────────────────

  ingestReading(request: IngestRequest): Promise<IngestResult> {
    return this.telemetry.ingest(request)
  }

  requestRollout(request: RolloutRequest): Promise<RolloutReceipt> {
    return this.patches.requestRollout(request)
  }

  applyRollout(patch_id: string): Promise<PatchStatus> {
    return this.patches.applyRollout(patch_id)
  }

  /** Request and, when verification passes, apply in one go. */
  rollout(request: RolloutRequest): Promise<PatchStatus> {
    return this.patches.rollout(request)
  }

  simulateAttack(request: SimulationRequest): Promise<SimulationResult> {
    return this.simulator.simulate(request)
  }

  // ─── Operations ─────────────────────────────────────────────────────────────

  primeBaselines(): Promise<number> {
    return this.telemetry.primeBaselines()
  }

  resetBaselines(): Promise<number> {
    return this.telemetry.resetBaselines()
  }

  latestTelemetry(limit?: number): Promise<TelemetryReading[]> {
    return this.telemetry.latest(limit)
  }

  async getActivitySummary(): Promise<ActivitySummary> {
    const [components, readings, events, rollouts, recent_events] = await Promise.all([
      this.stores.components.count(),
      this.stores.telemetry.count(),
      this.stores.events.count(),
      this.stores.patches.count(),
      this.sink.listEvents({ limit: RECENT_EVENTS }),
    ])
    return { components, readings, events, rollouts, recent_events }
  }

  shutdown(): void {
    this.feed.stop()
    this.audit.unsubscribe()
  }
}

export function createPlatform(options: PlatformOptions = {}): GridWardenPlatform {
  return new GridWardenPlatform(options)
}
