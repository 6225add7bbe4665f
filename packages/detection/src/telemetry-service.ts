/**
 * @gridwarden/detection — Telemetry Service
 *
 * The ingestion loop. For each reading, under a per-component lock:
 *
 *   1. Resolve the component (unknown → ComponentNotFoundError)
 *   2. Validate the payload; a malformed one keeps its well-formed fields,
 *      is stored with severity normal and skips detection
 *   3. Append the reading (the store assigns arrival order)
 *   4. Run the detection engine
 *   5. Annotate the reading with the highest finding severity
 *   6. Hand the findings to the sink as one batch
 *
 * Readings for different components run concurrently; readings for the same
 * component are serialized so baselines see them in arrival order. The lock
 * is shared with the registry, so a decommission either waits for an
 * in-flight reading or the reading finds the component gone. Bus delivery
 * is dispatched, never awaited, inside the lock.
 */

import AsyncLock from 'async-lock'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { ComponentNotFoundError, InvalidPayloadError } from '@gridwarden/errors'
import type { Publisher } from '@gridwarden/event-bus'
import type {
  ComponentStore,
  TelemetryPayload,
  TelemetryReading,
  TelemetryStore,
} from '@gridwarden/types'
import { highestSeverity, type DetectionEngine } from './detection-engine'
import type { SecurityEventSink } from './event-sink'

const DEFAULT_LATEST_LIMIT = 50
const MAX_LATEST_LIMIT = 500

// ─── Validation ───────────────────────────────────────────────────────────────

const TelemetryValueSchema = z.union([
  z.number().finite(),
  z.string(),
  z.boolean(),
  z.null(),
])

const TelemetryPayloadSchema = z.record(z.string(), TelemetryValueSchema)

export type PayloadCheck =
  | { valid: true; payload: TelemetryPayload }
  | { valid: false; payload: TelemetryPayload; reason: string }

/**
 * Flat map of finite numbers, strings, booleans or null. Anything else is
 * malformed; the storable subset of an object payload is kept.
 */
export function checkPayload(raw: unknown): PayloadCheck {
  const parsed = TelemetryPayloadSchema.safeParse(raw)
  if (parsed.success) return { valid: true, payload: parsed.data }

  const reason = parsed.error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ')

  const kept: TelemetryPayload = {}
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      const v = TelemetryValueSchema.safeParse(value)
      if (v.success) kept[key] = v.data
    }
  }
  return { valid: false, payload: kept, reason }
}

function resolveTimestamp(timestamp: string | Date | undefined): { at: string; error?: string } {
  if (timestamp === undefined) return { at: new Date().toISOString() }
  const parsed = timestamp instanceof Date ? timestamp : new Date(timestamp)
  if (Number.isNaN(parsed.getTime())) {
    return { at: new Date().toISOString(), error: `timestamp: unparseable value "${String(timestamp)}"` }
  }
  return { at: parsed.toISOString() }
}

// ─── Service ──────────────────────────────────────────────────────────────────

export interface IngestRequest {
  component: string
  payload: unknown
  timestamp?: string | Date
  actor?: string | null
  correlation_id?: string
}

export interface IngestResult {
  reading_id: string
  event_ids: string[]
  invalid_reason?: string
}

export interface TelemetryServiceDeps {
  components: ComponentStore
  telemetry: TelemetryStore
  engine: DetectionEngine
  sink: SecurityEventSink
  publisher: Publisher
  lock?: AsyncLock
}

export class TelemetryService {
  private components: ComponentStore
  private telemetry: TelemetryStore
  private engine: DetectionEngine
  private sink: SecurityEventSink
  private publisher: Publisher
  private lock: AsyncLock

  constructor(deps: TelemetryServiceDeps) {
    this.components = deps.components
    this.telemetry  = deps.telemetry
    this.engine     = deps.engine
    this.sink       = deps.sink
    this.publisher  = deps.publisher
    this.lock       = deps.lock ?? new AsyncLock()
  }

  async ingest(request: IngestRequest): Promise<IngestResult> {
    const component = await this.components.findByName(request.component)
    if (!component) throw new ComponentNotFoundError(request.component)

    const correlation_id = request.correlation_id ?? uuidv4()

    return this.lock.acquire<IngestResult>(`telemetry:${component.component_id}`, async () => {
      if (!(await this.components.findById(component.component_id))) {
        throw new ComponentNotFoundError(request.component)
      }

      const check = checkPayload(request.payload)
      const time = resolveTimestamp(request.timestamp)
      const problems = [
        ...(check.valid ? [] : [check.reason]),
        ...(time.error ? [time.error] : []),
      ]
      const invalid_reason = problems.length > 0 ? problems.join('; ') : undefined

      const reading = await this.telemetry.append({
        reading_id:   uuidv4(),
        component_id: component.component_id,
        component:    component.name,
        payload:      check.payload,
        severity:     'normal',
        created_at:   time.at,
      })

      if (invalid_reason !== undefined) {
        const err = new InvalidPayloadError(invalid_reason, component.name)
        console.warn(`[telemetry] ${err.message} (reading ${reading.reading_id} stored without detection)`)
        this.publisher.readingRecorded({
          reading_id: reading.reading_id,
          component:  component.name,
          severity:   'normal',
          findings:   0,
          valid:      false,
        }, correlation_id)
        return { reading_id: reading.reading_id, event_ids: [], invalid_reason }
      }

      const findings = this.engine.evaluate(reading)
      const severity = highestSeverity(findings)
      if (severity) await this.telemetry.annotateSeverity(reading.reading_id, severity)

      const events = await this.sink.record(findings, {
        actor: request.actor ?? null,
        correlation_id,
      })

      this.publisher.readingRecorded({
        reading_id: reading.reading_id,
        component:  component.name,
        severity:   severity ?? 'normal',
        findings:   findings.length,
        valid:      true,
      }, correlation_id)

      return { reading_id: reading.reading_id, event_ids: events.map(e => e.event_id) }
    })
  }

  /** Most recent readings, oldest first. */
  async latest(limit = DEFAULT_LATEST_LIMIT): Promise<TelemetryReading[]> {
    return this.telemetry.latest(Math.min(Math.max(1, limit), MAX_LATEST_LIMIT))
  }

  /** Replays stored readings into detector state without raising anything. */
  async primeBaselines(): Promise<number> {
    const readings = await this.telemetry.listAll()
    for (const reading of readings) this.engine.observe(reading)
    console.log(`[telemetry] Baselines primed from ${readings.length} stored readings`)
    return readings.length
  }

  /** Drops all detector state and rebuilds it from stored readings. */
  async resetBaselines(): Promise<number> {
    this.engine.reset()
    return this.primeBaselines()
  }
}
