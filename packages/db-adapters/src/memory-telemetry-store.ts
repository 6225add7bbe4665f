/**
 * @gridwarden/db-adapters — In-Memory Telemetry Store
 *
 * Append-only, in arrival order. The only mutation is the severity tag a
 * detector leaves on a reading after classifying it.
 *
 * In production, swap the array for a time-series table (TimescaleDB, or
 * Postgres partitioned by day). The interface stays the same.
 */

import type {
  ComponentStore,
  ReadingSeverity,
  TelemetryReading,
  TelemetryStore,
} from '@gridwarden/types'
import { RecordNotFoundError, ReferentialIntegrityError } from '@gridwarden/errors'
import { MemorySequenceCounter, type SequenceCounter } from './memory-sequence-counter'

export class MemoryTelemetryStore implements TelemetryStore {
  private readings: TelemetryReading[] = []
  private byId = new Map<string, TelemetryReading>()

  constructor(
    private readonly components: ComponentStore,
    private readonly sequence: SequenceCounter = new MemorySequenceCounter()
  ) {}

  async append(reading: Omit<TelemetryReading, 'sequence'>): Promise<TelemetryReading> {
    const owner = await this.components.findById(reading.component_id)
    if (!owner) throw new ReferentialIntegrityError('telemetry_reading', reading.component_id)

    const stored: TelemetryReading = {
      ...reading,
      payload: { ...reading.payload },
      sequence: this.sequence.next(),
    }
    this.readings.push(stored)
    this.byId.set(stored.reading_id, stored)
    return copy(stored)
  }

  async annotateSeverity(reading_id: string, severity: ReadingSeverity): Promise<void> {
    const reading = this.byId.get(reading_id)
    if (!reading) throw new RecordNotFoundError('telemetry_reading', reading_id)
    reading.severity = severity
  }

  async findById(reading_id: string): Promise<TelemetryReading | null> {
    const reading = this.byId.get(reading_id)
    return reading ? copy(reading) : null
  }

  async listForComponent(component_id: string): Promise<TelemetryReading[]> {
    return this.readings.filter(r => r.component_id === component_id).map(copy)
  }

  async listAll(): Promise<TelemetryReading[]> {
    return this.readings.map(copy)
  }

  async latest(limit: number): Promise<TelemetryReading[]> {
    if (limit <= 0) return []
    return this.readings.slice(-limit).map(copy)
  }

  async deleteForComponent(component_id: string): Promise<number> {
    const before = this.readings.length
    this.readings = this.readings.filter(r => {
      if (r.component_id !== component_id) return true
      this.byId.delete(r.reading_id)
      return false
    })
    return before - this.readings.length
  }

  async count(): Promise<number> {
    return this.readings.length
  }
}

function copy(reading: TelemetryReading): TelemetryReading {
  return { ...reading, payload: { ...reading.payload } }
}
