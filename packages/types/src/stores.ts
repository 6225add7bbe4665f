/**
 * @gridwarden/types — Store Interfaces
 *
 * The persistence collaborator, seen from the core. Implementations live in
 * @gridwarden/db-adapters (in-memory today). Services only ever talk to
 * these interfaces, so a SQL-backed adapter can be swapped in without
 * touching detection or rollout code.
 *
 * Referential integrity is the store's job: appending a reading or a rollout
 * for a component that does not exist must fail.
 */

import type {
  Criticality,
  EventCategory,
  EventSeverity,
  GridComponent,
  PatchStatus,
  ReadingSeverity,
  SecurityEvent,
  SecurityEventAnnotation,
  TelemetryReading,
} from './domain'

export interface ComponentStore {
  create(component: GridComponent): Promise<void>
  findById(component_id: string): Promise<GridComponent | null>
  findByName(name: string): Promise<GridComponent | null>
  list(): Promise<GridComponent[]>
  update(
    component_id: string,
    update: Partial<{ firmware_version: string; criticality: Criticality }>
  ): Promise<GridComponent>
  /** Deletes the component and cascades to everything that references it. */
  delete(component_id: string): Promise<{ readings_removed: number; rollouts_removed: number }>
  count(): Promise<number>
}

export interface TelemetryStore {
  /** Assigns the arrival sequence and returns the stored reading. */
  append(reading: Omit<TelemetryReading, 'sequence'>): Promise<TelemetryReading>
  annotateSeverity(reading_id: string, severity: ReadingSeverity): Promise<void>
  findById(reading_id: string): Promise<TelemetryReading | null>
  /** Readings for one component in arrival order. */
  listForComponent(component_id: string): Promise<TelemetryReading[]>
  /** Every reading in arrival order. */
  listAll(): Promise<TelemetryReading[]>
  /** The most recent `limit` readings, oldest first. */
  latest(limit: number): Promise<TelemetryReading[]>
  deleteForComponent(component_id: string): Promise<number>
  count(): Promise<number>
}

export interface SecurityEventFilter {
  severity?: EventSeverity
  category?: EventCategory
  limit?: number
}

export interface SecurityEventStore {
  create(event: SecurityEvent): Promise<void>
  findById(event_id: string): Promise<SecurityEvent | null>
  /** Newest first. */
  list(filter?: SecurityEventFilter): Promise<SecurityEvent[]>
  /** Records an annotation and moves `updated_at`; recorded facts never change. */
  annotate(annotation: SecurityEventAnnotation): Promise<SecurityEvent>
  annotationsFor(event_id: string): Promise<SecurityEventAnnotation[]>
  count(): Promise<number>
}

export interface PatchStore {
  create(patch: PatchStatus): Promise<void>
  save(patch: PatchStatus): Promise<void>
  findById(patch_id: string): Promise<PatchStatus | null>
  /** Newest first. */
  listForComponent(component_id: string): Promise<PatchStatus[]>
  latestForComponent(component_id: string): Promise<PatchStatus | null>
  deleteForComponent(component_id: string): Promise<number>
  count(): Promise<number>
}

export interface AuditLedgerEntry {
  block_index: number
  entry_id: string
  event_type: string
  source: string
  correlation_id: string
  timestamp: string
  payload_hash: string
  prev_hash: string
  block_hash: string
}

export interface AuditLedgerStore {
  append(entry: AuditLedgerEntry): Promise<void>
  list(): Promise<AuditLedgerEntry[]>
  last(): Promise<AuditLedgerEntry | null>
}
