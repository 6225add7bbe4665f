/**
 * @gridwarden/types — Platform Event Definitions
 *
 * Every event that flows through the GridWarden event bus is typed here.
 * The bus is the broadcast half of every state change: stores persist,
 * the bus tells the dashboard feed, the audit ledger and anyone else listening.
 *
 * Naming convention: DOMAIN.ACTION
 * Payload: always includes timestamp and a correlation_id for tracing
 */

import type {
  Criticality,
  EventSeverity,
  PatchState,
  ReadingSeverity,
  SecurityEvent,
} from './domain'

// ─── Base ─────────────────────────────────────────────────────────────────────

export interface BaseEvent {
  event_id: string
  correlation_id: string   // Trace one ingestion / request across all modules
  timestamp: string        // ISO 8601
  source: string           // e.g. "gridwarden.telemetry", "gridwarden.patch"
}

// ─── Component Events ─────────────────────────────────────────────────────────

export interface ComponentRegisteredEvent extends BaseEvent {
  type: 'component.registered'
  component_id: string
  component: string
  category: string
  criticality: Criticality
}

export interface ComponentUpdatedEvent extends BaseEvent {
  type: 'component.updated'
  component_id: string
  component: string
  field: 'firmware_version' | 'criticality'
  previous_value: string
  new_value: string
}

export interface ComponentDecommissionedEvent extends BaseEvent {
  type: 'component.decommissioned'
  component_id: string
  component: string
  readings_removed: number
  rollouts_removed: number
}

// ─── Telemetry Events ─────────────────────────────────────────────────────────

export interface ReadingRecordedEvent extends BaseEvent {
  type: 'telemetry.reading_recorded'
  reading_id: string
  component: string
  severity: ReadingSeverity
  findings: number
  valid: boolean
}

// ─── Security Events ──────────────────────────────────────────────────────────

export interface SecurityEventRecordedEvent extends BaseEvent {
  type: 'security.event_recorded'
  security_event: SecurityEvent
}

export interface SecurityEventAnnotatedEvent extends BaseEvent {
  type: 'security.event_annotated'
  security_event_id: string
  actor: string
  note: string
}

export interface SimulationCompletedEvent extends BaseEvent {
  type: 'simulation.completed'
  scenario: string
  component: string
  actor: string | null
  steps_run: number
  steps_total: number
  truncated: boolean
  highest_severity: EventSeverity | null
  security_event_ids: string[]
}

// ─── Patch Events ─────────────────────────────────────────────────────────────

export interface PatchStatusChangedEvent extends BaseEvent {
  type: 'patch.status_changed'
  patch_id: string
  component: string
  target_version: string
  previous_status: PatchState | null
  new_status: PatchState
  reason?: string
}

// ─── Union of all platform events ─────────────────────────────────────────────

export type PlatformEvent =
  | ComponentRegisteredEvent
  | ComponentUpdatedEvent
  | ComponentDecommissionedEvent
  | ReadingRecordedEvent
  | SecurityEventRecordedEvent
  | SecurityEventAnnotatedEvent
  | SimulationCompletedEvent
  | PatchStatusChangedEvent

export type PlatformEventType = PlatformEvent['type']

export const PLATFORM_EVENT_TYPES: readonly PlatformEventType[] = [
  'component.registered',
  'component.updated',
  'component.decommissioned',
  'telemetry.reading_recorded',
  'security.event_recorded',
  'security.event_annotated',
  'simulation.completed',
  'patch.status_changed',
]

/** Payload a publisher supplies; the bus helpers stamp the base fields. */
export type EventPayload<T extends PlatformEvent> = Omit<T, keyof BaseEvent | 'type'>
