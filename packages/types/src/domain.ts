/**
 * @gridwarden/types — Domain Records
 *
 * Components, telemetry readings, security events and patch rollouts.
 * These are the rows the stores hold and the shapes every package passes around.
 *
 * Field naming follows the storage layer (snake_case) so records can be
 * handed to persistence and to the event bus without remapping.
 */

// ─── Vocabularies ─────────────────────────────────────────────────────────────

export type Criticality = 'low' | 'medium' | 'high' | 'critical'

export const CRITICALITIES: readonly Criticality[] = ['low', 'medium', 'high', 'critical']

export type EventSeverity = 'info' | 'warning' | 'critical'

/** Severity tag on a reading: `normal` until a detector classifies it. */
export type ReadingSeverity = 'normal' | EventSeverity

/**
 * Event categories. The four named ones must always exist; the string
 * fallback keeps the vocabulary open for operator actions.
 */
export type EventCategory =
  | 'rule-violation'
  | 'deviation'
  | 'simulated-attack'
  | 'patch-integrity'
  | (string & {})

export const SEVERITY_RANK: Record<EventSeverity, number> = {
  info:     0,
  warning:  1,
  critical: 2,
}

export function higherSeverity(a: EventSeverity, b: EventSeverity): EventSeverity {
  return SEVERITY_RANK[b] > SEVERITY_RANK[a] ? b : a
}

// ─── Component ────────────────────────────────────────────────────────────────

export interface GridComponent {
  component_id: string
  name: string                 // unique identity
  category: string             // e.g. "inverter", "battery", "smart-meter"
  firmware_version: string
  network_address: string
  criticality: Criticality
  created_at: string           // ISO 8601
  updated_at: string
}

// ─── Telemetry ────────────────────────────────────────────────────────────────

export type TelemetryValue = number | string | boolean | null

/** Flat metric map reported by a component: voltage, frequency, status, ... */
export type TelemetryPayload = Record<string, TelemetryValue>

export interface TelemetryReading {
  reading_id: string
  sequence: number             // arrival order across the store
  component_id: string
  component: string            // component name at time of ingestion
  payload: TelemetryPayload
  severity: ReadingSeverity
  created_at: string
}

// ─── Security Event ───────────────────────────────────────────────────────────

export interface SecurityEventContext {
  component?: string
  mitigation?: string
  [key: string]: unknown
}

export interface SecurityEvent {
  event_id: string
  severity: EventSeverity
  category: EventCategory
  details: string
  actor: string | null         // null for autonomous detector output
  context: SecurityEventContext
  created_at: string
  updated_at: string
}

export interface SecurityEventAnnotation {
  event_id: string
  actor: string
  note: string
  annotated_at: string
}

// ─── Patch Rollout ────────────────────────────────────────────────────────────

export type PatchState =
  | 'pending'
  | 'verifying'
  | 'applying'
  | 'succeeded'
  | 'rejected'
  | 'failed'

export interface PatchTransition {
  from: PatchState | null
  to: PatchState
  at: string
  reason?: string
}

export interface PatchStatus {
  patch_id: string
  component_id: string
  component: string
  target_version: string
  status: PatchState
  requested_by: string
  notes: string | null
  checksum: string             // sha256 of the firmware payload, hex
  history: PatchTransition[]
  created_at: string
  updated_at: string
}
