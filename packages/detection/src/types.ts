/**
 * @gridwarden/detection — Types
 *
 * Findings are what detectors produce; the sink turns them into persisted
 * security events. A detector never writes anything itself.
 */

import type {
  EventCategory,
  EventSeverity,
  TelemetryReading,
  TelemetryValue,
} from '@gridwarden/types'

// ─── Finding ──────────────────────────────────────────────────────────────────

export interface BaselineSnapshot {
  count: number
  mean: number
  stddev: number
}

export interface Finding {
  detector: string               // "rules" | "deviation" | custom
  component_id: string
  component: string
  reading_id: string
  category: EventCategory
  severity: EventSeverity
  metric: string
  value: TelemetryValue
  details: string
  rule_id?: string
  z_score?: number
  baseline?: BaselineSnapshot
  mitigation?: string
  /** Extra keys copied into the event's per-finding summary. */
  context?: Record<string, unknown>
}

// ─── Detector ─────────────────────────────────────────────────────────────────

/**
 * One pluggable detection strategy. `evaluate` must be pure with respect to
 * persistence: it may update its own in-memory state (baselines) and nothing else.
 */
export interface Detector {
  readonly id: string
  evaluate(reading: TelemetryReading): Finding[]

  /** Copy this detector with one component's state, for sandboxed drills. */
  fork?(component_id: string): Detector
  /** Fold a reading into state without scoring it. */
  observe?(reading: TelemetryReading): void
  /** Drop everything held for one component. */
  forget?(component_id: string): void
  /** Drop everything. */
  reset?(): void
}

// ─── Rules ────────────────────────────────────────────────────────────────────

export type RuleCondition =
  | { kind: 'outside_range'; min: number; max: number }
  | { kind: 'above'; limit: number }
  | { kind: 'equals_any'; values: string[] }

export interface DetectionRule {
  rule_id: string
  metric: string
  description: string
  severity: EventSeverity
  condition: RuleCondition
  mitigation?: string
  is_active: boolean
}

export interface RuleBounds {
  voltage_min: number
  voltage_max: number
  frequency_min: number
  frequency_max: number
  failed_login_limit: number
  bad_statuses: string[]
}

// ─── Deviation ────────────────────────────────────────────────────────────────

export interface DeviationSettings {
  window: number               // trailing samples per (component, metric)
  min_samples: number          // abstain below this
  threshold: number            // |z| above this is a warning
  critical_threshold: number   // |z| above this is critical
}

export interface DetectionConfig {
  rules: RuleBounds
  deviation: DeviationSettings
}
