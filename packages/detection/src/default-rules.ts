/**
 * @gridwarden/detection — Default Detection Rules
 *
 * Seeded into the rule detector at startup. Bounds come from configuration;
 * operators can disable a rule or add their own without a redeploy.
 *
 * Thresholds are calibrated for a 230 V / 60 Hz microgrid feeder.
 */

import type { EventSeverity } from '@gridwarden/types'
import type { DetectionRule, RuleBounds, RuleCondition } from './types'

export const DEFAULT_RULE_BOUNDS: RuleBounds = {
  voltage_min:        200,
  voltage_max:        260,
  frequency_min:      58.5,
  frequency_max:      61.5,
  failed_login_limit: 5,
  bad_statuses:       ['tampered', 'compromised', 'fault'],
}

export function buildDefaultRules(bounds: RuleBounds = DEFAULT_RULE_BOUNDS): DetectionRule[] {
  return [

    // ── Electrical ──────────────────────────────────────────────────────────

    rule(
      'voltage-bounds',
      'voltage',
      'Voltage outside safe operating band',
      'warning',
      { kind: 'outside_range', min: bounds.voltage_min, max: bounds.voltage_max }
    ),

    rule(
      'frequency-bounds',
      'frequency',
      'Frequency deviation from nominal',
      'warning',
      { kind: 'outside_range', min: bounds.frequency_min, max: bounds.frequency_max }
    ),

    // ── Device state ────────────────────────────────────────────────────────

    rule(
      'status-offline',
      'status',
      'Device offline',
      'critical',
      { kind: 'equals_any', values: ['offline'] },
      'Dispatch field check; component dropped off the control network'
    ),

    rule(
      'status-known-bad',
      'status',
      'Device reports a known-bad status',
      'critical',
      { kind: 'equals_any', values: [...bounds.bad_statuses] },
      'Isolate component pending integrity inspection'
    ),

    // ── Access ──────────────────────────────────────────────────────────────

    rule(
      'failed-logins',
      'failed_logins',
      'Excessive failed logins',
      'critical',
      { kind: 'above', limit: bounds.failed_login_limit },
      'Lock the management interface and rotate operator credentials'
    ),
  ]
}

function rule(
  rule_id: string,
  metric: string,
  description: string,
  severity: EventSeverity,
  condition: RuleCondition,
  mitigation?: string
): DetectionRule {
  return {
    rule_id,
    metric,
    description,
    severity,
    condition,
    ...(mitigation ? { mitigation } : {}),
    is_active: true,
  }
}
