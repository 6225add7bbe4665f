/**
 * @gridwarden/detection — Rule Detector
 *
 * Fixed-threshold checks over a single reading. Stateless: the same reading
 * always yields the same findings. A metric that is missing, or of the wrong
 * type for its rule, means the rule does not apply.
 */

import type { TelemetryReading, TelemetryValue } from '@gridwarden/types'
import { buildDefaultRules } from './default-rules'
import type { DetectionRule, Detector, Finding, RuleCondition } from './types'

export class RuleDetector implements Detector {
  readonly id = 'rules'
  private rules: DetectionRule[]

  constructor(rules: DetectionRule[] = buildDefaultRules()) {
    this.rules = rules.map(r => ({ ...r }))
  }

  evaluate(reading: TelemetryReading): Finding[] {
    const findings: Finding[] = []

    for (const rule of this.rules) {
      if (!rule.is_active) continue
      if (!Object.prototype.hasOwnProperty.call(reading.payload, rule.metric)) continue

      const value = reading.payload[rule.metric]
      const breach = describeBreach(rule.condition, value)
      if (!breach) continue

      findings.push({
        detector:     this.id,
        component_id: reading.component_id,
        component:    reading.component,
        reading_id:   reading.reading_id,
        category:     'rule-violation',
        severity:     rule.severity,
        metric:       rule.metric,
        value,
        details:      `${rule.description} on ${reading.component}: ${breach}`,
        rule_id:      rule.rule_id,
        ...(rule.mitigation ? { mitigation: rule.mitigation } : {}),
      })
    }

    return findings
  }

  listRules(): DetectionRule[] {
    return this.rules.map(r => ({ ...r }))
  }

  setRuleActive(rule_id: string, is_active: boolean): boolean {
    const rule = this.rules.find(r => r.rule_id === rule_id)
    if (!rule) return false
    rule.is_active = is_active
    return true
  }

  addRule(rule: DetectionRule): void {
    this.rules = [...this.rules.filter(r => r.rule_id !== rule.rule_id), { ...rule }]
  }
}

/** Returns a human-readable breach description, or null when the rule holds. */
export function describeBreach(condition: RuleCondition, value: TelemetryValue): string | null {
  switch (condition.kind) {
    case 'outside_range': {
      if (!isFiniteNumber(value)) return null
      if (value >= condition.min && value <= condition.max) return null
      return `${value} outside [${condition.min}, ${condition.max}]`
    }
    case 'above': {
      if (!isFiniteNumber(value)) return null
      if (value <= condition.limit) return null
      return `${value} exceeds limit ${condition.limit}`
    }
    case 'equals_any': {
      if (typeof value !== 'string') return null
      const normalised = value.trim().toLowerCase()
      if (!condition.values.includes(normalised)) return null
      return `status "${normalised}"`
    }
  }
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}
