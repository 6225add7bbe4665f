/**
 * @gridwarden/detection — Detection Engine
 *
 * Composes any set of detectors. Every reading is checked by all of them in
 * registration order; cheap stateless rules first, baselines last.
 *
 * The sink and the simulator only ever see the engine, never a concrete
 * detector.
 */

import type { EventSeverity, TelemetryReading } from '@gridwarden/types'
import { higherSeverity } from '@gridwarden/types'
import { DEFAULT_DEVIATION_SETTINGS, DeviationDetector } from './deviation-detector'
import { DEFAULT_RULE_BOUNDS, buildDefaultRules } from './default-rules'
import { RuleDetector } from './rule-detector'
import type { DetectionConfig, Detector, Finding } from './types'

export class DetectionEngine {
  private detectors: Detector[]

  constructor(detectors: Detector[]) {
    this.detectors = [...detectors]
  }

  evaluate(reading: TelemetryReading): Finding[] {
    return this.detectors.flatMap(d => d.evaluate(reading))
  }

  /** Engine over copies of one component's detector state. */
  fork(component_id: string): DetectionEngine {
    return new DetectionEngine(this.detectors.map(d => (d.fork ? d.fork(component_id) : d)))
  }

  observe(reading: TelemetryReading): void {
    for (const d of this.detectors) d.observe?.(reading)
  }

  forget(component_id: string): void {
    for (const d of this.detectors) d.forget?.(component_id)
  }

  reset(): void {
    for (const d of this.detectors) d.reset?.()
  }

  detectorIds(): string[] {
    return this.detectors.map(d => d.id)
  }
}

export function highestSeverity(findings: Finding[]): EventSeverity | null {
  let highest: EventSeverity | null = null
  for (const f of findings) {
    highest = highest ? higherSeverity(highest, f.severity) : f.severity
  }
  return highest
}

/** The standard composition: threshold rules, then statistical deviation. */
export function createDetectionEngine(config?: Partial<DetectionConfig>): DetectionEngine {
  return new DetectionEngine([
    new RuleDetector(buildDefaultRules(config?.rules ?? DEFAULT_RULE_BOUNDS)),
    new DeviationDetector(config?.deviation ?? DEFAULT_DEVIATION_SETTINGS),
  ])
}
