/**
 * @gridwarden/detection — Statistical Deviation Detector
 *
 * Scores every finite numeric metric against its rolling baseline, then
 * folds the value in. Scoring always happens before folding, so a reading is
 * never compared against a baseline that already contains it.
 *
 * Abstains (no finding, no error) while a baseline is warming up or flat.
 */

import type { TelemetryReading } from '@gridwarden/types'
import { BaselineStore } from './baseline-store'
import { isFiniteNumber } from './rule-detector'
import type { DeviationSettings, Detector, Finding } from './types'

export const DEFAULT_DEVIATION_SETTINGS: DeviationSettings = {
  window:             30,
  min_samples:        5,
  threshold:          3,
  critical_threshold: 5,
}

export class DeviationDetector implements Detector {
  readonly id = 'deviation'
  readonly baselines: BaselineStore
  private settings: DeviationSettings

  constructor(
    settings: DeviationSettings = DEFAULT_DEVIATION_SETTINGS,
    baselines: BaselineStore = new BaselineStore(settings.window)
  ) {
    if (settings.critical_threshold < settings.threshold) {
      throw new RangeError('critical_threshold must not be below threshold')
    }
    this.settings  = { ...settings }
    this.baselines = baselines
  }

  evaluate(reading: TelemetryReading): Finding[] {
    const findings: Finding[] = []

    for (const [metric, value] of Object.entries(reading.payload)) {
      if (!isFiniteNumber(value)) continue

      const stats = this.baselines.stats(reading.component_id, metric)
      if (stats && stats.count >= this.settings.min_samples && stats.stddev > 0) {
        const z = (value - stats.mean) / stats.stddev
        const magnitude = Math.abs(z)
        if (magnitude > this.settings.threshold) {
          findings.push({
            detector:     this.id,
            component_id: reading.component_id,
            component:    reading.component,
            reading_id:   reading.reading_id,
            category:     'deviation',
            severity:     magnitude > this.settings.critical_threshold ? 'critical' : 'warning',
            metric,
            value,
            details:
              `${metric} on ${reading.component} deviates from baseline: ` +
              `z=${z.toFixed(2)} (value ${value}, mean ${stats.mean.toFixed(2)}, stddev ${stats.stddev.toFixed(2)})`,
            z_score:  z,
            baseline: stats,
          })
        }
      }

      this.baselines.observe(reading.component_id, metric, value)
    }

    return findings
  }

  observe(reading: TelemetryReading): void {
    for (const [metric, value] of Object.entries(reading.payload)) {
      if (isFiniteNumber(value)) this.baselines.observe(reading.component_id, metric, value)
    }
  }

  fork(component_id: string): DeviationDetector {
    return new DeviationDetector(this.settings, this.baselines.fork(component_id))
  }

  forget(component_id: string): void {
    this.baselines.forget(component_id)
  }

  reset(): void {
    this.baselines.clear()
  }
}
