/**
 * @gridwarden/detection — Baseline Store
 *
 * Rolling per-(component, metric) statistics for the deviation detector.
 * Each baseline keeps the last `window` observations plus a running mean and
 * M2 (sum of squared deviations), updated incrementally:
 *
 *   add x:     n += 1; d = x - mean; mean += d / n; m2 += d * (x - mean)
 *   evict y:   n -= 1; d = y - mean; mean -= d / n; m2 -= d * (y - mean)
 *
 * Variance is the population variance m2 / n.
 *
 * The store is an explicit object owned by whoever builds the detector.
 * fork() hands out a copy of one component's baselines for drills.
 */

import type { BaselineSnapshot } from './types'

export interface MetricBaseline {
  count: number
  mean: number
  m2: number
  window: number[]
}

// Below this, variance is rounding noise from the evict update
const ZERO_VARIANCE_EPSILON = 1e-12

export class BaselineStore {
  private baselines = new Map<string, Map<string, MetricBaseline>>()

  constructor(readonly window_size: number) {
    if (!Number.isInteger(window_size) || window_size < 1) {
      throw new RangeError(`Baseline window must be a positive integer, got ${window_size}`)
    }
  }

  /** Current statistics, or null when nothing has been observed yet. */
  stats(component_id: string, metric: string): BaselineSnapshot | null {
    const baseline = this.baselines.get(component_id)?.get(metric)
    if (!baseline || baseline.count === 0) return null
    return {
      count:  baseline.count,
      mean:   baseline.mean,
      stddev: Math.sqrt(variance(baseline)),
    }
  }

  observe(component_id: string, metric: string, value: number): void {
    let metrics = this.baselines.get(component_id)
    if (!metrics) {
      metrics = new Map()
      this.baselines.set(component_id, metrics)
    }
    let baseline = metrics.get(metric)
    if (!baseline) {
      baseline = { count: 0, mean: 0, m2: 0, window: [] }
      metrics.set(metric, baseline)
    }

    baseline.window.push(value)
    baseline.count++
    const delta = value - baseline.mean
    baseline.mean += delta / baseline.count
    baseline.m2 += delta * (value - baseline.mean)

    while (baseline.window.length > this.window_size) {
      const oldest = baseline.window.shift()
      if (oldest === undefined) break
      evict(baseline, oldest)
    }
  }

  /** A new store holding a copy of one component's baselines only. */
  fork(component_id: string): BaselineStore {
    const copy = new BaselineStore(this.window_size)
    const metrics = this.baselines.get(component_id)
    if (metrics) {
      const cloned = new Map<string, MetricBaseline>()
      for (const [metric, b] of metrics) {
        cloned.set(metric, { count: b.count, mean: b.mean, m2: b.m2, window: [...b.window] })
      }
      copy.baselines.set(component_id, cloned)
    }
    return copy
  }

  forget(component_id: string): void {
    this.baselines.delete(component_id)
  }

  clear(): void {
    this.baselines.clear()
  }

  components(): string[] {
    return [...this.baselines.keys()]
  }

  snapshot(component_id: string): Record<string, BaselineSnapshot> {
    const result: Record<string, BaselineSnapshot> = {}
    for (const metric of this.baselines.get(component_id)?.keys() ?? []) {
      const stats = this.stats(component_id, metric)
      if (stats) result[metric] = stats
    }
    return result
  }
}

function evict(baseline: MetricBaseline, value: number): void {
  baseline.count--
  if (baseline.count === 0) {
    baseline.mean = 0
    baseline.m2 = 0
    return
  }
  const delta = value - baseline.mean
  baseline.mean -= delta / baseline.count
  baseline.m2 -= delta * (value - baseline.mean)
  if (baseline.m2 < 0) baseline.m2 = 0
}

function variance(baseline: MetricBaseline): number {
  if (baseline.count === 0) return 0
  const v = baseline.m2 / baseline.count
  const scale = Math.max(1, baseline.mean * baseline.mean)
  return v <= ZERO_VARIANCE_EPSILON * scale ? 0 : v
}
