/**
 * @gridwarden/detection — Attack Scenario Catalogue
 *
 * Each scenario deterministically builds the synthetic readings for one
 * drill. Same inputs, same sequence, every time.
 */

import type { GridComponent, TelemetryPayload } from '@gridwarden/types'

export interface ScenarioContext {
  component: GridComponent
  nominal_voltage: number
  nominal_frequency: number
  /** Warm-up length for scenarios that need a settled baseline. */
  warmup: number
}

export interface AttackScenario {
  tag: string
  description: string
  mitigation: string
  build(ctx: ScenarioContext): TelemetryPayload[]
}

function stable(ctx: ScenarioContext, step: number, extra: TelemetryPayload = {}): TelemetryPayload {
  return {
    voltage:       ctx.nominal_voltage + (step % 2 === 0 ? -0.5 : 0.5),
    frequency:     ctx.nominal_frequency,
    status:        'online',
    failed_logins: 0,
    ...extra,
  }
}

function repeat(count: number, fn: (step: number) => TelemetryPayload): TelemetryPayload[] {
  return Array.from({ length: count }, (_, step) => fn(step))
}

export const ATTACK_SCENARIOS: readonly AttackScenario[] = [
  {
    tag:         'voltage-spike',
    description: 'Stable feed, then voltage driven far outside the safe band',
    mitigation:  'Component isolated from the feeder; breaker held open pending inspection',
    build: ctx => [
      ...repeat(5, step => stable(ctx, step)),
      stable(ctx, 5, { voltage: ctx.nominal_voltage * 1.6 }),
      stable(ctx, 6, { voltage: ctx.nominal_voltage * 1.8 }),
      stable(ctx, 7, { voltage: ctx.nominal_voltage * 1.7 }),
    ],
  },
  {
    tag:         'frequency-excursion',
    description: 'Grid frequency swings beyond the allowed band',
    mitigation:  'Islanding relay engaged; frequency reference resynchronised',
    build: ctx => [
      ...repeat(4, step => stable(ctx, step)),
      stable(ctx, 4, { frequency: ctx.nominal_frequency - 2.8 }),
      stable(ctx, 5, { frequency: ctx.nominal_frequency + 3.1 }),
      stable(ctx, 6, { frequency: ctx.nominal_frequency - 3.2 }),
    ],
  },
  {
    tag:         'slow-drift',
    description: 'Settled baseline, then a voltage ramp that never leaves the rule band',
    mitigation:  'Setpoint locked; sensor calibration audit scheduled',
    build: ctx => [
      ...repeat(ctx.warmup, step => stable(ctx, step)),
      ...repeat(10, step => stable(ctx, ctx.warmup + step, {
        voltage: ctx.nominal_voltage + 2 * (step + 1),
      })),
    ],
  },
  {
    tag:         'dos',
    description: 'High-rate traffic saturating the control interface',
    mitigation:  'Rate limiting applied, offending IPs blocked',
    build: ctx => [
      ...repeat(2, step => stable(ctx, step)),
      stable(ctx, 2, { failed_logins: 25 }),
      stable(ctx, 3, { failed_logins: 60 }),
      stable(ctx, 4, { failed_logins: 120 }),
    ],
  },
  {
    tag:         'spoof',
    description: 'Telemetry signature mismatch; readings claim tampered state',
    mitigation:  'Telemetry quarantined, device certificates revalidated',
    build: ctx => [
      ...repeat(2, step => stable(ctx, step)),
      stable(ctx, 2, { status: 'tampered' }),
      stable(ctx, 3, { status: 'tampered' }),
    ],
  },
  {
    tag:         'malware',
    description: 'Unexpected firmware checksum; node reports compromised',
    mitigation:  'Patch manager rolled back update and isolated node',
    build: ctx => [
      ...repeat(2, step => stable(ctx, step)),
      stable(ctx, 2, { status: 'compromised' }),
      stable(ctx, 3, { status: 'compromised', failed_logins: 9 }),
    ],
  },
]

export function findScenario(tag: string): AttackScenario | undefined {
  return ATTACK_SCENARIOS.find(s => s.tag === tag)
}

export function scenarioTags(): string[] {
  return ATTACK_SCENARIOS.map(s => s.tag)
}
