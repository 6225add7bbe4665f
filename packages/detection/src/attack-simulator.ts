/**
 * @gridwarden/detection — Attack Simulator
 *
 * Runs a scripted drill against one component. Synthetic readings go through
 * the same detector composition as live telemetry, but against a fork of the
 * component's baselines, and are never written to the telemetry store.
 *
 * Every resulting event is category `simulated-attack`, flagged synthetic,
 * and carries the scenario mitigation. An aborted drill still records what
 * its completed steps found, marked truncated. The drill itself is logged
 * as an info-level operator action carrying the actor.
 */

import { v4 as uuidv4 } from 'uuid'
import { ComponentNotFoundError, InvalidScenarioError } from '@gridwarden/errors'
import type { Publisher } from '@gridwarden/event-bus'
import type { ComponentStore, SecurityEvent, TelemetryReading } from '@gridwarden/types'
import { ATTACK_SCENARIOS, type AttackScenario } from './attack-scenarios'
import { highestSeverity, type DetectionEngine } from './detection-engine'
import type { SecurityEventSink } from './event-sink'
import type { Finding } from './types'

export interface SimulationRequest {
  attack_type: string
  component: string
  actor?: string | null
  signal?: AbortSignal
  correlation_id?: string
  /** Called after each completed step. */
  onStep?: (step: number, total: number) => void
}

export interface SimulationResult {
  scenario: string
  component: string
  events: SecurityEvent[]
  steps_run: number
  steps_total: number
  truncated: boolean
  /** The info event logging the drill as an operator action. */
  action_event_id: string
}

export interface SimulatorOptions {
  nominal_voltage: number
  nominal_frequency: number
  warmup: number
  scenarios?: readonly AttackScenario[]
}

export class AttackSimulator {
  private scenarios: readonly AttackScenario[]

  constructor(
    private components: ComponentStore,
    private engine: DetectionEngine,
    private sink: SecurityEventSink,
    private publisher: Publisher,
    private options: SimulatorOptions
  ) {
    this.scenarios = options.scenarios ?? ATTACK_SCENARIOS
  }

  listScenarios(): Array<Pick<AttackScenario, 'tag' | 'description' | 'mitigation'>> {
    return this.scenarios.map(({ tag, description, mitigation }) => ({ tag, description, mitigation }))
  }

  async simulate(request: SimulationRequest): Promise<SimulationResult> {
    const scenario = this.scenarios.find(s => s.tag === request.attack_type)
    if (!scenario) {
      throw new InvalidScenarioError(request.attack_type, this.scenarios.map(s => s.tag))
    }

    const component = await this.components.findByName(request.component)
    if (!component) throw new ComponentNotFoundError(request.component)

    const payloads = scenario.build({
      component,
      nominal_voltage:   this.options.nominal_voltage,
      nominal_frequency: this.options.nominal_frequency,
      warmup:            this.options.warmup,
    })
    const sandbox = this.engine.fork(component.component_id)
    const run_id = uuidv4()
    const correlation_id = request.correlation_id ?? run_id

    // Findings per completed step; recorded after the loop
    const steps: Finding[][] = []

    for (const [index, payload] of payloads.entries()) {
      if (request.signal?.aborted) break

      const reading: TelemetryReading = {
        reading_id:   `${run_id}:${index + 1}`,
        sequence:     index + 1,
        component_id: component.component_id,
        component:    component.name,
        payload,
        severity:     'normal',
        created_at:   new Date().toISOString(),
      }

      steps.push(sandbox.evaluate(reading))
      request.onStep?.(index + 1, payloads.length)

      // Let an abort issued between steps land
      await new Promise<void>(resolve => setImmediate(resolve))
    }

    const steps_run = steps.length
    const truncated = steps_run < payloads.length
    const events: SecurityEvent[] = []

    for (const [index, findings] of steps.entries()) {
      const primary = mostSevere(findings)
      if (!primary) continue
      events.push(...await this.sink.record(findings.map(f => relabel(f, scenario)), {
        actor: request.actor ?? null,
        correlation_id,
        context: {
          synthetic:   true,
          scenario:    scenario.tag,
          detected_as: primary.category,
          run_id,
          step:        index + 1,
          truncated,
        },
      }))
    }

    const action = await this.sink.recordAction({
      category: 'simulated-attack',
      severity: 'info',
      details:  `Attack drill ${scenario.tag} on ${component.name}: ${steps_run}/${payloads.length} step(s), ${events.length} event(s)`,
      actor:    request.actor ?? null,
      context:  {
        component:          component.name,
        operator_action:    'attack-drill',
        synthetic:          true,
        scenario:           scenario.tag,
        run_id,
        steps_run,
        steps_total:        payloads.length,
        truncated,
        security_event_ids: events.map(e => e.event_id),
      },
      correlation_id,
    })

    if (truncated) {
      console.warn(`[simulator] ${scenario.tag} on ${component.name} aborted after ${steps_run}/${payloads.length} steps`)
    }

    this.publisher.simulationCompleted({
      scenario:           scenario.tag,
      component:          component.name,
      actor:              request.actor ?? null,
      steps_run,
      steps_total:        payloads.length,
      truncated,
      highest_severity:   highestSeverity(steps.flat()),
      security_event_ids: events.map(e => e.event_id),
    }, correlation_id)

    return {
      scenario:    scenario.tag,
      component:   component.name,
      events,
      steps_run,
      steps_total: payloads.length,
      truncated,
      action_event_id: action.event_id,
    }
  }
}

function mostSevere(findings: Finding[]): Finding | undefined {
  const highest = highestSeverity(findings)
  return findings.find(f => f.severity === highest)
}

function relabel(finding: Finding, scenario: AttackScenario): Finding {
  return {
    ...finding,
    category:   'simulated-attack',
    mitigation: scenario.mitigation,
    context:    { ...(finding.context ?? {}), detected_as: finding.category },
  }
}
