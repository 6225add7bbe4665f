/**
 * @gridwarden/detection — Security Event Sink
 *
 * The only writer of security events. Detector findings and operator actions
 * both land here; each created event goes once to the store and once to the
 * bus, in that order.
 *
 * Coalescing: one batch (the findings of one reading, or of one drill step)
 * yields at most one event per (component, category). The merged event takes
 * the highest severity and lists every finding in context.findings. Nothing
 * is deduplicated across batches.
 *
 * A failed write propagates as PersistenceError. The broadcast is dispatched
 * after the write and never waited on, so a stuck subscriber cannot hold up
 * the component's ingestion lock.
 */

import AsyncLock from 'async-lock'
import { v4 as uuidv4 } from 'uuid'
import { PersistenceError, RecordNotFoundError, ValidationError } from '@gridwarden/errors'
import type { Publisher } from '@gridwarden/event-bus'
import type {
  EventCategory,
  EventSeverity,
  SecurityEvent,
  SecurityEventAnnotation,
  SecurityEventContext,
  SecurityEventFilter,
  SecurityEventStore,
} from '@gridwarden/types'
import { higherSeverity, SEVERITY_RANK } from '@gridwarden/types'
import type { Finding } from './types'

const MAX_LIST_LIMIT = 200

// ─── Inputs ───────────────────────────────────────────────────────────────────

export interface RecordOptions {
  actor?: string | null
  correlation_id?: string
  /** Shared keys merged into every event of the batch. */
  context?: Record<string, unknown>
}

export interface ActionInput {
  category: EventCategory
  severity: EventSeverity
  details: string
  actor: string | null
  context?: SecurityEventContext
  correlation_id?: string
}

export interface CoalescedGroup {
  component: string
  category: EventCategory
  severity: EventSeverity
  findings: Finding[]
}

// ─── Coalescing ───────────────────────────────────────────────────────────────

/** Groups one batch by (component, category), keeping first-seen order. */
export function coalesceFindings(findings: Finding[]): CoalescedGroup[] {
  const groups = new Map<string, CoalescedGroup>()
  for (const finding of findings) {
    const key = `${finding.component}\u0000${finding.category}`
    const group = groups.get(key)
    if (group) {
      group.severity = higherSeverity(group.severity, finding.severity)
      group.findings.push(finding)
    } else {
      groups.set(key, {
        component: finding.component,
        category:  finding.category,
        severity:  finding.severity,
        findings:  [finding],
      })
    }
  }
  return [...groups.values()]
}

function summarise(finding: Finding): Record<string, unknown> {
  return {
    detector: finding.detector,
    reading_id: finding.reading_id,
    metric: finding.metric,
    value: finding.value,
    severity: finding.severity,
    details: finding.details,
    ...(finding.rule_id !== undefined ? { rule_id: finding.rule_id } : {}),
    ...(finding.z_score !== undefined ? { z_score: finding.z_score } : {}),
    ...(finding.baseline ? { baseline: { ...finding.baseline } } : {}),
    ...(finding.context ?? {}),
  }
}

/** Mitigation of the most severe finding that carries one. */
function pickMitigation(findings: Finding[]): string | undefined {
  let chosen: Finding | undefined
  for (const f of findings) {
    if (!f.mitigation) continue
    if (!chosen || SEVERITY_RANK[f.severity] > SEVERITY_RANK[chosen.severity]) chosen = f
  }
  return chosen?.mitigation
}

function describe(group: CoalescedGroup): string {
  const primary = [...group.findings].sort(
    (a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]
  )[0]
  if (!primary) return `${group.category} on ${group.component}`
  const extra = group.findings.length - 1
  return extra > 0 ? `${primary.details} (+${extra} more)` : primary.details
}

// ─── Sink ─────────────────────────────────────────────────────────────────────

export class SecurityEventSink {
  private store: SecurityEventStore
  private publisher: Publisher
  private lock: AsyncLock

  constructor(store: SecurityEventStore, publisher: Publisher, lock: AsyncLock = new AsyncLock()) {
    this.store     = store
    this.publisher = publisher
    this.lock      = lock
  }

  /** Persist one batch of findings. Returns the created events in group order. */
  async record(findings: Finding[], options: RecordOptions = {}): Promise<SecurityEvent[]> {
    const created: SecurityEvent[] = []

    for (const group of coalesceFindings(findings)) {
      const mitigation = pickMitigation(group.findings)
      const context: SecurityEventContext = {
        ...(options.context ?? {}),
        component: group.component,
        component_id: group.findings[0]?.component_id,
        findings: group.findings.map(summarise),
        ...(mitigation ? { mitigation } : {}),
      }

      created.push(await this.persist({
        category: group.category,
        severity: group.severity,
        details: describe(group),
        actor: options.actor ?? null,
        context,
        correlation_id: options.correlation_id,
      }))
    }

    return created
  }

  /** Record an operator action (drill, manual isolation, rollout verdict). */
  async recordAction(input: ActionInput): Promise<SecurityEvent> {
    if (!input.details.trim()) {
      throw new ValidationError('security event', ['details must not be empty'])
    }
    return this.persist(input)
  }

  async annotate(event_id: string, actor: string, note: string): Promise<SecurityEvent> {
    const issues: string[] = []
    if (!actor.trim()) issues.push('actor must not be empty')
    if (!note.trim()) issues.push('note must not be empty')
    if (issues.length > 0) throw new ValidationError('annotation', issues)

    const existing = await this.store.findById(event_id)
    if (!existing) throw new RecordNotFoundError('security_event', event_id)

    const annotation: SecurityEventAnnotation = {
      event_id,
      actor: actor.trim(),
      note: note.trim(),
      annotated_at: new Date().toISOString(),
    }

    let updated: SecurityEvent
    try {
      updated = await this.store.annotate(annotation)
    } catch (err) {
      throw new PersistenceError('security_event.annotate', err)
    }

    this.publisher.securityEventAnnotated({
      security_event_id: event_id,
      actor: annotation.actor,
      note: annotation.note,
    })
    return updated
  }

  async listEvents(filter: SecurityEventFilter = {}): Promise<SecurityEvent[]> {
    const limit = Math.min(Math.max(1, filter.limit ?? 100), MAX_LIST_LIMIT)
    return this.store.list({ ...filter, limit })
  }

  async annotations(event_id: string): Promise<SecurityEventAnnotation[]> {
    return this.store.annotationsFor(event_id)
  }

  // ─── Private ──────────────────────────────────────────────────────────────

  private async persist(input: ActionInput): Promise<SecurityEvent> {
    const component = typeof input.context?.component === 'string' ? input.context.component : '-'
    const key = `sink:${component}:${input.category}`

    const event = await this.lock.acquire<SecurityEvent>(key, async () => {
      const now = new Date().toISOString()
      const record: SecurityEvent = {
        event_id:   uuidv4(),
        severity:   input.severity,
        category:   input.category,
        details:    input.details,
        actor:      input.actor,
        context:    { ...(input.context ?? {}) },
        created_at: now,
        updated_at: now,
      }
      try {
        await this.store.create(record)
      } catch (err) {
        throw new PersistenceError('security_event.create', err)
      }
      return record
    })

    this.publisher.securityEventRecorded({ security_event: event }, input.correlation_id)

    if (event.severity === 'critical') {
      console.warn(`[sink] CRITICAL ${event.category} on ${component}: ${event.details}`)
    }
    return event
  }
}
