/**
 * @gridwarden/db-adapters — In-Memory Security Event Store
 *
 * Audit-trail semantics: an event is written once and never edited.
 * Annotations live in their own table; adding one only moves `updated_at`.
 */

import type {
  SecurityEvent,
  SecurityEventAnnotation,
  SecurityEventFilter,
  SecurityEventStore,
} from '@gridwarden/types'
import { RecordNotFoundError } from '@gridwarden/errors'

const MAX_LIST_LIMIT = 200

export class MemorySecurityEventStore implements SecurityEventStore {
  private events: SecurityEvent[] = []
  private byId = new Map<string, SecurityEvent>()
  private annotations = new Map<string, SecurityEventAnnotation[]>()

  async create(event: SecurityEvent): Promise<void> {
    const stored = structuredClone(event)
    this.events.push(stored)
    this.byId.set(stored.event_id, stored)
  }

  async findById(event_id: string): Promise<SecurityEvent | null> {
    const event = this.byId.get(event_id)
    return event ? structuredClone(event) : null
  }

  async list(filter: SecurityEventFilter = {}): Promise<SecurityEvent[]> {
    const limit = Math.min(MAX_LIST_LIMIT, filter.limit ?? 100)
    const matches: SecurityEvent[] = []
    // Newest first
    for (let i = this.events.length - 1; i >= 0 && matches.length < limit; i--) {
      const event = this.events[i]
      if (filter.severity && event.severity !== filter.severity) continue
      if (filter.category && event.category !== filter.category) continue
      matches.push(structuredClone(event))
    }
    return matches
  }

  async annotate(annotation: SecurityEventAnnotation): Promise<SecurityEvent> {
    const event = this.byId.get(annotation.event_id)
    if (!event) throw new RecordNotFoundError('security_event', annotation.event_id)

    const list = this.annotations.get(annotation.event_id) ?? []
    list.push({ ...annotation })
    this.annotations.set(annotation.event_id, list)

    event.updated_at = annotation.annotated_at
    return structuredClone(event)
  }

  async annotationsFor(event_id: string): Promise<SecurityEventAnnotation[]> {
    return (this.annotations.get(event_id) ?? []).map(a => ({ ...a }))
  }

  async count(): Promise<number> {
    return this.events.length
  }
}
