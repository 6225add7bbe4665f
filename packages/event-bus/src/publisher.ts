/**
 * @gridwarden/event-bus — Publisher Helpers
 *
 * Typed publish functions for each event domain, bound to one bus.
 * Every publish auto-injects: event_id, timestamp, source.
 * Caller provides: correlation_id (from the ingestion/request) + domain payload.
 *
 * Helpers dispatch and return at once; no caller waits on a subscriber.
 */

import { v4 as uuidv4 } from 'uuid'
import type {
  ComponentDecommissionedEvent,
  ComponentRegisteredEvent,
  ComponentUpdatedEvent,
  EventPayload,
  PatchStatusChangedEvent,
  ReadingRecordedEvent,
  SecurityEventAnnotatedEvent,
  SecurityEventRecordedEvent,
  SimulationCompletedEvent,
} from '@gridwarden/types'
import type { GridWardenEventBus } from './event-bus'

function base(source: string, correlation_id?: string) {
  return {
    event_id: uuidv4(),
    correlation_id: correlation_id ?? uuidv4(),
    timestamp: new Date().toISOString(),
    source,
  }
}

export type Publisher = ReturnType<typeof createPublisher>

export function createPublisher(bus: GridWardenEventBus) {
  return {
    // ─── Components ───────────────────────────────────────────────────────────

    componentRegistered: (
      payload: EventPayload<ComponentRegisteredEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.registry', correlation_id),
      type: 'component.registered',
      ...payload,
    }),

    componentUpdated: (
      payload: EventPayload<ComponentUpdatedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.registry', correlation_id),
      type: 'component.updated',
      ...payload,
    }),

    componentDecommissioned: (
      payload: EventPayload<ComponentDecommissionedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.registry', correlation_id),
      type: 'component.decommissioned',
      ...payload,
    }),

    // ─── Telemetry ────────────────────────────────────────────────────────────

    readingRecorded: (
      payload: EventPayload<ReadingRecordedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.telemetry', correlation_id),
      type: 'telemetry.reading_recorded',
      ...payload,
    }),

    // ─── Security ─────────────────────────────────────────────────────────────

    securityEventRecorded: (
      payload: EventPayload<SecurityEventRecordedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.sink', correlation_id),
      type: 'security.event_recorded',
      ...payload,
    }),

    securityEventAnnotated: (
      payload: EventPayload<SecurityEventAnnotatedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.sink', correlation_id),
      type: 'security.event_annotated',
      ...payload,
    }),

    simulationCompleted: (
      payload: EventPayload<SimulationCompletedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.simulator', correlation_id),
      type: 'simulation.completed',
      ...payload,
    }),

    // ─── Patches ──────────────────────────────────────────────────────────────

    patchStatusChanged: (
      payload: EventPayload<PatchStatusChangedEvent>,
      correlation_id?: string
    ) => bus.dispatch({
      ...base('gridwarden.patch', correlation_id),
      type: 'patch.status_changed',
      ...payload,
    }),
  }
}
