/**
 * @gridwarden/event-bus — Platform Event Bus
 *
 * The broadcast spine. Every security event, patch transition and reading
 * is announced here after it has been persisted. The dashboard feed, the
 * audit ledger and the CLI listen.
 *
 * Bulkhead design:
 *   - Publishers never know who is subscribed. A failing subscriber is
 *     caught and logged; it never propagates back into detection.
 *   - Core services dispatch() and move on. Handlers start in publish order
 *     but nothing upstream waits for them; drain() settles what is in flight.
 *   - Subscribers can be attached and detached at runtime.
 *   - The bus is an in-process EventEmitter; a Redis pub/sub backend can
 *     replace the internals without changing any publisher.
 */

import { EventEmitter } from 'events'
import { v4 as uuidv4 } from 'uuid'
import type { PlatformEvent, PlatformEventType } from '@gridwarden/types'

// ─── Subscription Handle ──────────────────────────────────────────────────────

export interface Subscription {
  id: string
  subscriber_id: string
  event_types: PlatformEventType[] | '*'
  unsubscribe(): void
}

// ─── Bus Stats ────────────────────────────────────────────────────────────────

export interface BusStats {
  events_published: number
  events_delivered: number
  events_dropped: number      // Handler errors caught by bulkhead
  active_subscriptions: number
  subscriber_ids: string[]
}

// ─── Handler type ─────────────────────────────────────────────────────────────

export type EventHandler<T extends PlatformEvent = PlatformEvent> = (
  event: T
) => Promise<void>

type EventOfType<K extends PlatformEventType> = Extract<PlatformEvent, { type: K }>

const WILDCARD = '*'

// ─── Event Bus ────────────────────────────────────────────────────────────────

export class GridWardenEventBus {
  private emitter = new EventEmitter()
  private subscriptions = new Map<string, { subscriber_id: string }>()
  private inflight = new Set<Promise<void>>()
  private stats: BusStats = {
    events_published: 0,
    events_delivered: 0,
    events_dropped: 0,
    active_subscriptions: 0,
    subscriber_ids: [],
  }

  constructor() {
    // Dashboard feeds, ledger and CLI watchers all attach here
    this.emitter.setMaxListeners(100)
  }

  /**
   * Publish an event to every handler subscribed to its type, plus wildcard
   * subscribers. Each handler runs independently; a failing one is counted
   * as dropped and logged.
   */
  publish(event: PlatformEvent): Promise<void> {
    this.stats.events_published++
    const delivery: Promise<void> = this.deliver(event).finally(() => {
      this.inflight.delete(delivery)
    })
    this.inflight.add(delivery)
    return delivery
  }

  /** Publish without waiting on any subscriber. */
  dispatch(event: PlatformEvent): void {
    this.publish(event).catch(err => {
      console.error(`[event-bus] Delivery of ${event.type} failed:`, err instanceof Error ? err.message : err)
    })
  }

  /** Resolves once every delivery started so far, and any it triggers, has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight])
    }
  }

  private async deliver(event: PlatformEvent): Promise<void> {
    const handlers = [
      ...this.emitter.listeners(event.type),
      ...this.emitter.listeners(WILDCARD),
    ].filter(isHandler)

    await Promise.allSettled(
      handlers.map(async (handler) => {
        try {
          await handler(event)
          this.stats.events_delivered++
        } catch (err) {
          // BULKHEAD: one failing subscriber never brings down the others
          this.stats.events_dropped++
          console.error(
            `[event-bus] Handler for ${event.type} threw:`,
            err instanceof Error ? err.message : err
          )
        }
      })
    )
  }

  /**
   * Subscribe to one or more event types.
   * Returns a handle with an unsubscribe() method.
   */
  subscribe<K extends PlatformEventType>(
    subscriber_id: string,
    event_types: K[],
    handler: EventHandler<EventOfType<K>>
  ): Subscription {
    // The emitter is keyed by type, so a handler only ever sees events of K
    const wrapped: EventHandler = async (event) => {
      if (isOfType(event, event_types)) await handler(event)
    }
    for (const type of event_types) {
      this.emitter.on(type, wrapped)
    }
    return this.track(subscriber_id, event_types, () => {
      for (const type of event_types) {
        this.emitter.off(type, wrapped)
      }
    })
  }

  /**
   * Subscribe to ALL platform events.
   * Used by the audit ledger — it records everything.
   */
  subscribeAll(subscriber_id: string, handler: EventHandler): Subscription {
    this.emitter.on(WILDCARD, handler)
    return this.track(subscriber_id, WILDCARD, () => {
      this.emitter.off(WILDCARD, handler)
    })
  }

  getStats(): BusStats {
    return { ...this.stats, subscriber_ids: [...this.stats.subscriber_ids] }
  }

  private track(
    subscriber_id: string,
    event_types: PlatformEventType[] | '*',
    detach: () => void
  ): Subscription {
    const sub_id = uuidv4()
    this.subscriptions.set(sub_id, { subscriber_id })
    this.stats.active_subscriptions++
    if (!this.stats.subscriber_ids.includes(subscriber_id)) {
      this.stats.subscriber_ids.push(subscriber_id)
    }

    let active = true
    return {
      id: sub_id,
      subscriber_id,
      event_types,
      unsubscribe: () => {
        if (!active) return
        active = false
        detach()
        this.subscriptions.delete(sub_id)
        this.stats.active_subscriptions--
      },
    }
  }
}

function isHandler(value: unknown): value is EventHandler {
  return typeof value === 'function'
}

function isOfType<K extends PlatformEventType>(
  event: PlatformEvent,
  types: K[]
): event is EventOfType<K> {
  const accepted: readonly PlatformEventType[] = types
  return accepted.includes(event.type)
}

// ─── Singleton ────────────────────────────────────────────────────────────────
// One bus per process for the CLI. Services take the bus by constructor so
// tests can hand each case its own.

let _bus: GridWardenEventBus | null = null

export function getEventBus(): GridWardenEventBus {
  if (!_bus) _bus = new GridWardenEventBus()
  return _bus
}
