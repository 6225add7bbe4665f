/**
 * @gridwarden/platform-core — Audit Ledger Subscriber
 *
 * Wires the event bus to the hash-chained audit ledger. Every PlatformEvent
 * that flows through the bus gets a ledger block:
 *
 *   payload_hash = sha256(JSON of the event)
 *   block_hash   = sha256(payload_hash : prev_hash : block_index)
 *
 * Appends are serialized so block indexes stay gapless when events are
 * published concurrently. A failed write is logged and never reaches the
 * publisher (bulkhead).
 */

import AsyncLock from 'async-lock'
import { createHash } from 'crypto'
import type { GridWardenEventBus, Subscription } from '@gridwarden/event-bus'
import type { AuditLedgerEntry, AuditLedgerStore, PlatformEvent } from '@gridwarden/types'

export const GENESIS_HASH = '0'.repeat(64)

export function hashPayload(data: unknown): string {
  return createHash('sha256').update(JSON.stringify(data)).digest('hex')
}

export function blockHash(payload_hash: string, prev_hash: string, index: number): string {
  return createHash('sha256')
    .update(`${payload_hash}:${prev_hash}:${index}`)
    .digest('hex')
}

export interface AuditSubscriberOptions {
  bus: GridWardenEventBus
  ledger: AuditLedgerStore
}

export function startAuditSubscriber(opts: AuditSubscriberOptions): Subscription {
  const lock = new AsyncLock()

  const subscription = opts.bus.subscribeAll('gridwarden.audit', async (event: PlatformEvent) => {
    try {
      await lock.acquire('ledger', async () => {
        const last = await opts.ledger.last()
        const block_index = last ? last.block_index + 1 : 0
        const prev_hash = last ? last.block_hash : GENESIS_HASH
        const payload_hash = hashPayload(event)

        await opts.ledger.append({
          block_index,
          entry_id:       event.event_id,
          event_type:     event.type,
          source:         event.source,
          correlation_id: event.correlation_id,
          timestamp:      event.timestamp,
          payload_hash,
          prev_hash,
          block_hash:     blockHash(payload_hash, prev_hash, block_index),
        })
      })
    } catch (err) {
      // Ledger write failed: log, never re-throw into the publisher
      console.error('[audit] Failed to write ledger entry:', err instanceof Error ? err.message : err)
    }
  })

  console.log('[audit] Ledger subscriber active')
  return subscription
}

export interface ChainVerification {
  valid: boolean
  /** First block whose links do not hold. */
  broken_at?: number
}

/** Re-derives every link. Payload hashes are taken as recorded. */
export function verifyAuditChain(entries: AuditLedgerEntry[]): ChainVerification {
  let prev_hash = GENESIS_HASH
  for (const [index, entry] of entries.entries()) {
    const intact =
      entry.block_index === index &&
      entry.prev_hash === prev_hash &&
      entry.block_hash === blockHash(entry.payload_hash, entry.prev_hash, entry.block_index)
    if (!intact) return { valid: false, broken_at: index }
    prev_hash = entry.block_hash
  }
  return { valid: true }
}
