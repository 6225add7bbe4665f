/**
 * @gridwarden/db-adapters — In-Memory Audit Ledger Store
 *
 * Holds the hash-chained record of every platform event.
 * Append-only; block_index must be gapless.
 */

import type { AuditLedgerEntry, AuditLedgerStore } from '@gridwarden/types'

export class MemoryAuditLedgerStore implements AuditLedgerStore {
  private entries: AuditLedgerEntry[] = []

  async append(entry: AuditLedgerEntry): Promise<void> {
    const expected = this.entries.length
    if (entry.block_index !== expected) {
      throw new Error(`Ledger gap: expected block ${expected}, got ${entry.block_index}`)
    }
    this.entries.push({ ...entry })
  }

  async list(): Promise<AuditLedgerEntry[]> {
    return this.entries.map(e => ({ ...e }))
  }

  async last(): Promise<AuditLedgerEntry | null> {
    const entry = this.entries.at(-1)
    return entry ? { ...entry } : null
  }
}
