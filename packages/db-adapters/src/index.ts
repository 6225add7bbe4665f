/**
 * @gridwarden/db-adapters — Public API
 *
 * createMemoryStores() wires the in-memory tables together, including the
 * component delete cascade. Swap any store for a database-backed one that
 * implements the same interface from @gridwarden/types.
 */

import type {
  AuditLedgerStore,
  ComponentStore,
  PatchStore,
  SecurityEventStore,
  TelemetryStore,
} from '@gridwarden/types'
import { MemoryAuditLedgerStore } from './memory-audit-ledger-store'
import { MemoryComponentStore } from './memory-component-store'
import { MemoryPatchStore } from './memory-patch-store'
import { MemorySecurityEventStore } from './memory-security-event-store'
import { MemoryTelemetryStore } from './memory-telemetry-store'

export { MemoryAuditLedgerStore } from './memory-audit-ledger-store'
export { MemoryComponentStore } from './memory-component-store'
export type { CascadeHook } from './memory-component-store'
export { MemoryPatchStore } from './memory-patch-store'
export { MemorySecurityEventStore } from './memory-security-event-store'
export { MemoryTelemetryStore } from './memory-telemetry-store'
export { MemorySequenceCounter } from './memory-sequence-counter'
export type { SequenceCounter } from './memory-sequence-counter'

export interface GridStores {
  components: ComponentStore
  telemetry: TelemetryStore
  events: SecurityEventStore
  patches: PatchStore
  ledger: AuditLedgerStore
}

export function createMemoryStores(): GridStores {
  const components = new MemoryComponentStore()
  const telemetry  = new MemoryTelemetryStore(components)
  const patches    = new MemoryPatchStore(components)

  components.registerCascade('readings', id => telemetry.deleteForComponent(id))
  components.registerCascade('rollouts', id => patches.deleteForComponent(id))

  return {
    components,
    telemetry,
    events: new MemorySecurityEventStore(),
    patches,
    ledger: new MemoryAuditLedgerStore(),
  }
}
