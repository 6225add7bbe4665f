/**
 * @gridwarden/db-adapters — In-Memory Patch Store
 *
 * One row per rollout attempt. Rows are only ever written by the
 * patch orchestrator's state machine and only removed by component cascade.
 */

import type { ComponentStore, PatchStatus, PatchStore } from '@gridwarden/types'
import { RecordNotFoundError, ReferentialIntegrityError } from '@gridwarden/errors'

export class MemoryPatchStore implements PatchStore {
  private rows = new Map<string, PatchStatus>()

  constructor(private readonly components: ComponentStore) {}

  async create(patch: PatchStatus): Promise<void> {
    const owner = await this.components.findById(patch.component_id)
    if (!owner) throw new ReferentialIntegrityError('patch_status', patch.component_id)
    this.rows.set(patch.patch_id, structuredClone(patch))
  }

  async save(patch: PatchStatus): Promise<void> {
    if (!this.rows.has(patch.patch_id)) throw new RecordNotFoundError('patch_status', patch.patch_id)
    this.rows.set(patch.patch_id, structuredClone(patch))
  }

  async findById(patch_id: string): Promise<PatchStatus | null> {
    const row = this.rows.get(patch_id)
    return row ? structuredClone(row) : null
  }

  async listForComponent(component_id: string): Promise<PatchStatus[]> {
    // Map preserves insertion order; reverse for newest first
    return [...this.rows.values()]
      .filter(p => p.component_id === component_id)
      .reverse()
      .map(p => structuredClone(p))
  }

  async latestForComponent(component_id: string): Promise<PatchStatus | null> {
    const [latest] = await this.listForComponent(component_id)
    return latest ?? null
  }

  async deleteForComponent(component_id: string): Promise<number> {
    let removed = 0
    for (const [patch_id, row] of this.rows) {
      if (row.component_id === component_id) {
        this.rows.delete(patch_id)
        removed++
      }
    }
    return removed
  }

  async count(): Promise<number> {
    return this.rows.size
  }
}
