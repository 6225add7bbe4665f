/**
 * @gridwarden/db-adapters — In-Memory Component Store
 *
 * Components are keyed by id with a unique index on name.
 * Deleting a component removes the row first, then runs every registered
 * cascade (telemetry, rollouts), mirroring ON DELETE CASCADE. Once the
 * cascade starts nothing can append against the component.
 */

import type { ComponentStore, Criticality, GridComponent } from '@gridwarden/types'
import { DuplicateComponentError, RecordNotFoundError } from '@gridwarden/errors'

export type CascadeHook = (component_id: string) => Promise<number>

export class MemoryComponentStore implements ComponentStore {
  private rows = new Map<string, GridComponent>()
  private byName = new Map<string, string>()
  private cascades: { readings?: CascadeHook; rollouts?: CascadeHook } = {}

  /** Wire the tables that reference components. */
  registerCascade(table: 'readings' | 'rollouts', hook: CascadeHook): void {
    this.cascades[table] = hook
  }

  async create(component: GridComponent): Promise<void> {
    if (this.byName.has(component.name)) throw new DuplicateComponentError(component.name)
    this.rows.set(component.component_id, { ...component })
    this.byName.set(component.name, component.component_id)
  }

  async findById(component_id: string): Promise<GridComponent | null> {
    const row = this.rows.get(component_id)
    return row ? { ...row } : null
  }

  async findByName(name: string): Promise<GridComponent | null> {
    const id = this.byName.get(name)
    return id ? this.findById(id) : null
  }

  async list(): Promise<GridComponent[]> {
    return [...this.rows.values()]
      .map(row => ({ ...row }))
      .sort((a, b) => a.name.localeCompare(b.name))
  }

  async update(
    component_id: string,
    update: Partial<{ firmware_version: string; criticality: Criticality }>
  ): Promise<GridComponent> {
    const row = this.rows.get(component_id)
    if (!row) throw new RecordNotFoundError('component', component_id)
    const next: GridComponent = {
      ...row,
      ...update,
      updated_at: new Date().toISOString(),
    }
    this.rows.set(component_id, next)
    return { ...next }
  }

  async delete(component_id: string): Promise<{ readings_removed: number; rollouts_removed: number }> {
    const row = this.rows.get(component_id)
    if (!row) throw new RecordNotFoundError('component', component_id)

    this.rows.delete(component_id)
    this.byName.delete(row.name)

    const readings_removed = (await this.cascades.readings?.(component_id)) ?? 0
    const rollouts_removed = (await this.cascades.rollouts?.(component_id)) ?? 0
    return { readings_removed, rollouts_removed }
  }

  async count(): Promise<number> {
    return this.rows.size
  }
}
