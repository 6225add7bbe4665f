/**
 * @gridwarden/component-registry — Component Registry
 *
 * The inventory of grid components. Everything else refers to a component by
 * name and resolves it here.
 *
 *   - register(input)           → validate, sanitise the name, insert
 *   - list()                    → every component with its latest rollout
 *   - setCriticality(name, c)   → administrative re-rating
 *   - decommission(name)        → cascade: telemetry, rollout history, baselines
 *
 * Decommission holds the component's `telemetry:` and `rollout:` keys on the
 * lock shared with ingestion and the patch orchestrator, so no reading or
 * rollout can land between the cascade and the row going away.
 *
 * Firmware versions are not editable here; only a succeeded rollout moves them.
 */

import AsyncLock from 'async-lock'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import {
  ComponentNotFoundError,
  DuplicateComponentError,
  PersistenceError,
  ValidationError,
  isGridWardenError,
} from '@gridwarden/errors'
import type { Publisher } from '@gridwarden/event-bus'
import {
  CRITICALITIES,
  type ComponentStore,
  type Criticality,
  type GridComponent,
  type PatchState,
  type PatchStore,
} from '@gridwarden/types'

// ─── Inputs ───────────────────────────────────────────────────────────────────

/** Trims and collapses internal whitespace; strips control characters. */
export function sanitizeName(raw: string): string {
  return raw.replace(/[\u0000-\u001f\u007f]/g, '').trim().replace(/\s+/g, ' ')
}

const CriticalitySchema = z.enum(['low', 'medium', 'high', 'critical'])

const RegisterSchema = z.object({
  name:             z.string().transform(sanitizeName).pipe(z.string().min(1, 'name must not be empty').max(64)),
  category:         z.string().trim().min(1, 'category must not be empty'),
  firmware_version: z.string().trim().min(1, 'firmware_version must not be empty'),
  network_address:  z.string().trim().min(1, 'network_address must not be empty'),
  criticality:      CriticalitySchema.default('medium'),
})

export type RegisterComponentInput = z.input<typeof RegisterSchema>

export interface ComponentSummary extends GridComponent {
  latest_patch: {
    patch_id: string
    target_version: string
    status: PatchState
  } | null
}

/** In-memory state keyed by component: detector baselines, staged images. */
export interface ComponentStateHandle {
  forget(component_id: string): void
}

export interface ComponentRegistryDeps {
  components: ComponentStore
  patches: PatchStore
  publisher: Publisher
  state_holders?: ComponentStateHandle[]
  lock?: AsyncLock
}

// ─── Registry ─────────────────────────────────────────────────────────────────

export class ComponentRegistry {
  private components: ComponentStore
  private patches: PatchStore
  private publisher: Publisher
  private state_holders: ComponentStateHandle[]
  private lock: AsyncLock

  constructor(deps: ComponentRegistryDeps) {
    this.components    = deps.components
    this.patches       = deps.patches
    this.publisher     = deps.publisher
    this.state_holders = deps.state_holders ?? []
    this.lock          = deps.lock ?? new AsyncLock()
  }

  async register(input: RegisterComponentInput): Promise<GridComponent> {
    const parsed = RegisterSchema.safeParse(input)
    if (!parsed.success) {
      throw new ValidationError('component', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`))
    }

    const now = new Date().toISOString()
    const component: GridComponent = {
      component_id: uuidv4(),
      ...parsed.data,
      created_at: now,
      updated_at: now,
    }

    try {
      await this.components.create(component)
    } catch (err) {
      if (err instanceof DuplicateComponentError) throw err
      throw new PersistenceError('component.create', err)
    }

    console.log(`[registry] Component ${component.name} registered (${component.category}, ${component.criticality})`)
    this.publisher.componentRegistered({
      component_id: component.component_id,
      component:    component.name,
      category:     component.category,
      criticality:  component.criticality,
    })
    return component
  }

  async get(name: string): Promise<GridComponent> {
    const component = await this.components.findByName(sanitizeName(name))
    if (!component) throw new ComponentNotFoundError(name)
    return component
  }

  async list(): Promise<ComponentSummary[]> {
    const components = await this.components.list()
    return Promise.all(components.map(async (component) => {
      const latest = await this.patches.latestForComponent(component.component_id)
      return {
        ...component,
        latest_patch: latest
          ? { patch_id: latest.patch_id, target_version: latest.target_version, status: latest.status }
          : null,
      }
    }))
  }

  async setCriticality(name: string, criticality: Criticality): Promise<GridComponent> {
    if (!CRITICALITIES.includes(criticality)) {
      throw new ValidationError('component', [`criticality must be one of ${CRITICALITIES.join(', ')}`])
    }
    const component = await this.get(name)
    if (component.criticality === criticality) return component

    const updated = await this.write('component.update', () =>
      this.components.update(component.component_id, { criticality })
    )
    this.publisher.componentUpdated({
      component_id:   updated.component_id,
      component:      updated.name,
      field:          'criticality',
      previous_value: component.criticality,
      new_value:      updated.criticality,
    })
    return updated
  }

  /** Removes the component and everything that references it. */
  async decommission(name: string): Promise<{ readings_removed: number; rollouts_removed: number }> {
    const component = await this.get(name)
    const id = component.component_id

    const removed = await this.lock.acquire([`telemetry:${id}`, `rollout:${id}`], async () => {
      if (!(await this.components.findById(id))) throw new ComponentNotFoundError(name)
      const result = await this.write('component.delete', () => this.components.delete(id))
      for (const holder of this.state_holders) holder.forget(id)
      return result
    })

    console.log(
      `[registry] Component ${component.name} decommissioned — ` +
      `${removed.readings_removed} readings, ${removed.rollouts_removed} rollouts removed`
    )
    this.publisher.componentDecommissioned({
      component_id: component.component_id,
      component:    component.name,
      ...removed,
    })
    return removed
  }

  private async write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (isGridWardenError(err)) throw err
      throw new PersistenceError(operation, err)
    }
  }
}
