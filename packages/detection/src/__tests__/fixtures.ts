import { createMemoryStores, type GridStores } from '@gridwarden/db-adapters'
import { GridWardenEventBus, createPublisher, type Publisher } from '@gridwarden/event-bus'
import type { GridComponent, PlatformEvent } from '@gridwarden/types'
import { DetectionEngine } from '../detection-engine'
import { DeviationDetector } from '../deviation-detector'
import { RuleDetector } from '../rule-detector'
import { SecurityEventSink } from '../event-sink'

export interface DetectionHarness {
  stores: GridStores
  bus: GridWardenEventBus
  publisher: Publisher
  deviation: DeviationDetector
  engine: DetectionEngine
  sink: SecurityEventSink
  published: PlatformEvent[]
  addComponent(name: string): Promise<GridComponent>
}

export function createHarness(): DetectionHarness {
  const stores = createMemoryStores()
  const bus = new GridWardenEventBus()
  const publisher = createPublisher(bus)
  const deviation = new DeviationDetector({ window: 30, min_samples: 5, threshold: 3, critical_threshold: 5 })
  const engine = new DetectionEngine([new RuleDetector(), deviation])
  const sink = new SecurityEventSink(stores.events, publisher)
  const published: PlatformEvent[] = []
  bus.subscribeAll('harness', async (event) => { published.push(event) })

  let next = 0
  return {
    stores,
    bus,
    publisher,
    deviation,
    engine,
    sink,
    published,
    async addComponent(name) {
      next++
      const now = new Date().toISOString()
      const component: GridComponent = {
        component_id:     `comp-${next}`,
        name,
        category:         'inverter',
        firmware_version: '1.0.0',
        network_address:  `10.0.0.${next}`,
        criticality:      'high',
        created_at:       now,
        updated_at:       now,
      }
      await stores.components.create(component)
      return component
    },
  }
}
