export { GridWardenEventBus, getEventBus } from './event-bus'
export type { Subscription, BusStats, EventHandler } from './event-bus'
export { createPublisher } from './publisher'
export type { Publisher } from './publisher'
