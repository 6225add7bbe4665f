/**
 * @gridwarden/platform-core — Public API
 */

export { loadConfig, loadKeyring } from './config'
export type { GridWardenConfig } from './config'
export {
  GENESIS_HASH,
  blockHash,
  hashPayload,
  startAuditSubscriber,
  verifyAuditChain,
} from './audit-subscriber'
export type { AuditSubscriberOptions, ChainVerification } from './audit-subscriber'
export { DEFAULT_FIXTURE_PATH, DemoTelemetryFeed, jitterPayload, loadFixture } from './demo-feed'
export type { DemoFeedDeps, DemoFeedOptions, FeedTick, FixtureNode } from './demo-feed'
export { GridWardenPlatform, createPlatform } from './platform'
export type { ActivitySummary, PlatformOptions } from './platform'
export { bootstrapPlatform, getPlatform, shutdownPlatform } from './bootstrap'
