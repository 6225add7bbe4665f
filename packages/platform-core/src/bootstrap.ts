/**
 * @gridwarden/platform-core — Platform Bootstrap
 *
 * The single startup function for a long-running process. Call it once;
 * later calls return the same platform.
 *
 *   1. Load and validate configuration (fails fast on bad env)
 *   2. Build the platform on the process-wide event bus
 *   3. Warm detector baselines from stored telemetry
 */

import { getEventBus } from '@gridwarden/event-bus'
import { loadConfig } from './config'
import { createPlatform, type GridWardenPlatform, type PlatformOptions } from './platform'

let _platform: GridWardenPlatform | null = null

export function getPlatform(): GridWardenPlatform {
  if (!_platform) throw new Error('Platform not bootstrapped. Call bootstrapPlatform() first.')
  return _platform
}

export async function bootstrapPlatform(options: PlatformOptions = {}): Promise<GridWardenPlatform> {
  if (_platform) return _platform

  console.log('[platform] Bootstrapping GridWarden...')

  // ── 1. Configuration ────────────────────────────────────────────────────────
  const config = options.config ?? loadConfig()
  const keys = Object.keys(config.patch.keyring)
  console.log(`[platform] Config loaded — ${keys.length} trusted signing key(s)`)

  // ── 2. Wiring ───────────────────────────────────────────────────────────────
  const platform = createPlatform({ ...options, config, bus: options.bus ?? getEventBus() })
  console.log(`[platform] Detectors ready: [${platform.engine.detectorIds().join(', ')}]`)

  // ── 3. Baselines ────────────────────────────────────────────────────────────
  await platform.primeBaselines()

  _platform = platform
  console.log('[platform] GridWarden bootstrap complete')
  console.log(`[platform] Bus stats: ${JSON.stringify(platform.bus.getStats())}`)
  return platform
}

/** Stops background work and forgets the singleton. */
export function shutdownPlatform(): void {
  _platform?.shutdown()
  _platform = null
}
