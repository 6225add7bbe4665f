/**
 * @gridwarden/patch-orchestrator — Firmware Applier
 *
 * The hand-off to whatever actually flashes a device. The orchestrator only
 * calls it for verified images, and treats a throw as `applying → failed`.
 *
 * SimulatedFirmwareApplier stands in for field hardware: it refuses no-op
 * updates and fails a configurable fraction of installs.
 */

import { FirmwareApplyError } from '@gridwarden/errors'
import type { GridComponent } from '@gridwarden/types'

export interface FirmwareApplyRequest {
  component: GridComponent
  target_version: string
  payload: Buffer
  checksum: string
}

export interface FirmwareApplier {
  apply(request: FirmwareApplyRequest): Promise<void>
}

export interface SimulatedApplierOptions {
  failure_rate?: number           // 0..1
  random?: () => number           // injectable for tests
  latency_ms?: number
}

export class SimulatedFirmwareApplier implements FirmwareApplier {
  private failure_rate: number
  private random: () => number
  private latency_ms: number

  constructor(options: SimulatedApplierOptions = {}) {
    const rate = options.failure_rate ?? 0
    if (rate < 0 || rate > 1) throw new RangeError(`failure_rate must be within [0, 1], got ${rate}`)
    this.failure_rate = rate
    this.random       = options.random ?? Math.random
    this.latency_ms   = options.latency_ms ?? 0
  }

  async apply(request: FirmwareApplyRequest): Promise<void> {
    const { component, target_version } = request

    if (component.firmware_version === target_version) {
      throw new FirmwareApplyError(component.name, target_version, `already running ${target_version}`)
    }

    if (this.latency_ms > 0) {
      await new Promise<void>(resolve => setTimeout(resolve, this.latency_ms))
    }

    if (this.random() < this.failure_rate) {
      throw new FirmwareApplyError(component.name, target_version, 'device did not confirm install; rolled back')
    }

    console.log(`[patch-orchestrator] ${component.name} flashed to ${target_version} (${request.payload.length} bytes)`)
  }
}
