/**
 * @gridwarden/db-adapters — In-Memory Sequence Counter
 *
 * DEVELOPMENT: In-memory counter.
 * PRODUCTION: Swap for a database sequence or Redis INCR so arrival order
 *             holds across processes.
 *
 * Hands out the telemetry arrival sequence.
 */

export interface SequenceCounter {
  next(): number
}

export class MemorySequenceCounter implements SequenceCounter {
  private value = 0

  next(): number {
    // Synchronous on purpose: no await between read and increment
    return this.value++
  }
}
