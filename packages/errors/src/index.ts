/**
 * @gridwarden/errors — Domain Error Taxonomy
 *
 * Every failure the core reports to a caller is one of these.
 * `code` is stable and safe to branch on; `metadata` carries the identifiers
 * an operator needs to find the offending record.
 *
 * Only PersistenceError is meant to travel all the way up: detection must
 * never lose an event it already decided to raise.
 */

export abstract class GridWardenError extends Error {
  readonly code: string
  readonly metadata: Record<string, unknown>

  constructor(message: string, code: string, metadata: Record<string, unknown> = {}) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.metadata = metadata
  }
}

/**
 * Telemetry payload could not be understood. The reading is still stored
 * (severity `normal`) but no detector runs on it.
 */
export class InvalidPayloadError extends GridWardenError {
  constructor(reason: string, component?: string) {
    super(`Invalid telemetry payload: ${reason}`, 'INVALID_PAYLOAD', { reason, component })
  }
}

/** Unknown attack simulation tag. Raised before anything is generated or recorded. */
export class InvalidScenarioError extends GridWardenError {
  constructor(attack_type: string, known: readonly string[]) {
    super(
      `Unknown attack scenario "${attack_type}". Known scenarios: ${known.join(', ')}`,
      'INVALID_SCENARIO',
      { attack_type, known: [...known] }
    )
  }
}

/**
 * Patch payload failed signature validation. Recorded as a terminal
 * `rejected` rollout plus a critical event; never fatal.
 */
export class SignatureInvalidError extends GridWardenError {
  constructor(reason: string, details: { component: string; target_version: string; key_id?: string }) {
    super(`Patch signature invalid: ${reason}`, 'SIGNATURE_INVALID', { reason, ...details })
  }
}

export class InvalidTransitionError extends GridWardenError {
  constructor(patch_id: string, from: string, to: string) {
    super(`Rollout ${patch_id} cannot move from ${from} to ${to}`, 'INVALID_TRANSITION', { patch_id, from, to })
  }
}

export class RolloutInProgressError extends GridWardenError {
  constructor(component: string, active_patch_id: string, active_status: string) {
    super(
      `Component ${component} already has rollout ${active_patch_id} in state ${active_status}`,
      'ROLLOUT_IN_PROGRESS',
      { component, active_patch_id, active_status }
    )
  }
}

/** The firmware applier could not install a verified patch. The rollout ends `failed`. */
export class FirmwareApplyError extends GridWardenError {
  constructor(component: string, target_version: string, reason: string) {
    super(
      `Firmware ${target_version} could not be applied to ${component}: ${reason}`,
      'FIRMWARE_APPLY_FAILED',
      { component, target_version, reason }
    )
  }
}

export class ComponentNotFoundError extends GridWardenError {
  constructor(component: string) {
    super(`Component not found: ${component}`, 'COMPONENT_NOT_FOUND', { component })
  }
}

export class DuplicateComponentError extends GridWardenError {
  constructor(component: string) {
    super(`Component already registered: ${component}`, 'DUPLICATE_COMPONENT', { component })
  }
}

/** A row referenced a component that does not exist (foreign key violation). */
export class ReferentialIntegrityError extends GridWardenError {
  constructor(table: string, component_id: string) {
    super(
      `${table} row references missing component ${component_id}`,
      'REFERENTIAL_INTEGRITY',
      { table, component_id }
    )
  }
}

export class RecordNotFoundError extends GridWardenError {
  constructor(table: string, id: string) {
    super(`${table} record not found: ${id}`, 'RECORD_NOT_FOUND', { table, id })
  }
}

/** The store could not take a write. Always propagated. */
export class PersistenceError extends GridWardenError {
  constructor(operation: string, underlying: unknown) {
    super(
      `Persistence failure during ${operation}: ${underlying instanceof Error ? underlying.message : String(underlying)}`,
      'PERSISTENCE_FAILURE',
      { operation, underlying }
    )
  }
}

/** Operator input (registration, annotation) failed validation. */
export class ValidationError extends GridWardenError {
  constructor(subject: string, issues: string[]) {
    super(`Invalid ${subject}: ${issues.join('; ')}`, 'VALIDATION_FAILED', { subject, issues })
  }
}

export class ConfigurationError extends GridWardenError {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIGURATION', { issues })
  }
}

export function isGridWardenError(err: unknown): err is GridWardenError {
  return err instanceof GridWardenError
}
