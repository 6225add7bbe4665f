import { describe, expect, it } from '@jest/globals'
import {
  ComponentNotFoundError,
  ConfigurationError,
  InvalidScenarioError,
  PersistenceError,
  SignatureInvalidError,
  isGridWardenError,
} from '../index'

describe('error taxonomy', () => {
  it('carries a stable code, its class name and metadata', () => {
    const err = new ComponentNotFoundError('inverter-01')
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('ComponentNotFoundError')
    expect(err.code).toBe('COMPONENT_NOT_FOUND')
    expect(err.message).toBe('Component not found: inverter-01')
    expect(err.metadata).toEqual({ component: 'inverter-01' })
  })

  it('lists the known scenarios on an unknown tag', () => {
    expect(new InvalidScenarioError('teleport', ['dos', 'spoof']).message)
      .toBe('Unknown attack scenario "teleport". Known scenarios: dos, spoof')
  })

  it('keeps the rollout target on signature failures', () => {
    const err = new SignatureInvalidError('payload is empty', { component: 'meter-1', target_version: '2.0.0' })
    expect(err.metadata).toEqual({ reason: 'payload is empty', component: 'meter-1', target_version: '2.0.0' })
  })

  it('wraps the underlying failure message', () => {
    expect(new PersistenceError('create security_event', new Error('disk full')).message)
      .toBe('Persistence failure during create security_event: disk full')
    expect(new ConfigurationError(['a: bad', 'b: worse']).message).toBe('Invalid configuration: a: bad; b: worse')
  })

  it('tells domain errors from everything else', () => {
    expect(isGridWardenError(new ComponentNotFoundError('x'))).toBe(true)
    expect(isGridWardenError(new Error('x'))).toBe(false)
    expect(isGridWardenError('x')).toBe(false)
  })
})
