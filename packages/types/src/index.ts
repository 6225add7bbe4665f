/**
 * @gridwarden/types — Main Export
 *
 * The shared language for the whole platform.
 * Every package and the operator CLI imports from here.
 */

export * from './domain'
export * from './events'
export * from './stores'
