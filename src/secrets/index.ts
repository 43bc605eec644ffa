/**
 * Secret stores
 */

export * from './types'
export * from './identifier'
export * from './in-memory-secrets'
export * from './azure-key-vault'
