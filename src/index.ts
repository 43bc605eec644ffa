// Core exports
export * from './errors'
export * from './config'
export * from './observability'

// Credential resolution
export * from './credentials'

// Vault access
export * from './secrets'

// Reconciliation
export * from './reconciler'

// Host entry point
export * from './module'
export { createProgram } from './cli/program'
export type { CliIO, CliOptions } from './cli/program'
