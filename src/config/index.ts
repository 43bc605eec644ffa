/**
 * Configuration module
 * Zod-validated invocation parameters, environment fallbacks and cloud endpoints
 */

export * from './schema'
export * from './cloud'
export * from './environment'
export * from './loader'
