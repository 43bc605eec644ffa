/**
 * Environment Configuration
 *
 * Azure connection settings can come from the environment instead of the
 * invocation parameters. Parameters always win.
 */

import dotenv from 'dotenv'

type Env = Record<string, string | undefined>

/**
 * Auth-related parameters as found in the environment (unvalidated)
 */
export interface AzureEnvironmentParams {
  auth_source?: string
  client_id?: string
  secret?: string
  tenant?: string
  msi_client_id?: string
  cloud_environment?: string
  timeout_ms?: string
}

function firstDefined(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]
    if (value !== undefined && value !== '') return value
  }
  return undefined
}

/**
 * Load a .env file from the working directory into process.env, if present
 */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : undefined)
}

/**
 * Read Azure connection settings from environment variables
 */
export function loadAzureEnvironment(env: Env = process.env): AzureEnvironmentParams {
  const params: AzureEnvironmentParams = {
    auth_source: firstDefined(env, 'AZURE_AUTH_SOURCE'),
    client_id: firstDefined(env, 'AZURE_CLIENT_ID'),
    secret: firstDefined(env, 'AZURE_SECRET', 'AZURE_CLIENT_SECRET'),
    tenant: firstDefined(env, 'AZURE_TENANT', 'AZURE_TENANT_ID'),
    msi_client_id: firstDefined(env, 'AZURE_MSI_CLIENT_ID'),
    cloud_environment: firstDefined(env, 'AZURE_CLOUD_ENVIRONMENT'),
    timeout_ms: firstDefined(env, 'AZURE_KEYVAULT_TIMEOUT_MS'),
  }

  // Only keep what is actually set so spreading never clobbers parameters
  return Object.fromEntries(
    Object.entries(params).filter(([, value]) => value !== undefined)
  )
}

/**
 * Merge environment defaults under the caller's parameters.
 * A parameter set to null or left out falls back to the environment.
 */
export function applyEnvironmentDefaults(
  params: Record<string, unknown>,
  env: Env = process.env
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...loadAzureEnvironment(env) }

  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) {
      merged[key] = value
    }
  }

  return merged
}
