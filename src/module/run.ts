/**
 * Module entry point
 *
 * validate parameters -> build secret spec -> resolve credential -> reconcile.
 * Every failure comes back as a failure envelope with sensitive values masked.
 */

import type { TokenCredential } from '@azure/identity'
import type { Logger } from 'pino'
import { applyEnvironmentDefaults } from '../config/environment'
import { getCloudEnvironment } from '../config/cloud'
import { validateModuleParams } from '../config/schema'
import { isKeyVaultModuleError, errorMessage, type ErrorCode } from '../errors'
import { collectSensitiveValues, redactSecrets, silentLogger } from '../observability'
import { resolveCredential } from '../credentials/resolver'
import type { CredentialStrategy } from '../credentials/types'
import { createAzureSecretStore } from '../secrets/azure-key-vault'
import type { SecretStore } from '../secrets/types'
import { buildSecretSpec } from '../reconciler/secret-spec'
import { reconcile } from '../reconciler/reconcile'
import type { ReconcileResult } from '../reconciler/types'

/** Codes a failed invocation reports; a missing secret is never one of them */
export type FailureCode = Exclude<ErrorCode, 'NOT_FOUND'>

export interface ModuleFailure {
  failed: true
  changed: false
  msg: string
  error: FailureCode
}

export type ModuleOutput = ReconcileResult | ModuleFailure

export interface StoreFactoryConfig {
  vaultUri: string
  credential: TokenCredential
  timeoutMs: number
}

export interface ModuleDependencies {
  logger?: Logger
  /** Environment used for connection defaults */
  env?: Record<string, string | undefined>
  /** Credential strategies, in order (defaults to msi, cli, service principal) */
  strategies?: CredentialStrategy[]
  createStore?: (config: StoreFactoryConfig) => SecretStore
}

export function isModuleFailure(output: ModuleOutput): output is ModuleFailure {
  return 'failed' in output && output.failed === true
}

export async function runModule(
  rawParams: Record<string, unknown>,
  deps: ModuleDependencies = {}
): Promise<ModuleOutput> {
  const logger = deps.logger ?? silentLogger()
  const merged = applyEnvironmentDefaults(rawParams, deps.env ?? process.env)
  const sensitiveValues = collectSensitiveValues(merged)

  try {
    const params = validateModuleParams(merged)
    const spec = buildSecretSpec(params)
    const log = logger.child({ secret: spec.name })

    const resolved = await resolveCredential({
      authSource: params.auth_source,
      cloud: getCloudEnvironment(params.cloud_environment),
      clientId: params.client_id,
      secret: params.secret,
      tenant: params.tenant,
      msiClientId: params.msi_client_id,
      timeoutMs: params.timeout_ms,
      logger: log,
      strategies: deps.strategies,
    })
    log.debug({ strategy: resolved.strategy }, 'Resolved Key Vault credential')

    const createStore = deps.createStore ?? createAzureSecretStore
    const store = createStore({
      vaultUri: params.keyvault_uri,
      credential: resolved.credential,
      timeoutMs: params.timeout_ms,
    })

    return await reconcile(store, spec, { checkMode: params.check_mode, logger: log })
  } catch (error) {
    const code = failureCode(error)
    const msg = redactSecrets(errorMessage(error), sensitiveValues)

    logger.error({ code }, msg)
    return { failed: true, changed: false, msg, error: code }
  }
}

/**
 * A NotFoundError that escapes the reconciler means the secret vanished
 * between the read and the write, which is a remote failure.
 */
function failureCode(error: unknown): FailureCode {
  if (!isKeyVaultModuleError(error)) return 'REMOTE_ERROR'

  const { code } = error
  return code === 'NOT_FOUND' ? 'REMOTE_ERROR' : code
}
