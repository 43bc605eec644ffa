/**
 * Credential strategies
 *
 * Each strategy reports success or a reason; none of them throws for an
 * ordinary failure, so the resolver can move on to the next one.
 */

import {
  AzureCliCredential,
  ClientSecretCredential,
  ManagedIdentityCredential,
  type TokenCredential,
} from '@azure/identity'
import { ConfigError, errorMessage } from '../errors'
import type { AuthSource } from '../config/schema'
import type {
  CredentialContext,
  CredentialFactories,
  CredentialStrategy,
  StrategyName,
  StrategyResult,
} from './types'

export const DEFAULT_TENANT = 'common'

export const azureCredentialFactories: CredentialFactories = {
  managedIdentity: ({ clientId }) =>
    clientId ? new ManagedIdentityCredential({ clientId }) : new ManagedIdentityCredential(),
  azureCli: ({ tenantId, timeoutMs }) =>
    new AzureCliCredential({ tenantId, processTimeoutInMs: timeoutMs || undefined }),
  clientSecret: (tenantId, clientId, clientSecret, { authorityHost }) =>
    new ClientSecretCredential(tenantId, clientId, clientSecret, { authorityHost }),
}

/**
 * Acquire one token to prove the credential works in this environment
 */
async function probe(credential: TokenCredential, context: CredentialContext): Promise<StrategyResult> {
  try {
    const token = await credential.getToken(
      context.scope,
      context.timeoutMs ? { requestOptions: { timeout: context.timeoutMs } } : undefined
    )
    if (!token) {
      return { ok: false, reason: 'no access token returned' }
    }
    return { ok: true, credential }
  } catch (error) {
    return { ok: false, reason: errorMessage(error) }
  }
}

/**
 * Managed identity of the host (VM, App Service, AKS pod identity ...)
 */
export class ManagedIdentityStrategy implements CredentialStrategy {
  readonly name: StrategyName = 'msi'

  constructor(private factories: CredentialFactories = azureCredentialFactories) {}

  appliesTo(authSource: AuthSource): boolean {
    return authSource === 'msi'
  }

  async tryCreate(context: CredentialContext): Promise<StrategyResult> {
    let credential: TokenCredential
    try {
      credential = this.factories.managedIdentity({ clientId: context.msiClientId })
    } catch (error) {
      return { ok: false, reason: errorMessage(error) }
    }
    return probe(credential, context)
  }
}

/**
 * Session of a local `az login`
 */
export class AzureCliStrategy implements CredentialStrategy {
  readonly name: StrategyName = 'cli'

  constructor(private factories: CredentialFactories = azureCredentialFactories) {}

  appliesTo(authSource: AuthSource): boolean {
    return authSource === 'auto' || authSource === 'cli' || authSource === 'msi'
  }

  async tryCreate(context: CredentialContext): Promise<StrategyResult> {
    let credential: TokenCredential
    try {
      credential = this.factories.azureCli({ tenantId: context.tenant, timeoutMs: context.timeoutMs })
    } catch (error) {
      return { ok: false, reason: errorMessage(error) }
    }
    return probe(credential, context)
  }
}

/**
 * Explicit service principal. Always the last resort.
 * The token is fetched lazily on the first vault call.
 */
export class ServicePrincipalStrategy implements CredentialStrategy {
  readonly name: StrategyName = 'service-principal'

  constructor(private factories: CredentialFactories = azureCredentialFactories) {}

  appliesTo(): boolean {
    return true
  }

  async tryCreate(context: CredentialContext): Promise<StrategyResult> {
    if (!context.clientId || !context.secret) {
      const error = new ConfigError(
        'Please specify client_id, secret and tenant to access Azure Key Vault'
      )
      return { ok: false, reason: error.message, error }
    }

    const tenant = context.tenant || DEFAULT_TENANT

    try {
      return {
        ok: true,
        credential: this.factories.clientSecret(tenant, context.clientId, context.secret, {
          authorityHost: context.cloud.authorityHost,
        }),
      }
    } catch (error) {
      const reason = errorMessage(error)
      return {
        ok: false,
        reason,
        error: new ConfigError(`Invalid service principal configuration: ${reason}`),
      }
    }
  }
}

export function defaultStrategies(factories: CredentialFactories = azureCredentialFactories): CredentialStrategy[] {
  return [
    new ManagedIdentityStrategy(factories),
    new AzureCliStrategy(factories),
    new ServicePrincipalStrategy(factories),
  ]
}
