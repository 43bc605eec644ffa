/**
 * Credential strategy types
 */

import type { TokenCredential } from '@azure/identity'
import type { CloudEnvironment } from '../config/cloud'
import type { AuthSource } from '../config/schema'

export type StrategyName = 'msi' | 'cli' | 'service-principal'

export interface CredentialOptions {
  authSource: AuthSource
  cloud: CloudEnvironment
  clientId?: string
  secret?: string
  tenant?: string
  /** Client id of a user-assigned managed identity */
  msiClientId?: string
  /** Timeout for the token probe, 0 for none */
  timeoutMs?: number
}

export interface CredentialContext extends CredentialOptions {
  /** Token scope for Key Vault in the selected cloud */
  scope: string
}

export type StrategyResult =
  | { ok: true; credential: TokenCredential }
  | { ok: false; reason: string; error?: Error }

export interface CredentialStrategy {
  readonly name: StrategyName
  appliesTo(authSource: AuthSource): boolean
  tryCreate(context: CredentialContext): Promise<StrategyResult>
}

/**
 * Constructors for the SDK credentials, swappable in tests
 */
export interface CredentialFactories {
  managedIdentity(options: { clientId?: string }): TokenCredential
  /** timeoutMs bounds the `az` child process */
  azureCli(options: { tenantId?: string; timeoutMs?: number }): TokenCredential
  clientSecret(
    tenantId: string,
    clientId: string,
    clientSecret: string,
    options: { authorityHost: string }
  ): TokenCredential
}

export interface ResolvedCredential {
  credential: TokenCredential
  strategy: StrategyName
  scope: string
}
