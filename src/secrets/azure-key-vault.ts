/**
 * Azure Key Vault Secret Store
 *
 * Production implementation on top of @azure/keyvault-secrets
 */

import {
  SecretClient,
  type BeginDeleteSecretOptions,
  type DeletedSecret,
  type GetSecretOptions,
  type KeyVaultSecret,
  type SetSecretOptions as SdkSetSecretOptions,
} from '@azure/keyvault-secrets'
import type { TokenCredential } from '@azure/identity'
import { NotFoundError, RemoteError, errorMessage } from '../errors'
import { formatSecretId, normalizeSecretId } from './identifier'
import type { SecretBundle, SecretReference, SecretStore, SetSecretOptions } from './types'

/**
 * The slice of SecretClient this store calls
 */
export interface SecretClientLike {
  getSecret(name: string, options?: GetSecretOptions): Promise<KeyVaultSecret>
  setSecret(name: string, value: string, options?: SdkSetSecretOptions): Promise<KeyVaultSecret>
  beginDeleteSecret(name: string, options?: BeginDeleteSecretOptions): Promise<{ getResult(): DeletedSecret | undefined }>
}

export interface AzureKeyVaultConfig {
  vaultUri: string
  credential: TokenCredential
  /** Per-request timeout; 0 leaves it to the HTTP client */
  timeoutMs?: number
  /** Pre-built client (tests) */
  client?: SecretClientLike
}

interface RestErrorShape {
  statusCode?: number
  code?: string
}

function restErrorShape(error: unknown): RestErrorShape {
  if (typeof error !== 'object' || error === null) return {}
  const shape: RestErrorShape = {}
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    shape.statusCode = error.statusCode
  }
  if ('code' in error && typeof error.code === 'string') {
    shape.code = error.code
  }
  return shape
}

export class AzureKeyVaultSecretStore implements SecretStore {
  readonly vaultUri: string
  private client: SecretClientLike
  private timeoutMs: number

  constructor(config: AzureKeyVaultConfig) {
    this.vaultUri = config.vaultUri.endsWith('/') ? config.vaultUri : `${config.vaultUri}/`
    this.timeoutMs = config.timeoutMs ?? 0

    // No retries: a transient failure surfaces to the caller as-is
    this.client = config.client ?? new SecretClient(this.vaultUri, config.credential, {
      retryOptions: { maxRetries: 0 },
    })
  }

  async getSecret(name: string, version = ''): Promise<SecretBundle> {
    let secret: KeyVaultSecret
    try {
      secret = await this.client.getSecret(name, {
        version: version || undefined,
        ...this.requestOptions(),
      })
    } catch (error) {
      const { statusCode } = restErrorShape(error)
      if (statusCode === 404) {
        throw new NotFoundError(name)
      }
      throw this.remoteError('get', name, error)
    }

    return this.mapAzureSecret(secret)
  }

  async setSecret(name: string, value: string, options?: SetSecretOptions): Promise<SecretReference> {
    let secret: KeyVaultSecret
    try {
      secret = await this.client.setSecret(name, value, {
        tags: options?.tags,
        contentType: options?.contentType,
        notBefore: options?.notBefore,
        expiresOn: options?.expiresOn,
        ...this.requestOptions(),
      })
    } catch (error) {
      throw this.remoteError('set', name, error)
    }

    return this.reference(secret.properties.id, name, secret.properties.version)
  }

  async deleteSecret(name: string): Promise<SecretReference> {
    let deleted: DeletedSecret | undefined
    try {
      // The poller has already issued the delete; we don't wait for the purge
      const poller = await this.client.beginDeleteSecret(name, this.requestOptions())
      deleted = poller.getResult()
    } catch (error) {
      throw this.remoteError('delete', name, error)
    }

    return this.reference(deleted?.properties.id, name, deleted?.properties.version)
  }

  private requestOptions(): { requestOptions?: { timeout: number } } {
    return this.timeoutMs > 0 ? { requestOptions: { timeout: this.timeoutMs } } : {}
  }

  private reference(id: string | undefined, name: string, version?: string): SecretReference {
    if (id) {
      return normalizeSecretId(id)
    }
    return { id: formatSecretId(this.vaultUri, name, version), name, version }
  }

  private remoteError(operation: string, name: string, error: unknown): RemoteError {
    const { statusCode, code } = restErrorShape(error)
    return new RemoteError(
      `Failed to ${operation} secret ${name}: ${errorMessage(error)}`,
      statusCode,
      code
    )
  }

  private mapAzureSecret(secret: KeyVaultSecret): SecretBundle {
    const { properties } = secret
    const ref = this.reference(properties.id, secret.name, properties.version)
    return {
      id: ref.id,
      name: secret.name,
      value: secret.value ?? '',
      version: ref.version,
      contentType: properties.contentType,
      enabled: properties.enabled,
      notBefore: properties.notBefore,
      expiresOn: properties.expiresOn,
      tags: properties.tags,
    }
  }
}

/**
 * Factory for the production store
 */
export function createAzureSecretStore(config: AzureKeyVaultConfig): SecretStore {
  return new AzureKeyVaultSecretStore(config)
}
