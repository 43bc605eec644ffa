/**
 * In-Memory Secret Store
 *
 * Stand-in vault for tests and local dry runs. Keeps every version,
 * soft-deletes like Key Vault does.
 */

import { v4 as uuidv4 } from 'uuid'
import { NotFoundError } from '../errors'
import { formatSecretId } from './identifier'
import type { SecretBundle, SecretReference, SecretStore, SetSecretOptions } from './types'

interface StoredSecret {
  name: string
  versions: SecretBundle[]
}

export class InMemorySecretStore implements SecretStore {
  readonly vaultUri: string
  private secrets = new Map<string, StoredSecret>()
  private deleted = new Map<string, StoredSecret>()

  constructor(vaultUri: string, initialSecrets?: Record<string, string>) {
    this.vaultUri = vaultUri.endsWith('/') ? vaultUri : `${vaultUri}/`

    if (initialSecrets) {
      for (const [name, value] of Object.entries(initialSecrets)) {
        this.setSecretSync(name, value)
      }
    }
  }

  async getSecret(name: string, version = ''): Promise<SecretBundle> {
    const stored = this.secrets.get(name)

    if (!stored || stored.versions.length === 0) {
      throw new NotFoundError(name)
    }

    if (version) {
      const secret = stored.versions.find(v => v.version === version)
      if (!secret) {
        throw new NotFoundError(`${name}/${version}`)
      }
      return { ...secret }
    }

    // Latest version is the last one written
    return { ...stored.versions[stored.versions.length - 1] }
  }

  async setSecret(name: string, value: string, options?: SetSecretOptions): Promise<SecretReference> {
    const secret = this.setSecretSync(name, value, options)
    return { id: secret.id, name, version: secret.version }
  }

  private setSecretSync(name: string, value: string, options?: SetSecretOptions): SecretBundle {
    const version = uuidv4().replace(/-/g, '')

    const secret: SecretBundle = {
      id: formatSecretId(this.vaultUri, name, version),
      name,
      value,
      version,
      enabled: true,
      contentType: options?.contentType,
      notBefore: options?.notBefore,
      expiresOn: options?.expiresOn,
      tags: options?.tags ? { ...options.tags } : undefined,
    }

    let stored = this.secrets.get(name)
    if (!stored) {
      stored = { name, versions: [] }
      this.secrets.set(name, stored)
    }
    stored.versions.push(secret)

    return secret
  }

  async deleteSecret(name: string): Promise<SecretReference> {
    const stored = this.secrets.get(name)
    if (!stored || stored.versions.length === 0) {
      throw new NotFoundError(name)
    }

    this.secrets.delete(name)
    this.deleted.set(name, stored)

    const latest = stored.versions[stored.versions.length - 1]
    return { id: latest.id, name, version: latest.version }
  }

  /**
   * Names of soft-deleted secrets
   */
  listDeleted(): string[] {
    return Array.from(this.deleted.keys())
  }

  // Helper for testing
  clear(): void {
    this.secrets.clear()
    this.deleted.clear()
  }
}
