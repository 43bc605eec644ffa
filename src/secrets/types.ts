/**
 * Secret store types
 *
 * A SecretStore is bound to a single vault and covers the three remote
 * operations the reconciler needs.
 */

export interface SecretBundle {
  /** Full identifier: <vaultUri>secrets/<name>/<version> */
  id: string
  name: string
  value: string
  version?: string
  contentType?: string
  enabled?: boolean
  notBefore?: Date
  expiresOn?: Date
  tags?: Record<string, string>
}

export interface SetSecretOptions {
  contentType?: string
  tags?: Record<string, string>
  notBefore?: Date
  expiresOn?: Date
}

export interface SecretReference {
  id: string
  name: string
  version?: string
}

export interface SecretStore {
  /** Vault endpoint this store is bound to */
  readonly vaultUri: string

  /**
   * Get a secret (latest version when version is empty)
   * @throws NotFoundError when the secret does not exist
   */
  getSecret(name: string, version?: string): Promise<SecretBundle>

  /**
   * Create a secret, or add a new version to an existing one
   */
  setSecret(name: string, value: string, options?: SetSecretOptions): Promise<SecretReference>

  /**
   * Delete a secret (soft delete where the vault supports recovery)
   */
  deleteSecret(name: string): Promise<SecretReference>
}
