import { parseKeyVaultSecretIdentifier, type KeyVaultSecretIdentifier } from '@azure/keyvault-secrets'
import { RemoteError } from '../errors'

/**
 * Build a secret identifier: <vaultUri>secrets/<name>/<version>
 */
export function formatSecretId(vaultUri: string, name: string, version?: string): string {
  const base = vaultUri.endsWith('/') ? vaultUri : `${vaultUri}/`
  return version ? `${base}secrets/${name}/${version}` : `${base}secrets/${name}`
}

/**
 * Canonical form of an identifier returned by the vault.
 * Deleted-secret ids (/deletedsecrets/...) are mapped back to the /secrets/ form.
 */
export function normalizeSecretId(id: string): { id: string; name: string; version?: string } {
  let parsed: KeyVaultSecretIdentifier
  try {
    parsed = parseKeyVaultSecretIdentifier(id)
  } catch {
    throw new RemoteError(`Vault returned a malformed secret identifier: ${id}`)
  }

  return {
    id: formatSecretId(parsed.vaultUrl, parsed.name, parsed.version),
    name: parsed.name,
    version: parsed.version,
  }
}
