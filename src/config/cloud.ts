/**
 * Azure cloud environments
 *
 * The Key Vault DNS suffix decides the token resource for every credential strategy.
 */

import { AzureAuthorityHosts } from '@azure/identity'

export const CLOUD_ENVIRONMENTS = [
  'AzureCloud',
  'AzureChinaCloud',
  'AzureUSGovernment',
  'AzureGermanCloud',
] as const

export type CloudEnvironmentName = typeof CLOUD_ENVIRONMENTS[number]

export interface CloudEnvironment {
  name: CloudEnvironmentName
  authorityHost: string
  keyVaultDnsSuffix: string
}

const CLOUDS: Record<CloudEnvironmentName, CloudEnvironment> = {
  AzureCloud: {
    name: 'AzureCloud',
    authorityHost: AzureAuthorityHosts.AzurePublicCloud,
    keyVaultDnsSuffix: '.vault.azure.net',
  },
  AzureChinaCloud: {
    name: 'AzureChinaCloud',
    authorityHost: AzureAuthorityHosts.AzureChina,
    keyVaultDnsSuffix: '.vault.azure.cn',
  },
  AzureUSGovernment: {
    name: 'AzureUSGovernment',
    authorityHost: AzureAuthorityHosts.AzureGovernment,
    keyVaultDnsSuffix: '.vault.usgovcloudapi.net',
  },
  AzureGermanCloud: {
    name: 'AzureGermanCloud',
    authorityHost: AzureAuthorityHosts.AzureGermany,
    keyVaultDnsSuffix: '.vault.microsoftazure.de',
  },
}

export function getCloudEnvironment(name: CloudEnvironmentName = 'AzureCloud'): CloudEnvironment {
  return CLOUDS[name]
}

/**
 * Token resource for Key Vault in the given cloud, e.g. https://vault.azure.net
 */
export function keyVaultResource(cloud: CloudEnvironment): string {
  const host = cloud.keyVaultDnsSuffix.replace(/^\./, '')
  return `https://${host}`
}

export function keyVaultScope(cloud: CloudEnvironment): string {
  return `${keyVaultResource(cloud)}/.default`
}
