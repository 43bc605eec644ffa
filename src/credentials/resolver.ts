/**
 * Credential resolver
 *
 * Walks the strategy list in order and returns the first credential that works.
 * MSI first (when asked for), then the CLI session, then the explicit service principal.
 */

import type { Logger } from 'pino'
import { AuthError } from '../errors'
import { keyVaultScope } from '../config/cloud'
import { silentLogger } from '../observability'
import { defaultStrategies } from './strategies'
import type {
  CredentialContext,
  CredentialOptions,
  CredentialStrategy,
  ResolvedCredential,
} from './types'

export interface ResolveCredentialOptions extends CredentialOptions {
  logger?: Logger
  strategies?: CredentialStrategy[]
}

export async function resolveCredential(options: ResolveCredentialOptions): Promise<ResolvedCredential> {
  const { strategies = defaultStrategies(), logger = silentLogger(), ...credentialOptions } = options

  const context: CredentialContext = {
    ...credentialOptions,
    scope: keyVaultScope(credentialOptions.cloud),
  }

  const candidates = strategies.filter(strategy => strategy.appliesTo(context.authSource))
  const failures: string[] = []
  let lastError: Error | undefined

  for (const strategy of candidates) {
    logger.debug({ strategy: strategy.name }, 'Trying credential strategy')
    const result = await strategy.tryCreate(context)

    if (result.ok) {
      logger.debug({ strategy: strategy.name }, 'Credential strategy succeeded')
      return { credential: result.credential, strategy: strategy.name, scope: context.scope }
    }

    logger.debug({ strategy: strategy.name, reason: result.reason }, 'Credential strategy failed, falling through')
    failures.push(`${strategy.name}: ${result.reason}`)
    lastError = result.error
  }

  // Incomplete explicit credentials are the most useful thing to report
  if (lastError) {
    throw lastError
  }

  throw new AuthError(
    `Unable to obtain credentials for Azure Key Vault (auth_source=${context.authSource})` +
      (failures.length > 0 ? `: ${failures.join('; ')}` : ''),
    { attempts: failures }
  )
}
