/**
 * Secret reconciler
 *
 * One read, at most one write. Converges the vault onto the SecretSpec and
 * reports whether anything changed.
 */

import type { Logger } from 'pino'
import { NotFoundError } from '../errors'
import { silentLogger } from '../observability'
import type { SecretBundle, SecretStore } from '../secrets/types'
import type { ReconcileResult, SecretSpec, SecretStateReport } from './types'

export interface ReconcileOptions {
  /** Compute and report the change without writing */
  checkMode?: boolean
  logger?: Logger
}

/**
 * Fetch the latest version, or null when the secret does not exist
 */
async function fetchCurrent(store: SecretStore, name: string): Promise<SecretBundle | null> {
  try {
    return await store.getSecret(name, '')
  } catch (error) {
    if (error instanceof NotFoundError) {
      return null
    }
    throw error
  }
}

export function needsChange(spec: SecretSpec, current: SecretBundle | null): boolean {
  if (current === null) {
    return spec.state === 'present'
  }
  if (spec.state === 'absent') {
    return true
  }
  // Exact comparison, no normalisation
  return current.value !== spec.value
}

export async function reconcile(
  store: SecretStore,
  spec: SecretSpec,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const logger = (options.logger ?? silentLogger()).child({ secret: spec.name })
  const checkMode = options.checkMode ?? false

  const current = await fetchCurrent(store, spec.name)
  const changed = needsChange(spec, current)

  logger.debug({ exists: current !== null, desired: spec.state, changed, checkMode }, 'Compared secret state')

  const state: SecretStateReport = current ? { secret_id: current.id } : {}

  if (!changed) {
    return { changed, state }
  }

  if (checkMode) {
    state.status = spec.state === 'present' ? 'Created' : 'Deleted'
    logger.info({ status: state.status }, 'Check mode, skipping write')
    return { changed, state }
  }

  if (spec.state === 'present') {
    const created = await store.setSecret(spec.name, spec.value ?? '', {
      tags: spec.tags ? { ...spec.tags } : undefined,
      contentType: spec.contentType,
      notBefore: spec.validFrom,
      expiresOn: spec.expiresOn,
    })
    state.secret_id = created.id
    state.status = 'Created'
  } else {
    const deleted = await store.deleteSecret(spec.name)
    state.secret_id = deleted.id
    state.status = 'Deleted'
  }

  logger.info({ status: state.status }, 'Secret reconciled')
  return { changed, state }
}
