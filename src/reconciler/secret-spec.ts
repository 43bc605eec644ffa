import { ValidationError } from '../errors'
import type { SecretParams } from '../config/schema'
import { parseDateString } from './dates'
import type { SecretSpec } from './types'

/**
 * Turn validated parameters into a frozen SecretSpec.
 * Every check that can fail happens here, before the vault is contacted.
 */
export function buildSecretSpec(params: SecretParams): SecretSpec {
  if (params.state === 'present' && params.secret_value === undefined) {
    throw new ValidationError('secret_value is required when state is present', [
      'secret_value: required when state is present',
    ])
  }

  const spec: SecretSpec = {
    name: params.secret_name,
    value: params.secret_value,
    validFrom: parseDateString(params.secret_valid_from, 'secret_valid_from'),
    expiresOn: parseDateString(params.secret_expiry, 'secret_expiry'),
    contentType: params.content_type,
    tags: params.tags ? Object.freeze({ ...params.tags }) : undefined,
    state: params.state,
  }

  return Object.freeze(spec)
}
