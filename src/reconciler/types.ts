import type { SecretState } from '../config/schema'

/**
 * Desired state of one secret. Built once per invocation, never mutated.
 */
export interface SecretSpec {
  readonly name: string
  readonly value?: string
  readonly validFrom?: Date
  readonly expiresOn?: Date
  readonly contentType?: string
  readonly tags?: Readonly<Record<string, string>>
  readonly state: SecretState
}

export type SecretStatus = 'Created' | 'Deleted'

/**
 * What the host sees under `state`. Never carries the secret value.
 */
export interface SecretStateReport {
  secret_id?: string
  status?: SecretStatus
}

export interface ReconcileResult {
  changed: boolean
  state: SecretStateReport
}
