/**
 * Secret redaction
 *
 * Values of sensitive parameters must never reach logs, error messages or results.
 */

export const REDACTED = '********'

/**
 * Parameters whose values are treated as sensitive
 */
export const SENSITIVE_PARAMS = [
  'secret_value',
  'secret_valid_from',
  'secret_expiry',
  'keyvault_uri',
  'secret',
] as const

/**
 * pino redact paths covering the sensitive parameters at the top level and one level down
 */
export const LOG_REDACT_PATHS: string[] = [
  ...SENSITIVE_PARAMS,
  ...SENSITIVE_PARAMS.map(param => `*.${param}`),
  'value',
  '*.value',
  'clientSecret',
  '*.clientSecret',
]

/**
 * Pick the non-empty values of sensitive parameters out of a raw parameter map
 */
export function collectSensitiveValues(params: Record<string, unknown>): string[] {
  const values: string[] = []
  for (const key of SENSITIVE_PARAMS) {
    const value = params[key]
    if (typeof value === 'string' && value.length > 0) {
      values.push(value)
    }
  }
  return values
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Replace every occurrence of any sensitive value in text with the mask.
 * Longer values go first so one value containing another is masked whole.
 */
export function redactSecrets(text: string, sensitiveValues: readonly string[]): string {
  const candidates = [...new Set(sensitiveValues)]
    .filter(value => value.length > 0)
    .sort((a, b) => b.length - a.length)

  if (candidates.length === 0) return text

  const pattern = new RegExp(candidates.map(escapeRegExp).join('|'), 'g')
  return text.replace(pattern, REDACTED)
}
