/**
 * Zod schemas for module invocation parameters
 * Validates what the orchestration host hands us
 */

import { z } from 'zod'
import { ValidationError } from '../errors'
import { CLOUD_ENVIRONMENTS } from './cloud'

export const SECRET_STATES = ['present', 'absent'] as const
export const AUTH_SOURCES = ['auto', 'cli', 'msi', 'explicit'] as const

export type SecretState = typeof SECRET_STATES[number]
export type AuthSource = typeof AUTH_SOURCES[number]

export const DEFAULT_TIMEOUT_MS = 30000

/**
 * Parameters that describe the secret itself
 */
export const SecretParamsSchema = z.object({
  secret_name: z.string().min(1, 'secret_name must not be empty'),
  secret_value: z.string().optional(),
  secret_valid_from: z.string().optional(),
  secret_expiry: z.string().optional(),
  keyvault_uri: z
    .string()
    .url('keyvault_uri must be an absolute URL')
    .transform(uri => (uri.endsWith('/') ? uri : `${uri}/`)),
  state: z.enum(SECRET_STATES).default('present'),
  content_type: z.string().optional(),
  // YAML args files read `version: 1` as a number, tags are strings in the vault
  tags: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).optional(),
})

/**
 * Connection and authentication parameters shared by every Azure module
 */
export const AuthParamsSchema = z.object({
  auth_source: z.enum(AUTH_SOURCES).default('auto'),
  client_id: z.string().optional(),
  secret: z.string().optional(),
  tenant: z.string().optional(),
  msi_client_id: z.string().optional(),
  cloud_environment: z.enum(CLOUD_ENVIRONMENTS).default('AzureCloud'),
  timeout_ms: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
})

const ModuleParamsObjectSchema = SecretParamsSchema.merge(AuthParamsSchema).extend({
  check_mode: z.boolean().default(false),
})

/**
 * The host sends null for options the playbook left unset
 */
function dropNulls(input: unknown): unknown {
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    return input
  }
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== null))
}

export const ModuleParamsSchema = z.preprocess(
  dropNulls,
  ModuleParamsObjectSchema.superRefine((params, ctx) => {
    if (params.state === 'present' && params.secret_value === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['secret_value'],
        message: 'secret_value is required when state is present',
      })
    }
  })
)

export type SecretParams = z.infer<typeof SecretParamsSchema>
export type AuthParams = z.infer<typeof AuthParamsSchema>
export type ModuleParams = z.infer<typeof ModuleParamsSchema>

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

/**
 * Validate and parse parameters with defaults
 * @throws ValidationError listing every issue
 */
export function validateModuleParams(raw: unknown): ModuleParams {
  const result = ModuleParamsSchema.safeParse(raw)

  if (!result.success) {
    const issues = formatIssues(result.error)
    throw new ValidationError(`Invalid module parameters: ${issues.join('; ')}`, issues)
  }

  return result.data
}

/**
 * Validate parameters with detailed error messages
 */
export function validateModuleParamsSafe(raw: unknown): { success: true; data: ModuleParams } | { success: false; errors: string[] } {
  const result = ModuleParamsSchema.safeParse(raw)

  if (result.success) {
    return { success: true, data: result.data }
  }

  return { success: false, errors: formatIssues(result.error) }
}
