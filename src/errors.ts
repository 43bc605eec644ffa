/**
 * Error taxonomy
 *
 * Only NotFoundError is part of normal control flow (it drives the create path).
 * Everything else aborts the invocation and is reported to the host.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'AUTH_ERROR'
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'REMOTE_ERROR'

export class KeyVaultModuleError extends Error {
  public readonly code: ErrorCode
  public readonly details?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'KeyVaultModuleError'
    this.code = code
    this.details = details

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export class NotFoundError extends KeyVaultModuleError {
  constructor(public readonly secretName: string) {
    super('NOT_FOUND', `Secret not found: ${secretName}`)
    this.name = 'NotFoundError'
  }
}

/**
 * No credential strategy produced a usable credential
 */
export class AuthError extends KeyVaultModuleError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = 'AUTH_ERROR') {
    super(code, message, details)
    this.name = 'AuthError'
  }
}

/**
 * Credentials or settings are incomplete
 */
export class ConfigError extends AuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'CONFIG_ERROR')
    this.name = 'ConfigError'
  }
}

export class ValidationError extends KeyVaultModuleError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('VALIDATION_ERROR', message, issues.length > 0 ? { issues } : undefined)
    this.name = 'ValidationError'
  }
}

export class RemoteError extends KeyVaultModuleError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly remoteCode?: string
  ) {
    super('REMOTE_ERROR', message, { statusCode, remoteCode })
    this.name = 'RemoteError'
  }
}

export function isKeyVaultModuleError(error: unknown): error is KeyVaultModuleError {
  return error instanceof KeyVaultModuleError
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
