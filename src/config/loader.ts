/**
 * Args file loader
 *
 * The host writes invocation parameters to a file (JSON or YAML) or pipes them on stdin.
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { ValidationError, errorMessage } from '../errors'

/**
 * Parse an args document. YAML is a superset of JSON, so one parser covers both.
 */
export function parseModuleArgs(content: string, source = 'input'): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = yaml.load(content)
  } catch (error) {
    // The YAML snippet in the full message could contain a secret value
    const reason = error instanceof yaml.YAMLException
      ? `${error.reason} at line ${error.mark.line + 1}`
      : errorMessage(error)
    throw new ValidationError(`Failed to parse module arguments from ${source}: ${reason}`)
  }

  if (parsed === undefined || parsed === null) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError(`Module arguments in ${source} must be a mapping`)
  }

  return Object.fromEntries(Object.entries(parsed))
}

/**
 * Load and parse an args file
 * @throws ValidationError if the file is missing or malformed
 */
export function loadModuleArgs(filePath: string): Record<string, unknown> {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ValidationError(`Args file not found: ${absolutePath}`)
  }

  return parseModuleArgs(readFileSync(absolutePath, 'utf-8'), filePath)
}
