/**
 * Builds the engine configuration from rule files
 * @module config/loader
 */

import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import type { EngineConfig } from '../types/config'
import { ConfigurationError } from '../utils/errors.js'
import { validateEngineConfig } from './validation.js'

/** Rule file shipped with the package */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../config/catalog-rules.json', import.meta.url),
)

function parseRules(text: string, path: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(
      `Rule file '${path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { path },
    )
  }
}

/**
 * Creates a configuration from the shipped rules with top-level overrides applied.
 *
 * @example
 * ```typescript
 * const config = createEngineConfig({ lookupTimeoutMs: 2000, concurrency: 8 })
 * ```
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const defaults = validateEngineConfig(
    parseRules(readFileSync(DEFAULT_RULES_PATH, 'utf8'), DEFAULT_RULES_PATH),
  )
  return validateEngineConfig({ ...defaults, ...overrides })
}

/**
 * Loads and validates a configuration from a JSON rule file.
 *
 * @throws {ConfigurationError} If the file cannot be read or is invalid
 */
export async function loadEngineConfig(path: string): Promise<EngineConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read rule file '${path}': ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { path },
    )
  }
  return validateEngineConfig(parseRules(text, path))
}
