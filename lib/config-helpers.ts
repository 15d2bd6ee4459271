/**
 * Pure helper functions for configuration logic
 * Kept free of process state for testability
 *
 * @module lib/config-helpers
 */

import { existsSync, readFileSync } from 'fs'
import {
  DEFAULT_BRIGHTNESS,
  DEFAULT_CONTRAST,
  DEFAULT_LINES,
  DEFAULT_OPTIONS_FILE,
  ENV,
} from '../const.js'
import type { ResolvedOptions } from '../types/domain.js'

/**
 * Options file interface (all keys optional)
 */
export interface Options {
  lines?: number
  contrast?: number
  brightness?: number
  debug_logging?: boolean
}

/**
 * Error thrown when options file parsing fails
 */
export class OptionsParseError extends Error {
  constructor(
    public readonly filePath: string,
    public override readonly cause: Error,
  ) {
    super(`Failed to parse config file: ${filePath}`)
    this.name = 'OptionsParseError'
  }
}

/**
 * Safely parse options JSON file
 * @param filePath - Path to the options JSON file
 * @returns Parsed options object
 * @throws OptionsParseError if file cannot be read, parsed, or is not an object
 */
export function parseOptionsFile(filePath: string): Options {
  let parsed: unknown
  try {
    const content = readFileSync(filePath, 'utf-8')
    parsed = JSON.parse(content)
  } catch (err) {
    throw new OptionsParseError(
      filePath,
      err instanceof Error ? err : new Error(String(err)),
    )
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new OptionsParseError(
      filePath,
      new Error('Expected a JSON object at the top level'),
    )
  }

  return pickOptions(parsed)
}

/**
 * Keeps the known keys that carry the right type, drops everything else
 */
function pickOptions(raw: object): Options {
  const options: Options = {}

  if ('lines' in raw && typeof raw.lines === 'number') {
    options.lines = raw.lines
  }
  if ('contrast' in raw && typeof raw.contrast === 'number') {
    options.contrast = raw.contrast
  }
  if ('brightness' in raw && typeof raw.brightness === 'number') {
    options.brightness = raw.brightness
  }
  if ('debug_logging' in raw && typeof raw.debug_logging === 'boolean') {
    options.debug_logging = raw.debug_logging
  }

  return options
}

/**
 * Locate the options file to load
 * @param env - Environment variables object
 * @param exists - File existence check (injectable for tests)
 * @returns Explicit BLOCKFIT_CONFIG path, else the default file if present
 */
export function findOptionsFile(
  env: Record<string, string | undefined>,
  exists: (path: string) => boolean = existsSync,
): string | undefined {
  const explicit = env[ENV.config]
  if (explicit) return explicit
  return exists(DEFAULT_OPTIONS_FILE) ? DEFAULT_OPTIONS_FILE : undefined
}

/**
 * Parse boolean from environment variable string
 * @param value - String value from env var
 * @param defaultValue - Default if undefined
 * @returns Parsed boolean value
 */
export function parseEnvBoolean(
  value: string | undefined,
  defaultValue: boolean,
): boolean {
  if (value === undefined) return defaultValue
  return value === 'true'
}

/**
 * Parse a finite number from environment variable string
 * @returns The number, or undefined when missing, blank or not numeric
 */
export function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/**
 * Merged options: environment variables take precedence over file config,
 * file config over built-in defaults
 */
export function mergeOptions(
  fileOptions: Options,
  env: Record<string, string | undefined>,
): ResolvedOptions {
  return {
    lines: parseEnvNumber(env[ENV.lines]) ?? fileOptions.lines ?? DEFAULT_LINES,
    contrast:
      parseEnvNumber(env[ENV.contrast]) ??
      fileOptions.contrast ??
      DEFAULT_CONTRAST,
    brightness:
      parseEnvNumber(env[ENV.brightness]) ??
      fileOptions.brightness ??
      DEFAULT_BRIGHTNESS,
    debugLogging: parseEnvBoolean(
      env[ENV.debugLogging],
      fileOptions.debug_logging ?? false,
    ),
  }
}
