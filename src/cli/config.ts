/**
 * CLI Configuration
 *
 * Settings come from four layers, highest precedence first:
 *
 *   command-line flags > RUNCACHED_* environment variables > settings file > defaults
 *
 * The settings file lives at ~/.config/runcached/config.json (XDG standard).
 * A custom location can be given via --config-file or RUNCACHED_CONFIG.
 *
 * Environment spec lists are not overridden but aggregated across layers,
 * defaults first and command line last.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_TTL_MS } from '../cache/types'
import type { EnvSnapshot } from '../env/types'
import { ConfigError } from '../errors'
import type { StdinMode } from '../runner/stdin'
import { parseDuration } from './duration'
import { isLogLevel, type LogLevel } from './logger'

/**
 * Everything runcached can be told, before defaults are applied.
 * Each layer produces one of these.
 */
export interface SettingsLayer {
  ttlMs?: number | undefined
  keepFailures?: boolean | undefined
  stdinMode?: StdinMode | undefined
  includeEnv?: readonly string[] | undefined
  passthruEnv?: readonly string[] | undefined
  excludeEnv?: readonly string[] | undefined
  shell?: boolean | undefined
  shlex?: boolean | undefined
  customKey?: boolean | undefined
  stripColors?: boolean | undefined
  timeoutMs?: number | undefined
  cacheDir?: string | undefined
  logLevel?: LogLevel | undefined
}

/**
 * Fully resolved settings for one invocation.
 */
export interface Settings {
  ttlMs: number
  keepFailures: boolean
  stdinMode: StdinMode
  includeEnv: string[]
  passthruEnv: string[]
  excludeEnv: string[]
  shell: boolean
  shlex: boolean
  customKey: boolean
  /** Unset means "strip streams that are not a terminal" */
  stripColors: boolean | undefined
  timeoutMs: number | undefined
  cacheDir: string | undefined
  logLevel: LogLevel
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  ttlMs: DEFAULT_TTL_MS,
  keepFailures: false,
  stdinMode: 'auto',
  includeEnv: ['HOME'],
  passthruEnv: ['PATH'],
  excludeEnv: [],
  shell: false,
  shlex: false,
  customKey: false,
  stripColors: undefined,
  timeoutMs: undefined,
  cacheDir: undefined,
  logLevel: 'info'
}

export const CONFIG_ENV_VAR = 'RUNCACHED_CONFIG'
export const CACHE_DIR_ENV_VAR = 'RUNCACHED_CACHE_DIR'

// ============================================================================
// Value parsing
// ============================================================================

const TRUE_VALUES = ['true', '1', 'yes']
const FALSE_VALUES = ['false', '0', 'no']

/**
 * Parse a boolean setting. Accepts true/1/yes and false/0/no.
 */
export function parseBoolean(value: string, source: string): boolean {
  const normalized = value.trim().toLowerCase()
  if (TRUE_VALUES.includes(normalized)) return true
  if (FALSE_VALUES.includes(normalized)) return false
  throw new ConfigError(`Invalid boolean for ${source}: "${value}"`)
}

function parseLogLevel(value: string, source: string): LogLevel {
  const normalized = value.trim().toLowerCase()
  if (!isLogLevel(normalized)) {
    throw new ConfigError(`Invalid log level for ${source}: "${value}" (debug, info or warn)`)
  }
  return normalized
}

/**
 * Parse a cache TTL, naming `source` in errors.
 */
export function parseTtl(value: string | number, source: string): number {
  return withSource(source, () => parseDuration(value))
}

/**
 * Parse a child timeout, naming `source` in errors. Zero is rejected.
 */
export function parseTimeout(value: string | number, source: string): number {
  const ms = parseTtl(value, source)
  if (ms <= 0) {
    throw new ConfigError(`${source} must be greater than zero`)
  }
  return ms
}

function withSource<T>(source: string, parse: () => T): T {
  try {
    return parse()
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${source}: ${error.message}`, { cause: error })
    }
    throw error
  }
}

// ============================================================================
// Settings file
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function expectString(value: unknown, source: string): string {
  if (typeof value !== 'string') throw new ConfigError(`${source} must be a string`)
  return value
}

function expectBoolean(value: unknown, source: string): boolean {
  if (typeof value !== 'boolean') throw new ConfigError(`${source} must be true or false`)
  return value
}

function expectDuration(value: unknown, source: string): string | number {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ConfigError(`${source} must be a duration string or a number of seconds`)
  }
  return value
}

function expectSpecList(value: unknown, source: string): string[] {
  if (typeof value === 'string') return [value]
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
    return value.filter((item): item is string => typeof item === 'string')
  }
  throw new ConfigError(`${source} must be a string or a list of strings`)
}

type FileParser = (value: unknown, source: string) => SettingsLayer

/** Settings file keys, in the order they are documented */
const FILE_KEYS: Readonly<Record<string, FileParser>> = {
  ttl: (value, source) => ({ ttlMs: parseTtl(expectDuration(value, source), source) }),
  keepFailures: (value, source) => ({ keepFailures: expectBoolean(value, source) }),
  includeStdin: (value, source) => ({
    stdinMode: expectBoolean(value, source) ? 'include' : 'exclude'
  }),
  includeEnv: (value, source) => ({ includeEnv: expectSpecList(value, source) }),
  passthruEnv: (value, source) => ({ passthruEnv: expectSpecList(value, source) }),
  excludeEnv: (value, source) => ({ excludeEnv: expectSpecList(value, source) }),
  shell: (value, source) => ({ shell: expectBoolean(value, source) }),
  shlex: (value, source) => ({ shlex: expectBoolean(value, source) }),
  customKey: (value, source) => ({ customKey: expectBoolean(value, source) }),
  stripColors: (value, source) => ({ stripColors: expectBoolean(value, source) }),
  timeout: (value, source) => ({
    timeoutMs: parseTimeout(expectDuration(value, source), source)
  }),
  cacheDir: (value, source) => ({ cacheDir: expectString(value, source) }),
  logLevel: (value, source) => ({
    logLevel: parseLogLevel(expectString(value, source), source)
  })
}

/**
 * Get all valid settings file keys.
 */
export function getValidConfigKeys(): string[] {
  return Object.keys(FILE_KEYS)
}

/**
 * Get XDG config directory path for runcached.
 * Uses ~/.config/runcached on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'runcached')
}

/**
 * Get the settings file path.
 * Priority: configFile arg > RUNCACHED_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string, env: EnvSnapshot = {}): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = env[CONFIG_ENV_VAR]
  if (fromEnv) {
    return fromEnv
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Validate parsed settings file contents.
 */
export function parseConfig(raw: unknown, path: string): SettingsLayer {
  if (!isRecord(raw)) {
    throw new ConfigError(`Settings file ${path} must contain a JSON object`)
  }

  let layer: SettingsLayer = {}
  for (const [key, value] of Object.entries(raw)) {
    const parse = Object.hasOwn(FILE_KEYS, key) ? FILE_KEYS[key] : undefined
    if (!parse) {
      throw new ConfigError(`Unknown setting "${key}" in ${path}`)
    }
    layer = { ...layer, ...parse(value, `"${key}" in ${path}`) }
  }
  return layer
}

/**
 * Load the settings file.
 * Returns null if the file doesn't exist.
 *
 * @throws ConfigError when the file cannot be read or is malformed
 */
export async function loadConfig(path: string): Promise<SettingsLayer | null> {
  if (!existsSync(path)) {
    return null
  }

  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigError(`Cannot read settings file ${path}`, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`Settings file ${path} is not valid JSON`, { cause: error })
  }
  return parseConfig(raw, path)
}

// ============================================================================
// Environment variables
// ============================================================================

type EnvParser = (value: string, source: string) => SettingsLayer

const ENV_VARS: Readonly<Record<string, EnvParser>> = {
  RUNCACHED_TTL: (value, source) => ({ ttlMs: parseTtl(value, source) }),
  RUNCACHED_KEEP_FAILURES: (value, source) => ({ keepFailures: parseBoolean(value, source) }),
  RUNCACHED_INCLUDE_STDIN: (value, source) => ({
    stdinMode: parseBoolean(value, source) ? 'include' : 'exclude'
  }),
  RUNCACHED_INCLUDE_ENV: (value) => ({ includeEnv: [value] }),
  RUNCACHED_PASSTHRU_ENV: (value) => ({ passthruEnv: [value] }),
  RUNCACHED_EXCLUDE_ENV: (value) => ({ excludeEnv: [value] }),
  RUNCACHED_SHELL: (value, source) => ({ shell: parseBoolean(value, source) }),
  RUNCACHED_SHLEX: (value, source) => ({ shlex: parseBoolean(value, source) }),
  RUNCACHED_CUSTOM_KEY: (value, source) => ({ customKey: parseBoolean(value, source) }),
  RUNCACHED_STRIP_COLORS: (value, source) => ({ stripColors: parseBoolean(value, source) }),
  RUNCACHED_TIMEOUT: (value, source) => ({ timeoutMs: parseTimeout(value, source) }),
  [CACHE_DIR_ENV_VAR]: (value) => ({ cacheDir: value }),
  RUNCACHED_LOG_LEVEL: (value, source) => ({ logLevel: parseLogLevel(value, source) })
}

/**
 * Read the RUNCACHED_* variables of an environment snapshot.
 * Empty variables count as unset.
 */
export function readEnvSettings(env: EnvSnapshot): SettingsLayer {
  let layer: SettingsLayer = {}
  for (const [name, parse] of Object.entries(ENV_VARS)) {
    const value = env[name]
    if (value) {
      layer = { ...layer, ...parse(value, name) }
    }
  }
  return layer
}

// ============================================================================
// Resolution
// ============================================================================

function pick<K extends keyof SettingsLayer>(
  layers: readonly SettingsLayer[],
  key: K
): SettingsLayer[K] {
  for (const layer of layers) {
    const value = layer[key]
    if (value !== undefined) return value
  }
  return undefined
}

function collect(
  layers: readonly SettingsLayer[],
  key: 'includeEnv' | 'passthruEnv' | 'excludeEnv'
): string[] {
  return [...layers].reverse().flatMap((layer) => layer[key] ?? [])
}

/**
 * Merge layers over the defaults. Layers are given highest precedence first.
 */
export function resolveSettings(
  layers: readonly SettingsLayer[],
  defaults: Readonly<Settings> = DEFAULT_SETTINGS
): Settings {
  const all = [...layers, defaults]
  return {
    ttlMs: pick(layers, 'ttlMs') ?? defaults.ttlMs,
    keepFailures: pick(layers, 'keepFailures') ?? defaults.keepFailures,
    stdinMode: pick(layers, 'stdinMode') ?? defaults.stdinMode,
    includeEnv: collect(all, 'includeEnv'),
    passthruEnv: collect(all, 'passthruEnv'),
    excludeEnv: collect(all, 'excludeEnv'),
    shell: pick(layers, 'shell') ?? defaults.shell,
    shlex: pick(layers, 'shlex') ?? defaults.shlex,
    customKey: pick(layers, 'customKey') ?? defaults.customKey,
    stripColors: pick(layers, 'stripColors') ?? defaults.stripColors,
    timeoutMs: pick(layers, 'timeoutMs') ?? defaults.timeoutMs,
    cacheDir: pick(layers, 'cacheDir') ?? defaults.cacheDir,
    logLevel: pick(layers, 'logLevel') ?? defaults.logLevel
  }
}

/**
 * Get the cache directory.
 * Priority: setting > $XDG_CACHE_HOME/runcached > ~/.cache/runcached
 */
export function resolveCacheDir(cacheDir: string | undefined, env: EnvSnapshot): string {
  if (cacheDir) {
    return cacheDir
  }
  const xdgCacheHome = env['XDG_CACHE_HOME']
  if (xdgCacheHome) {
    return join(xdgCacheHome, 'runcached')
  }
  return join(homedir(), '.cache', 'runcached')
}
