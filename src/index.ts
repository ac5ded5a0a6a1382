/**
 * runcached Core Library
 *
 * Memoize the output of arbitrary commands.
 *
 * Design principle: the library never logs and never touches the ambient
 * process environment. The CLI supplies snapshots, streams and a logger.
 */

// Cache module
export type {
  CacheEntry,
  CacheKeyComponents,
  LookupOptions,
  LookupResult,
  PruneResult,
  ResultCache
} from './cache/index'
export {
  CACHE_KEY_LENGTH,
  DEFAULT_TTL_MS,
  deriveCacheKey,
  FilesystemCache,
  isCacheKey
} from './cache/index'
// Environment selection
export type {
  EnvSelector,
  EnvSnapshot,
  EnvSpec,
  EnvTier,
  ResolvedEnvironment
} from './env/index'
export { parseEnvSpecs, resolveEnvironment, snapshotEnv } from './env/index'
// Errors
export {
  ConfigError,
  ExecutionError,
  exitCodeForError,
  NOT_EXECUTABLE_EXIT_CODE,
  NOT_FOUND_EXIT_CODE,
  RuncachedError,
  StdinReadError,
  StoreReadError,
  StoreWriteError,
  TOOL_FAILURE_EXIT_CODE
} from './errors'
// Runner
export type {
  ExecuteRequest,
  Executor,
  RunCachedDeps,
  RunCachedOptions,
  RunEvent,
  RunOutcome,
  StdinMode
} from './runner/index'
export {
  buildCommand,
  CUSTOM_KEY_ENV_VAR,
  quoteArg,
  readStdin,
  runCached,
  shouldIncludeStdin,
  spawnExecutor
} from './runner/index'
// Shared types
export type { CommandRepr, CommandResult } from './types'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
