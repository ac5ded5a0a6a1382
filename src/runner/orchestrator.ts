/**
 * Execution Orchestrator
 *
 * Decides between replaying a cached result and running the command:
 *
 *   START → KEY_DERIVED → CACHE_HIT → REPLAY → DONE
 *                       → CACHE_MISS → EXECUTING → MAYBE_CACHE → DONE
 *
 * Store read failures count as misses and store write failures leave the run
 * uncached; neither changes the result handed back. Only a command that
 * cannot be started aborts the run.
 *
 * The orchestrator does no logging of its own. Progress is reported through
 * `onEvent` for the caller to render.
 */

import { deriveCacheKey } from '../cache/key'
import type { ResultCache } from '../cache/types'
import type { ResolvedEnvironment } from '../env/types'
import { StoreWriteError, type StoreReadError } from '../errors'
import type { CommandRepr, CommandResult } from '../types'
import { describeCommand } from './command'
import type { Executor } from './execute'

/** Set (to "1") in the environment of the custom key pre-run */
export const CUSTOM_KEY_ENV_VAR = 'RUNCACHED_KEY'

export type RunEvent =
  | { readonly type: 'custom-key'; readonly exitCode: number; readonly length: number }
  | { readonly type: 'key-derived'; readonly key: string }
  | { readonly type: 'cache-hit'; readonly key: string; readonly createdAt: number }
  | { readonly type: 'cache-miss'; readonly key: string; readonly reason: 'absent' | 'expired' }
  | { readonly type: 'store-read-error'; readonly key: string; readonly error: StoreReadError }
  | { readonly type: 'executing'; readonly command: string }
  | { readonly type: 'cached'; readonly key: string; readonly exitCode: number }
  | { readonly type: 'not-cached'; readonly key: string; readonly exitCode: number }
  | { readonly type: 'store-write-error'; readonly key: string; readonly error: StoreWriteError }

export interface RunCachedOptions {
  readonly command: CommandRepr
  readonly env: ResolvedEnvironment
  /** Drained stdin. Present exactly when stdin participates in the key. */
  readonly stdin?: Buffer | undefined
  /** Max age of a reusable result (ms) */
  readonly ttlMs: number
  /** Cache results that exit non-zero */
  readonly keepFailures: boolean
  /** Pre-run the command with RUNCACHED_KEY=1 and hash its stdout too */
  readonly customKey?: boolean | undefined
  readonly shellPath?: string | undefined
  readonly timeoutMs?: number | undefined
}

export interface RunCachedDeps {
  readonly cache: ResultCache
  readonly execute: Executor
  /** Clock (epoch ms) */
  readonly now?: (() => number) | undefined
  readonly onEvent?: ((event: RunEvent) => void) | undefined
}

export interface RunOutcome {
  readonly key: string
  readonly result: CommandResult
  /** Whether the result was replayed from the cache */
  readonly fromCache: boolean
  /** Whether this run stored a new entry */
  readonly stored: boolean
}

async function computeCustomKey(options: RunCachedOptions, deps: RunCachedDeps): Promise<string> {
  const result = await deps.execute({
    command: options.command,
    env: { ...options.env.processEnv, [CUSTOM_KEY_ENV_VAR]: '1' },
    stdin: options.stdin,
    shellPath: options.shellPath,
    timeoutMs: options.timeoutMs
  })
  const customKey = result.stdout.toString('utf-8')
  deps.onEvent?.({ type: 'custom-key', exitCode: result.exitCode, length: customKey.length })
  return customKey
}

/**
 * Run a command through the cache.
 *
 * @throws ExecutionError when the command cannot be started
 */
export async function runCached(
  options: RunCachedOptions,
  deps: RunCachedDeps
): Promise<RunOutcome> {
  const now = deps.now ?? Date.now
  const emit = (event: RunEvent): void => deps.onEvent?.(event)

  const customKey = options.customKey ? await computeCustomKey(options, deps) : undefined
  const key = deriveCacheKey({
    command: options.command,
    env: options.env.keyEnv,
    stdin: options.stdin,
    customKey
  })
  emit({ type: 'key-derived', key })

  const lookup = await deps.cache.lookup(key, { ttlMs: options.ttlMs })
  switch (lookup.status) {
    case 'hit': {
      const { entry } = lookup
      emit({ type: 'cache-hit', key, createdAt: entry.createdAt })
      return {
        key,
        result: { stdout: entry.stdout, stderr: entry.stderr, exitCode: entry.exitCode },
        fromCache: true,
        stored: false
      }
    }
    case 'miss':
      emit({ type: 'cache-miss', key, reason: lookup.reason })
      break
    case 'error':
      emit({ type: 'store-read-error', key, error: lookup.error })
      break
  }

  const command = describeCommand(options.command)
  emit({ type: 'executing', command })
  const createdAt = now()
  const result = await deps.execute({
    command: options.command,
    env: options.env.processEnv,
    stdin: options.stdin,
    shellPath: options.shellPath,
    timeoutMs: options.timeoutMs
  })

  if (result.exitCode !== 0 && !options.keepFailures) {
    emit({ type: 'not-cached', key, exitCode: result.exitCode })
    return { key, result, fromCache: false, stored: false }
  }

  try {
    await deps.cache.put(key, { key, ...result, createdAt, ttlMs: options.ttlMs, command })
  } catch (error) {
    if (!(error instanceof StoreWriteError)) throw error
    emit({ type: 'store-write-error', key, error })
    return { key, result, fromCache: false, stored: false }
  }

  emit({ type: 'cached', key, exitCode: result.exitCode })
  return { key, result, fromCache: false, stored: true }
}
