/**
 * Cache Key Generation
 *
 * Generates deterministic SHA256 keys for command invocations.
 *
 * Every field is written as a labelled, length-prefixed frame, so no
 * combination of values can be rearranged into another: `A=B` + command `C`
 * and `A` + command `B=C` hash differently.
 */

import { createHash, type Hash } from 'node:crypto'
import type { CacheKeyComponents } from './types'

const KEY_FORMAT_VERSION = 'runcached-key-v1'

/** Length of a derived key (hex chars). */
export const CACHE_KEY_LENGTH = 64

const CACHE_KEY_PATTERN = /^[0-9a-f]{64}$/

function frame(hash: Hash, label: string, data: string | Buffer): void {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data
  hash.update(`${label}:${bytes.length}:`)
  hash.update(bytes)
  hash.update('\n')
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Generate the cache key for a command invocation.
 *
 * @example
 * ```ts
 * const key = deriveCacheKey({
 *   command: { shell: false, argv: ['echo', 'hi'] },
 *   env: { HOME: '/home/me' }
 * })
 * // Returns: '9f2c...' (64 char hex string)
 * ```
 */
export function deriveCacheKey(components: CacheKeyComponents): string {
  const { command, env, stdin, customKey } = components
  const hash = createHash('sha256')

  frame(hash, 'version', KEY_FORMAT_VERSION)

  if (command.shell) {
    frame(hash, 'mode', 'shell')
    frame(hash, 'script', command.script)
  } else {
    frame(hash, 'mode', 'exec')
    frame(hash, 'argc', String(command.argv.length))
    for (const arg of command.argv) frame(hash, 'arg', arg)
  }

  const names = Object.keys(env).sort(compareNames)
  frame(hash, 'envc', String(names.length))
  for (const name of names) {
    frame(hash, 'env-name', name)
    frame(hash, 'env-value', env[name] ?? '')
  }

  // Absent and empty are different inputs
  if (stdin === undefined) frame(hash, 'stdin', 'absent')
  else frame(hash, 'stdin-bytes', stdin)

  if (customKey === undefined) frame(hash, 'custom', 'absent')
  else frame(hash, 'custom-key', customKey)

  return hash.digest('hex')
}

/**
 * Check that a string has the shape of a derived key.
 */
export function isCacheKey(value: string): boolean {
  return CACHE_KEY_PATTERN.test(value)
}
