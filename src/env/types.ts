/**
 * Environment Selection Types
 */

/** Which list a spec came from. Determines forwarding and key relevance. */
export type EnvTier = 'include' | 'passthru' | 'exclude'

/**
 * One entry of an include/passthru/exclude list.
 *
 * - `forward`: `NAME`, take the value from the current environment
 * - `assign`: `NAME=value`, use the given value
 * - `pattern`: `AWS_*`, every current variable whose name matches
 */
export type EnvSpec =
  | { readonly kind: 'forward'; readonly name: string }
  | { readonly kind: 'assign'; readonly name: string; readonly value: string }
  | { readonly kind: 'pattern'; readonly pattern: string }

export interface EnvSelector {
  /** Forwarded to the child and part of the cache key */
  readonly include: readonly EnvSpec[]
  /** Forwarded to the child only */
  readonly passthru: readonly EnvSpec[]
  /** Neither forwarded nor part of the key. Overrides both other lists. */
  readonly exclude: readonly EnvSpec[]
}

/** An immutable name → value mapping. */
export type EnvSnapshot = Readonly<Record<string, string>>

export interface ResolvedEnvironment {
  /** Variables that participate in the cache key */
  readonly keyEnv: EnvSnapshot
  /** Complete environment handed to the child process */
  readonly processEnv: EnvSnapshot
}
