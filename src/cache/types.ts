/**
 * Result Cache Types
 *
 * Storage contract for memoized command results.
 */

import type { EnvSnapshot } from '../env/types'
import type { StoreReadError } from '../errors'
import type { CommandRepr } from '../types'

/**
 * A stored command result. Entries are replaced wholesale, never edited.
 */
export interface CacheEntry {
  /** 64 char hex fingerprint the entry is stored under */
  readonly key: string
  readonly stdout: Buffer
  readonly stderr: Buffer
  readonly exitCode: number
  /** When the command ran (epoch ms) */
  readonly createdAt: number
  /** How long the entry stays reusable (ms) */
  readonly ttlMs: number
  /** Human-readable command, for debugging the store by hand */
  readonly command?: string | undefined
}

export type LookupResult =
  | { readonly status: 'hit'; readonly entry: CacheEntry }
  | { readonly status: 'miss'; readonly reason: 'absent' | 'expired' }
  | { readonly status: 'error'; readonly error: StoreReadError }

export interface LookupOptions {
  /**
   * Freshness limit requested by the caller (ms). The effective TTL is the
   * smaller of this and the entry's own TTL.
   */
  readonly ttlMs?: number | undefined
}

export interface PruneResult {
  /** Expired or unreadable entries deleted */
  readonly removed: number
  /** Fresh entries left in place */
  readonly kept: number
}

/**
 * Pluggable result store.
 *
 * Implementations must guarantee that `lookup` never observes a partially
 * written entry. `lookup` never throws; read failures come back as `error`.
 */
export interface ResultCache {
  lookup(key: string, options?: LookupOptions): Promise<LookupResult>

  /**
   * Store an entry, replacing any previous one.
   * @throws StoreWriteError
   */
  put(key: string, entry: CacheEntry): Promise<void>
}

/**
 * Everything a cache key is derived from.
 */
export interface CacheKeyComponents {
  readonly command: CommandRepr
  /** Key-relevant environment; order does not matter */
  readonly env: EnvSnapshot
  /** Drained stdin, when stdin participates in the key */
  readonly stdin?: Buffer | undefined
  /** Output of the custom key pre-run, when enabled */
  readonly customKey?: string | undefined
}

/**
 * Default TTL for cached results (1 day)
 */
export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000
