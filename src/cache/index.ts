/**
 * Cache Module
 *
 * Key derivation and storage for memoized command results.
 */

export { FilesystemCache } from './filesystem'
export { CACHE_KEY_LENGTH, deriveCacheKey, isCacheKey } from './key'
export type {
  CacheEntry,
  CacheKeyComponents,
  LookupOptions,
  LookupResult,
  PruneResult,
  ResultCache
} from './types'
export { DEFAULT_TTL_MS } from './types'
