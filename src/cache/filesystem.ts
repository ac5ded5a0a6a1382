/**
 * Filesystem Result Cache
 *
 * Stores command results as JSON files organized by key prefix. Safe to share
 * between processes: entries are published with an atomic rename, so a reader
 * sees either the previous entry or the complete new one, never a torn write.
 *
 * Two processes missing the same key at once will both run the command; the
 * last rename wins. That is accepted: only torn entries are prevented.
 */

import { randomBytes } from 'node:crypto'
import { link, mkdir, open, readdir, readFile, rename, rm, stat } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { errorMessage, StoreReadError, StoreWriteError } from '../errors'
import { isCacheKey } from './key'
import type {
  CacheEntry,
  LookupOptions,
  LookupResult,
  PruneResult,
  ResultCache
} from './types'

const ENTRY_FORMAT_VERSION = 1
const ENTRIES_DIR = 'entries'
const TEMP_SUFFIX = '.tmp'

/** Temp files older than this were abandoned by a crashed writer */
const STALE_TEMP_MS = 60 * 60 * 1000

interface FilesystemCacheOptions {
  /** Clock used for expiry checks (epoch ms) */
  readonly now?: (() => number) | undefined
}

/**
 * Throws if tests try to access the user's real cache directory.
 * Tests must use isolated temp directories.
 */
function guardAgainstUserCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  const realCacheDir = join(homedir(), '.cache', 'runcached')
  if (cacheDir.startsWith(realCacheDir)) {
    throw new Error(
      `TEST ERROR: Attempted to access user's real cache directory!\n` +
        `  Cache dir: ${cacheDir}\n` +
        `  Tests must use isolated temp directories, not ~/.cache/runcached/`
    )
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT')
}

type EvictOutcome = 'removed' | 'kept' | 'gone'


function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function encodeEntry(key: string, entry: CacheEntry): string {
  return JSON.stringify(
    {
      version: ENTRY_FORMAT_VERSION,
      key,
      command: entry.command,
      exitCode: entry.exitCode,
      createdAt: entry.createdAt,
      ttlMs: entry.ttlMs,
      stdout: entry.stdout.toString('base64'),
      stderr: entry.stderr.toString('base64')
    },
    null,
    2
  )
}

/**
 * Decode a stored entry, checking every field.
 * @throws StoreReadError when the file is not a valid entry for `key`
 */
function decodeEntry(raw: string, key: string): CacheEntry {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new StoreReadError(`Cache entry ${key} is not valid JSON`, { cause: error })
  }

  if (!isRecord(parsed)) {
    throw new StoreReadError(`Cache entry ${key} is not an object`)
  }
  if (parsed['version'] !== ENTRY_FORMAT_VERSION) {
    const version = String(parsed['version'])
    throw new StoreReadError(`Cache entry ${key} has unsupported version ${version}`)
  }
  if (parsed['key'] !== key) {
    throw new StoreReadError(`Cache entry ${key} is stored under the wrong key`)
  }

  const { exitCode, createdAt, ttlMs, stdout, stderr, command } = parsed
  if (!Number.isInteger(exitCode) || !isFiniteNumber(exitCode)) {
    throw new StoreReadError(`Cache entry ${key} has an invalid exit code`)
  }
  if (!isFiniteNumber(createdAt) || !isFiniteNumber(ttlMs)) {
    throw new StoreReadError(`Cache entry ${key} has invalid timestamps`)
  }
  if (typeof stdout !== 'string' || typeof stderr !== 'string') {
    throw new StoreReadError(`Cache entry ${key} has invalid output`)
  }

  return {
    key,
    exitCode,
    createdAt,
    ttlMs,
    stdout: Buffer.from(stdout, 'base64'),
    stderr: Buffer.from(stderr, 'base64'),
    command: typeof command === 'string' ? command : undefined
  }
}

/**
 * Filesystem-based result cache.
 *
 * Directory structure:
 * ```
 * <cacheDir>/entries/
 * ├── ab/
 * │   └── abcd1234...json
 * ├── cd/
 * │   └── cdef5678...json
 * ```
 *
 * Uses first 2 chars of the key as subdirectory to avoid too many files in one dir.
 */
export class FilesystemCache implements ResultCache {
  private readonly now: () => number

  constructor(
    private readonly cacheDir: string,
    options: FilesystemCacheOptions = {}
  ) {
    guardAgainstUserCache(cacheDir)
    this.now = options.now ?? Date.now
  }

  /**
   * Look up an entry. Expired entries are reported as a miss but left on disk:
   * another process may already have replaced the file with a fresh entry, so
   * only `prune` deletes them.
   */
  async lookup(key: string, options: LookupOptions = {}): Promise<LookupResult> {
    if (!isCacheKey(key)) {
      return { status: 'error', error: new StoreReadError(`Invalid cache key: ${key}`) }
    }
    return this.readEntry(this.getEntryPath(key), key, options.ttlMs)
  }

  async put(key: string, entry: CacheEntry): Promise<void> {
    if (!isCacheKey(key)) {
      throw new StoreWriteError(`Invalid cache key: ${key}`)
    }

    const path = this.getEntryPath(key)
    const tempPath = join(
      dirname(path),
      `.${key}.${process.pid}.${randomBytes(6).toString('hex')}${TEMP_SUFFIX}`
    )

    try {
      await mkdir(dirname(path), { recursive: true })
      const handle = await open(tempPath, 'wx')
      try {
        await handle.writeFile(encodeEntry(key, entry))
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(tempPath, path)
    } catch (error) {
      const cleanupError = await rm(tempPath, { force: true }).then(
        () => undefined,
        (rmError: unknown) => rmError
      )
      throw new StoreWriteError(`Could not write cache entry ${key}: ${errorMessage(error)}`, {
        cause: cleanupError === undefined ? error : new AggregateError([error, cleanupError])
      })
    }
  }

  /**
   * Delete expired entries (by their own TTL), unreadable entries and
   * abandoned temp files. Not needed for correctness, only for space.
   */
  async prune(): Promise<PruneResult> {
    const entriesDir = join(this.cacheDir, ENTRIES_DIR)
    let removed = 0
    let kept = 0

    for (const shard of await this.listDir(entriesDir)) {
      const shardDir = join(entriesDir, shard)
      for (const file of await this.listDir(shardDir)) {
        const path = join(shardDir, file)

        if (file.endsWith(TEMP_SUFFIX)) {
          const info = await stat(path).catch((error: unknown) => {
            if (isNotFound(error)) return null
            throw error
          })
          if (info && this.now() - info.mtimeMs > STALE_TEMP_MS) {
            await rm(path, { force: true })
            removed++
          }
          continue
        }

        if (!file.endsWith('.json')) continue

        const key = file.slice(0, -'.json'.length)
        const result = await this.readEntry(path, key)
        if (result.status === 'hit') {
          kept++
          continue
        }
        if (result.status === 'miss' && result.reason === 'absent') continue

        const outcome = await this.evictIfStale(path, key)
        if (outcome === 'removed') removed++
        else if (outcome === 'kept') kept++
      }
    }

    return { removed, kept }
  }

  /**
   * Clear all cached entries (for testing or manual cleanup)
   */
  async clear(): Promise<void> {
    await rm(join(this.cacheDir, ENTRIES_DIR), { recursive: true, force: true })
  }

  /**
   * Get the file path for a cache entry.
   */
  getEntryPath(key: string): string {
    const prefix = key.slice(0, 2)
    return join(this.cacheDir, ENTRIES_DIR, prefix, `${key}.json`)
  }

  private async readEntry(path: string, key: string, maxTtlMs?: number): Promise<LookupResult> {
    let entry: CacheEntry
    try {
      entry = decodeEntry(await readFile(path, 'utf-8'), key)
    } catch (error) {
      if (isNotFound(error)) {
        return { status: 'miss', reason: 'absent' }
      }
      const readError =
        error instanceof StoreReadError
          ? error
          : new StoreReadError(`Could not read cache entry ${key}: ${errorMessage(error)}`, {
              cause: error
            })
      return { status: 'error', error: readError }
    }

    const ttlMs = Math.min(entry.ttlMs, maxTtlMs ?? entry.ttlMs)
    if (this.now() - entry.createdAt <= ttlMs) {
      return { status: 'hit', entry }
    }
    return { status: 'miss', reason: 'expired' }
  }

  /**
   * Delete an expired or unreadable entry without racing a concurrent `put`.
   *
   * The file is first renamed aside, then checked again. If a writer published
   * a fresh entry in between, that entry is linked back into place (unless an
   * even newer one already took its spot).
   */
  private async evictIfStale(path: string, key: string): Promise<EvictOutcome> {
    const asidePath = join(
      dirname(path),
      `.${key}.${process.pid}.${randomBytes(6).toString('hex')}.evict${TEMP_SUFFIX}`
    )
    try {
      await rename(path, asidePath)
    } catch (error) {
      if (isNotFound(error)) return 'gone'
      throw error
    }

    try {
      const recheck = await this.readEntry(asidePath, key)
      if (recheck.status !== 'hit') return 'removed'
      await link(asidePath, path).catch((error: unknown) => {
        if (!hasErrorCode(error, 'EEXIST')) throw error
      })
      return 'kept'
    } finally {
      await rm(asidePath, { force: true })
    }
  }

  private async listDir(dir: string): Promise<string[]> {
    try {
      return (await readdir(dir)).sort()
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }
  }
}
