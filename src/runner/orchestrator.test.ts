import { existsSync, mkdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest'
import { FilesystemCache } from '../cache/filesystem'
import type { CacheEntry, LookupResult, ResultCache } from '../cache/types'
import { parseEnvSpecs } from '../env/spec'
import { resolveEnvironment } from '../env/resolver'
import type { ResolvedEnvironment } from '../env/types'
import { ExecutionError, StoreReadError, StoreWriteError } from '../errors'
import type { CommandResult } from '../types'
import type { ExecuteRequest, Executor } from './execute'
import {
  CUSTOM_KEY_ENV_VAR,
  type RunCachedOptions,
  type RunEvent,
  runCached
} from './orchestrator'

const HOUR = 60 * 60 * 1000
const NO_ENV: ResolvedEnvironment = { keyEnv: {}, processEnv: {} }

function result(stdout: string, exitCode = 0, stderr = ''): CommandResult {
  return { stdout: Buffer.from(stdout), stderr: Buffer.from(stderr), exitCode }
}

function echoHi(overrides: Partial<RunCachedOptions> = {}): RunCachedOptions {
  return {
    command: { shell: false, argv: ['echo', 'hi'] },
    env: NO_ENV,
    ttlMs: HOUR,
    keepFailures: false,
    ...overrides
  }
}

/**
 * In-memory store with switchable failures.
 */
class MemoryCache implements ResultCache {
  readonly entries = new Map<string, CacheEntry>()
  failReads = false
  failWrites = false

  async lookup(key: string): Promise<LookupResult> {
    if (this.failReads) {
      return { status: 'error', error: new StoreReadError('disk on fire') }
    }
    const entry = this.entries.get(key)
    return entry ? { status: 'hit', entry } : { status: 'miss', reason: 'absent' }
  }

  async put(key: string, entry: CacheEntry): Promise<void> {
    if (this.failWrites) throw new StoreWriteError('disk full')
    this.entries.set(key, entry)
  }
}

describe('runCached', () => {
  let testDir: string
  let now: number
  let cache: FilesystemCache
  let execute: Mock<Executor>
  let events: RunEvent[]

  beforeEach(() => {
    testDir = join(tmpdir(), `runcached-run-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
    now = 1_700_000_000_000
    cache = new FilesystemCache(testDir, { now: () => now })
    execute = vi.fn(async (_request: ExecuteRequest) => result('hi\n'))
    events = []
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  function deps() {
    return { cache, execute, now: () => now, onEvent: (event: RunEvent) => events.push(event) }
  }

  it('executes on the first call and replays on the second', async () => {
    const first = await runCached(echoHi(), deps())
    const second = await runCached(echoHi(), deps())

    expect(execute).toHaveBeenCalledTimes(1)
    expect(first.fromCache).toBe(false)
    expect(first.stored).toBe(true)
    expect(second.fromCache).toBe(true)
    expect(second.result.stdout.toString()).toBe('hi\n')
    expect(second.result.exitCode).toBe(0)
    expect(second.key).toBe(first.key)
  })

  it('reports the state transitions as events', async () => {
    const outcome = await runCached(echoHi(), deps())

    expect(events.map((event) => event.type)).toEqual([
      'key-derived',
      'cache-miss',
      'executing',
      'cached'
    ])
    expect(events[2]).toEqual({ type: 'executing', command: 'echo hi' })
    expect(events[3]).toEqual({ type: 'cached', key: outcome.key, exitCode: 0 })
  })

  it('re-executes once the TTL has passed', async () => {
    await runCached(echoHi(), deps())
    now += HOUR + 1
    const outcome = await runCached(echoHi(), deps())

    expect(execute).toHaveBeenCalledTimes(2)
    expect(outcome.fromCache).toBe(false)
    expect(events).toContainEqual({ type: 'cache-miss', key: outcome.key, reason: 'expired' })
  })

  it('replays right up to the TTL', async () => {
    await runCached(echoHi(), deps())
    now += HOUR

    expect((await runCached(echoHi(), deps())).fromCache).toBe(true)
  })

  it('replays stderr and the exit code exactly', async () => {
    execute.mockResolvedValue(result('partial', 2, 'boom\n'))
    await runCached(echoHi({ keepFailures: true }), deps())

    const replay = await runCached(echoHi({ keepFailures: true }), deps())

    expect(replay.fromCache).toBe(true)
    expect(replay.result.stdout.toString()).toBe('partial')
    expect(replay.result.stderr.toString()).toBe('boom\n')
    expect(replay.result.exitCode).toBe(2)
  })

  it('does not cache failures by default', async () => {
    execute.mockResolvedValue(result('', 1, 'nope'))

    const first = await runCached(echoHi(), deps())
    const second = await runCached(echoHi(), deps())

    expect(execute).toHaveBeenCalledTimes(2)
    expect(first.stored).toBe(false)
    expect(second.result.exitCode).toBe(1)
    expect(events).toContainEqual({ type: 'not-cached', key: first.key, exitCode: 1 })
  })

  it('caches failures with keepFailures', async () => {
    execute.mockResolvedValue(result('', 1, 'nope'))

    await runCached(echoHi({ keepFailures: true }), deps())
    const second = await runCached(echoHi({ keepFailures: true }), deps())

    expect(execute).toHaveBeenCalledTimes(1)
    expect(second.fromCache).toBe(true)
    expect(second.result.exitCode).toBe(1)
  })

  it('keeps separate entries for different key-relevant env values', async () => {
    const selector = {
      include: parseEnvSpecs(['A'], 'include'),
      passthru: [],
      exclude: []
    }
    const env1 = resolveEnvironment(selector, { A: '1' })
    const env2 = resolveEnvironment(selector, { A: '2' })
    execute.mockImplementation(async (request) => result(`A=${request.env['A'] ?? ''}`))

    const first = await runCached(echoHi({ env: env1 }), deps())
    const second = await runCached(echoHi({ env: env2 }), deps())
    const firstAgain = await runCached(echoHi({ env: env1 }), deps())
    const secondAgain = await runCached(echoHi({ env: env2 }), deps())

    expect(first.key).not.toBe(second.key)
    expect(execute).toHaveBeenCalledTimes(2)
    expect(firstAgain.result.stdout.toString()).toBe('A=1')
    expect(secondAgain.result.stdout.toString()).toBe('A=2')
  })

  it('ignores passthru-only values when matching', async () => {
    const first = await runCached(
      echoHi({ env: { keyEnv: {}, processEnv: { PATH: '/bin' } } }),
      deps()
    )
    const second = await runCached(
      echoHi({ env: { keyEnv: {}, processEnv: { PATH: '/usr/bin' } } }),
      deps()
    )

    expect(second.key).toBe(first.key)
    expect(second.fromCache).toBe(true)
  })

  it('executes with the process environment and buffered stdin', async () => {
    const stdin = Buffer.from('input')
    await runCached(
      echoHi({
        env: { keyEnv: { A: '1' }, processEnv: { A: '1', PATH: '/bin' } },
        stdin,
        shellPath: '/bin/bash',
        timeoutMs: 5000
      }),
      deps()
    )

    expect(execute).toHaveBeenCalledWith({
      command: { shell: false, argv: ['echo', 'hi'] },
      env: { A: '1', PATH: '/bin' },
      stdin,
      shellPath: '/bin/bash',
      timeoutMs: 5000
    })
  })

  it('keys on stdin contents', async () => {
    const first = await runCached(echoHi({ stdin: Buffer.from('one') }), deps())
    const second = await runCached(echoHi({ stdin: Buffer.from('two') }), deps())

    expect(first.key).not.toBe(second.key)
    expect(execute).toHaveBeenCalledTimes(2)
  })

  it('treats a store read error as a miss', async () => {
    const memory = new MemoryCache()
    memory.failReads = true

    const outcome = await runCached(echoHi(), { ...deps(), cache: memory })

    expect(outcome.result.stdout.toString()).toBe('hi\n')
    expect(execute).toHaveBeenCalledTimes(1)
    expect(events.find((event) => event.type === 'store-read-error')).toBeDefined()
  })

  it('returns the fresh result when the store cannot be written', async () => {
    const memory = new MemoryCache()
    memory.failWrites = true

    const outcome = await runCached(echoHi(), { ...deps(), cache: memory })

    expect(outcome.result.stdout.toString()).toBe('hi\n')
    expect(outcome.stored).toBe(false)
    expect(events.map((event) => event.type)).toContain('store-write-error')
  })

  it('propagates errors that are not store failures', async () => {
    const memory = new MemoryCache()
    memory.put = async () => {
      throw new TypeError('bug')
    }

    await expect(runCached(echoHi(), { ...deps(), cache: memory })).rejects.toThrow('bug')
  })

  it('propagates execution errors without caching', async () => {
    execute.mockRejectedValue(new ExecutionError('Could not start echo', 'ENOENT'))
    const memory = new MemoryCache()

    await expect(runCached(echoHi(), { ...deps(), cache: memory })).rejects.toBeInstanceOf(
      ExecutionError
    )
    expect(memory.entries.size).toBe(0)
  })

  it('stores the creation time and TTL on the entry', async () => {
    const memory = new MemoryCache()
    const outcome = await runCached(echoHi({ ttlMs: 5000 }), { ...deps(), cache: memory })

    const entry = memory.entries.get(outcome.key)
    expect(entry?.createdAt).toBe(now)
    expect(entry?.ttlMs).toBe(5000)
    expect(entry?.command).toBe('echo hi')
  })

  describe('custom key', () => {
    it('pre-runs the command with the marker variable and keys on its output', async () => {
      execute.mockImplementation(async (request) =>
        request.env[CUSTOM_KEY_ENV_VAR] === '1' ? result('version-1') : result('hi\n')
      )

      const first = await runCached(echoHi({ customKey: true }), deps())
      const second = await runCached(echoHi({ customKey: true }), deps())

      // One pre-run per invocation, one real run
      expect(execute).toHaveBeenCalledTimes(3)
      expect(execute.mock.calls[0]?.[0].env).toEqual({ [CUSTOM_KEY_ENV_VAR]: '1' })
      expect(second.fromCache).toBe(true)
      expect(second.key).toBe(first.key)
      expect(events).toContainEqual({ type: 'custom-key', exitCode: 0, length: 9 })
    })

    it('misses when the custom key output changes', async () => {
      let version = 'v1'
      execute.mockImplementation(async (request) =>
        request.env[CUSTOM_KEY_ENV_VAR] === '1' ? result(version) : result('hi\n')
      )

      const first = await runCached(echoHi({ customKey: true }), deps())
      version = 'v2'
      const second = await runCached(echoHi({ customKey: true }), deps())

      expect(second.key).not.toBe(first.key)
      expect(second.fromCache).toBe(false)
    })
  })
})
