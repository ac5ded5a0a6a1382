/**
 * CLI Driver
 *
 * Wires argument parsing, settings, the environment resolver, the cache and
 * the orchestrator together for one invocation. Everything process-global
 * (streams, environment, clock, spawning) comes in through parameters.
 */

import { FilesystemCache } from '../cache/filesystem'
import { parseEnvSpecs } from '../env/spec'
import { resolveEnvironment } from '../env/resolver'
import type { EnvSnapshot } from '../env/types'
import { errorMessage, exitCodeForError } from '../errors'
import { buildCommand } from '../runner/command'
import { type Executor, spawnExecutor } from '../runner/execute'
import { type RunEvent, runCached } from '../runner/orchestrator'
import { readStdin, shouldIncludeStdin } from '../runner/stdin'
import { type CLIArgs, logLevelFromArgs, parseArgs, settingsFromArgs } from './args'
import {
  getConfigPath,
  loadConfig,
  readEnvSettings,
  resolveCacheDir,
  resolveSettings,
  type Settings
} from './config'
import { type OutputStream, shouldStrip, writeResult } from './io'
import { createLogger, type LogStream, type Logger } from './logger'

const DEFAULT_SHELL = '/bin/sh'

export interface CliIO {
  readonly stdin: NodeJS.ReadableStream & { readonly isTTY?: boolean | undefined }
  readonly stdout: OutputStream & LogStream
  readonly stderr: OutputStream & LogStream
  /** Snapshot of the invoking environment */
  readonly env: EnvSnapshot
}

export interface CliDeps {
  readonly execute?: Executor | undefined
  /** Clock (epoch ms) */
  readonly now?: (() => number) | undefined
}

/**
 * Render orchestrator progress as log lines.
 */
export function renderEvent(event: RunEvent, logger: Logger): void {
  switch (event.type) {
    case 'custom-key':
      logger.verbose(`Custom key: ${event.length} characters (exit ${event.exitCode})`)
      break
    case 'key-derived':
      logger.verbose(`Cache key ${event.key}`)
      break
    case 'cache-hit':
      logger.log(`Using cached result from ${new Date(event.createdAt).toISOString()}`)
      break
    case 'cache-miss':
      logger.log(
        event.reason === 'expired'
          ? 'Cached result expired, running command again'
          : 'No cached result found, running command'
      )
      break
    case 'store-read-error':
      logger.warn(`Ignoring unreadable cache entry: ${event.error.message}`)
      break
    case 'executing':
      logger.verbose(`Running: ${event.command}`)
      break
    case 'cached':
      logger.verbose(`Cached result (exit ${event.exitCode})`)
      break
    case 'not-cached':
      logger.warn(
        `Command exited with ${event.exitCode} and --keep-failures is not set; not caching`
      )
      break
    case 'store-write-error':
      logger.warn(`Could not cache result: ${event.error.message}`)
      break
  }
}

/**
 * Resolve settings from the command line, RUNCACHED_* variables and the
 * settings file.
 */
export async function loadSettings(args: CLIArgs, env: EnvSnapshot): Promise<Settings> {
  const cli = settingsFromArgs(args)
  const fromEnv = readEnvSettings(env)
  const file = await loadConfig(getConfigPath(args.configFile, env))
  return resolveSettings([cli, fromEnv, file ?? {}])
}

async function execute(
  args: CLIArgs,
  settings: Settings,
  io: CliIO,
  deps: CliDeps,
  logger: Logger
): Promise<number> {
  const cacheDir = resolveCacheDir(settings.cacheDir, io.env)
  const cache = new FilesystemCache(cacheDir, { now: deps.now })
  logger.verbose(`Cache directory ${cacheDir}`)

  if (args.prune) {
    const { removed, kept } = await cache.prune()
    logger.verbose(`Pruned ${removed} entries, kept ${kept}`)
    if (args.command.length === 0) return 0
  }

  const command = buildCommand(args.command, { shell: settings.shell, requote: settings.shlex })
  const env = resolveEnvironment(
    {
      include: parseEnvSpecs(settings.includeEnv, 'include'),
      passthru: parseEnvSpecs(settings.passthruEnv, 'passthru'),
      exclude: parseEnvSpecs(settings.excludeEnv, 'exclude')
    },
    io.env
  )
  const stdin = shouldIncludeStdin(settings.stdinMode, io.stdin.isTTY)
    ? await readStdin(io.stdin)
    : undefined

  const outcome = await runCached(
    {
      command,
      env,
      stdin,
      ttlMs: settings.ttlMs,
      keepFailures: settings.keepFailures,
      customKey: settings.customKey,
      shellPath: io.env['SHELL'] || DEFAULT_SHELL,
      timeoutMs: settings.timeoutMs
    },
    {
      cache,
      execute: deps.execute ?? spawnExecutor,
      now: deps.now,
      onEvent: (event) => renderEvent(event, logger)
    }
  )

  await writeResult(outcome.result, io, {
    stdout: shouldStrip(settings.stripColors, io.stdout),
    stderr: shouldStrip(settings.stripColors, io.stderr)
  })
  return outcome.result.exitCode
}

/**
 * Run one invocation and return the exit code for the process.
 * Never rejects: failures are logged and mapped to an exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO,
  deps: CliDeps = {}
): Promise<number> {
  const parsed = parseArgs(argv, {
    writeOut: (str) => {
      io.stdout.write(str)
    },
    writeErr: (str) => {
      io.stderr.write(str)
    }
  })
  if (parsed.kind === 'exit') {
    return parsed.exitCode
  }

  const { args } = parsed
  let logger = createLogger(logLevelFromArgs(args) ?? 'info', io.stderr)
  try {
    const settings = await loadSettings(args, io.env)
    logger = createLogger(settings.logLevel, io.stderr)
    return await execute(args, settings, io, deps, logger)
  } catch (error) {
    logger.error(errorMessage(error))
    if (error instanceof Error && error.stack) {
      logger.verbose(error.stack)
    }
    return exitCodeForError(error)
  }
}
