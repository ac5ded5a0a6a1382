/**
 * CLI Argument Parsing
 *
 * Uses commander. Everything after the first operand (or after `--`) belongs
 * to the command being cached, even when it looks like an option.
 */

import { Command, CommanderError } from 'commander'
import { TOOL_FAILURE_EXIT_CODE } from '../errors'
import { VERSION } from '../index'
import { getValidConfigKeys, parseTimeout, parseTtl, type SettingsLayer } from './config'
import type { LogLevel } from './logger'

export interface CLIArgs {
  /** COMMAND and its arguments */
  command: string[]
  ttl: string | undefined
  keepFailures: boolean | undefined
  includeStdin: boolean
  excludeStdin: boolean
  includeEnv: string[]
  passthruEnv: string[]
  excludeEnv: string[]
  shell: boolean | undefined
  shlex: boolean | undefined
  customKey: boolean | undefined
  stripColors: boolean | undefined
  timeout: string | undefined
  cacheDir: string | undefined
  configFile: string | undefined
  prune: boolean
  quiet: boolean
  verbose: boolean
}

export type ParseResult =
  | { readonly kind: 'run'; readonly args: CLIArgs }
  /** Help, version or a usage error was already printed */
  | { readonly kind: 'exit'; readonly exitCode: number }

export interface ParseOutput {
  writeOut: (str: string) => void
  writeErr: (str: string) => void
}

const DESCRIPTION = `Run COMMAND, caching its stdout, stderr and exit code. Later runs with the
same command, environment and stdin replay the cached result until it expires.

Environment specs (for -e, -p, -E) are comma- or space-separated:
  NAME           forward the current value
  NAME=value     set a value
  PREFIX_*       every current variable matching the glob (not for -p)

Included variables are part of the cache key, passthru variables only reach
the command, excluded variables are removed from both. Nothing else is passed.

Durations: 90, 500ms, 10s, 5m, 1h30m, 2d, 1w or 1:30:00.`

function epilog(): string {
  return `
Settings file keys: ${getValidConfigKeys().join(', ')}

Examples:
  $ runcached -t 1h -- curl -s https://example.com/data.json
  $ runcached -e AWS_PROFILE aws s3 ls
  $ runcached -s 'git log --oneline | head -20'
  $ echo query | runcached -t 10m ./lookup.sh`
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

function createProgram(): Command {
  return new Command()
    .name('runcached')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    .argument('[command...]', 'Command to run and its arguments')
    .option('-t, --ttl <duration>', 'Max age of a reusable result (default: 1d)')
    .option('-F, --keep-failures', 'Cache results that exit non-zero too')
    .option('-i, --include-stdin', 'Include stdin in the cache key (default when not a TTY)')
    .option('-I, --exclude-stdin', 'Never read stdin (wins over --include-stdin)')
    .option('-e, --include-env <vars>', 'Key-relevant env specs (default: HOME)', collect, [])
    .option('-p, --passthru-env <vars>', 'Forwarded-only env specs (default: PATH)', collect, [])
    .option('-E, --exclude-env <vars>', 'Env specs removed everywhere', collect, [])
    .option('-s, --shell', 'Run COMMAND through $SHELL -c')
    .option('-S, --no-shell', 'Run COMMAND directly (default)')
    .option('-l, --shlex', 'Quote each token before joining it into the shell script')
    .option('-L, --no-shlex', 'Join tokens verbatim (default)')
    .option('-k, --custom-key', 'Pre-run COMMAND with RUNCACHED_KEY=1; its output joins the key')
    .option('-c, --strip-colors', 'Strip ANSI escapes from output (default when not a TTY)')
    .option('-C, --no-strip-colors', 'Keep ANSI escapes in output')
    .option('--timeout <duration>', 'Kill the command after this long')
    .option('--cache-dir <dir>', 'Cache directory (or set RUNCACHED_CACHE_DIR)')
    .option('--config-file <path>', 'Settings file path (or set RUNCACHED_CONFIG)')
    .option('--prune', 'Remove expired entries before running')
    .option('-q, --quiet', 'Only print warnings and errors')
    .option('-v, --verbose', 'Print debug output')
    .passThroughOptions()
    .addHelpText('after', epilog())
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

function buildCLIArgs(command: string[], opts: Record<string, unknown>): CLIArgs {
  return {
    command,
    ttl: optionalString(opts.ttl),
    keepFailures: optionalBoolean(opts.keepFailures),
    includeStdin: opts.includeStdin === true,
    excludeStdin: opts.excludeStdin === true,
    includeEnv: stringList(opts.includeEnv),
    passthruEnv: stringList(opts.passthruEnv),
    excludeEnv: stringList(opts.excludeEnv),
    shell: optionalBoolean(opts.shell),
    shlex: optionalBoolean(opts.shlex),
    customKey: optionalBoolean(opts.customKey),
    stripColors: optionalBoolean(opts.stripColors),
    timeout: optionalString(opts.timeout),
    cacheDir: optionalString(opts.cacheDir),
    configFile: optionalString(opts.configFile),
    prune: opts.prune === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true
  }
}

/**
 * Parse CLI arguments from an argv array (without the node and script paths).
 * Never exits the process: help, version and usage errors come back as
 * `{ kind: 'exit' }` after commander has printed them.
 */
export function parseArgs(argv: readonly string[], output?: ParseOutput): ParseResult {
  const program = createProgram().exitOverride()
  if (output) {
    program.configureOutput(output)
  }

  let result: CLIArgs | null = null
  program.action((command: string[]) => {
    result = buildCLIArgs(command, program.opts())
  })

  try {
    program.parse([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return { kind: 'exit', exitCode: error.exitCode === 0 ? 0 : TOOL_FAILURE_EXIT_CODE }
    }
    throw error
  }

  return result ? { kind: 'run', args: result } : { kind: 'exit', exitCode: 0 }
}

function stdinModeFromArgs(args: CLIArgs): SettingsLayer['stdinMode'] {
  if (args.excludeStdin) return 'exclude'
  if (args.includeStdin) return 'include'
  return undefined
}

export function logLevelFromArgs(args: CLIArgs): LogLevel | undefined {
  if (args.verbose) return 'debug'
  if (args.quiet) return 'warn'
  return undefined
}

/**
 * The command-line settings layer.
 *
 * @throws ConfigError on a malformed duration
 */
export function settingsFromArgs(args: CLIArgs): SettingsLayer {
  return {
    ttlMs: args.ttl === undefined ? undefined : parseTtl(args.ttl, '--ttl'),
    keepFailures: args.keepFailures,
    stdinMode: stdinModeFromArgs(args),
    includeEnv: args.includeEnv,
    passthruEnv: args.passthruEnv,
    excludeEnv: args.excludeEnv,
    shell: args.shell,
    shlex: args.shlex,
    customKey: args.customKey,
    stripColors: args.stripColors,
    timeoutMs: args.timeout === undefined ? undefined : parseTimeout(args.timeout, '--timeout'),
    cacheDir: args.cacheDir,
    logLevel: logLevelFromArgs(args)
  }
}
