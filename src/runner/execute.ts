/**
 * Command Execution
 *
 * The one place a child process is spawned. Runs to completion, capturing
 * stdout and stderr in full.
 */

import { spawn } from 'node:child_process'
import { constants } from 'node:os'
import { ExecutionError, errorMessage } from '../errors'
import type { CommandRepr, CommandResult } from '../types'
import { describeCommand } from './command'

const DEFAULT_SHELL = '/bin/sh'

export interface ExecuteRequest {
  readonly command: CommandRepr
  /** Complete child environment; nothing else is inherited */
  readonly env: Readonly<Record<string, string>>
  /** Bytes to feed the child. When absent the child inherits our stdin. */
  readonly stdin?: Buffer | undefined
  /** Shell used in shell mode (default /bin/sh) */
  readonly shellPath?: string | undefined
  /** Kill the child with SIGTERM after this many ms */
  readonly timeoutMs?: number | undefined
}

/**
 * Runs a command and resolves with its captured result.
 * Rejects with ExecutionError only when the command could not be started.
 */
export type Executor = (request: ExecuteRequest) => Promise<CommandResult>

/**
 * Exit code for a child that ended by signal, following the shell convention.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0)
}

export const spawnExecutor: Executor = (request) =>
  new Promise<CommandResult>((resolve, reject) => {
    const { command, env, stdin, timeoutMs } = request
    const [file, args]: [string, string[]] = command.shell
      ? [request.shellPath ?? DEFAULT_SHELL, ['-c', command.script]]
      : [command.argv[0] ?? '', command.argv.slice(1)]

    const child = spawn(file, args, {
      env: { ...env },
      stdio: [stdin === undefined ? 'inherit' : 'pipe', 'pipe', 'pipe'],
      timeout: timeoutMs,
      killSignal: 'SIGTERM'
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let settled = false

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk))

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (settled) return
      settled = true
      reject(
        new ExecutionError(
          `Could not start ${describeCommand(command)}: ${errorMessage(error)}`,
          error.code,
          { cause: error }
        )
      )
    })

    child.on('close', (code, signal) => {
      if (settled) return
      settled = true
      resolve({
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr),
        exitCode: code ?? (signal ? signalExitCode(signal) : 1)
      })
    })

    if (stdin !== undefined && child.stdin) {
      // A child that exits without reading all of its input is not an error
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EPIPE' || settled) return
        settled = true
        child.kill()
        reject(new ExecutionError(`Could not write stdin to child: ${error.message}`, error.code))
      })
      child.stdin.end(stdin)
    }
  })
