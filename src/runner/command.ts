/**
 * Command Building
 *
 * Turns the COMMAND tokens from the command line into the CommandRepr that is
 * hashed and executed.
 */

import { ConfigError } from '../errors'
import type { CommandRepr } from '../types'

const SAFE_UNQUOTED = /^[\w@%+=:,./-]+$/

/**
 * Quote a single argument for a POSIX shell. Leaves safe words untouched.
 */
export function quoteArg(arg: string): string {
  if (arg === '') return "''"
  if (SAFE_UNQUOTED.test(arg)) return arg
  return `'${arg.replace(/'/g, `'"'"'`)}'`
}

export interface BuildCommandOptions {
  /** Run through `$SHELL -c` */
  readonly shell: boolean
  /** Quote each token before joining into the shell script */
  readonly requote: boolean
}

export function buildCommand(tokens: readonly string[], options: BuildCommandOptions): CommandRepr {
  if (tokens.length === 0) {
    throw new ConfigError('No command given')
  }

  if (!options.shell) {
    return { shell: false, argv: [...tokens] }
  }

  const script = options.requote ? tokens.map(quoteArg).join(' ') : tokens.join(' ')
  return { shell: true, script }
}

/**
 * Render a command for log messages.
 */
export function describeCommand(command: CommandRepr): string {
  return command.shell ? command.script : command.argv.map(quoteArg).join(' ')
}
