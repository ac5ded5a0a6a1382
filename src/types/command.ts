/**
 * Command Types
 */

/**
 * What gets executed, in the form that participates in the cache key.
 *
 * In shell mode only the final script string matters: two token lists that
 * join (or re-quote) to the same script are the same command.
 */
export type CommandRepr =
  | { readonly shell: false; readonly argv: readonly string[] }
  | { readonly shell: true; readonly script: string }

/**
 * Captured outcome of running a command, fresh or replayed.
 */
export interface CommandResult {
  readonly stdout: Buffer
  readonly stderr: Buffer
  readonly exitCode: number
}
