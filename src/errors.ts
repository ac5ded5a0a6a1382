/**
 * Error Types
 *
 * Every failure runcached reports itself is one of these. A command that runs
 * and exits non-zero is not an error: it is a normal result.
 */

/** Exit code for tool-level failures (bad configuration, unreadable stdin). */
export const TOOL_FAILURE_EXIT_CODE = 125

/** Exit code when the command exists but could not be executed. */
export const NOT_EXECUTABLE_EXIT_CODE = 126

/** Exit code when the command could not be found. */
export const NOT_FOUND_EXIT_CODE = 127

export class RuncachedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RuncachedError'
  }
}

/**
 * Invalid option value or combination. Raised before anything is executed.
 */
export class ConfigError extends RuncachedError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

export class StdinReadError extends RuncachedError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StdinReadError'
  }
}

/**
 * The child process could not be started at all.
 */
export class ExecutionError extends RuncachedError {
  /** errno code reported by the spawn attempt, e.g. ENOENT or EACCES */
  readonly code: string | undefined

  constructor(message: string, code: string | undefined, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ExecutionError'
    this.code = code
  }
}

/**
 * An entry exists but could not be read or decoded. Lookups treat it as a miss.
 */
export class StoreReadError extends RuncachedError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StoreReadError'
  }
}

/**
 * An entry could not be durably written. The fresh result is still returned.
 */
export class StoreWriteError extends RuncachedError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StoreWriteError'
  }
}

/**
 * Map an error to the exit code runcached itself terminates with.
 *
 * A command that cannot be started follows the shell convention (`sh`, `env`,
 * `nohup`): 127 when it is not found, 126 when it is not executable. A child
 * may exit with those codes itself, so only 125 is unique to runcached. When
 * the start itself failed, an `error:` line is always printed on stderr.
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof ExecutionError) {
    return error.code === 'ENOENT' ? NOT_FOUND_EXIT_CODE : NOT_EXECUTABLE_EXIT_CODE
  }
  return TOOL_FAILURE_EXIT_CODE
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
