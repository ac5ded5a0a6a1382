/**
 * Runner Module
 *
 * Building, executing and memoizing commands.
 */

export { buildCommand, describeCommand, quoteArg } from './command'
export type { BuildCommandOptions } from './command'
export { signalExitCode, spawnExecutor } from './execute'
export type { ExecuteRequest, Executor } from './execute'
export { CUSTOM_KEY_ENV_VAR, runCached } from './orchestrator'
export type { RunCachedDeps, RunCachedOptions, RunEvent, RunOutcome } from './orchestrator'
export { readStdin, shouldIncludeStdin } from './stdin'
export type { StdinMode } from './stdin'
