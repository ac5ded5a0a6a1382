#!/usr/bin/env node
/**
 * runcached CLI
 *
 * Run a command, or replay its cached result.
 */

import { runCli } from './cli/run'
import { snapshotEnv } from './env/resolver'
import { errorMessage, TOOL_FAILURE_EXIT_CODE } from './errors'

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  env: snapshotEnv(process.env)
}).then(
  (exitCode) => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    process.stderr.write(`[runcached] error: ${errorMessage(error)}\n`)
    process.exitCode = TOOL_FAILURE_EXIT_CODE
  }
)
