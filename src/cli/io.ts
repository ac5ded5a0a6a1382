/**
 * CLI Output
 *
 * Writes a command result to the output streams, optionally without ANSI
 * escape sequences.
 */

import type { CommandResult } from '../types'

/** CSI sequences, OSC strings and two-byte escapes */
const ANSI_PATTERN =
  /\u001b(?:\[[0-?]*[ -/]*[@-~]|\][^\u0007\u001b]*(?:\u0007|\u001b\\)|[@-Z\\-_])/g

export interface OutputStream {
  readonly isTTY?: boolean | undefined
  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean
}

export interface StripOptions {
  readonly stdout: boolean
  readonly stderr: boolean
}

/**
 * Remove ANSI escape sequences. Bytes outside the sequences are untouched,
 * so output that is not valid UTF-8 survives.
 */
export function stripAnsi(data: Buffer): Buffer {
  if (!data.includes(0x1b)) return data
  return Buffer.from(data.toString('latin1').replace(ANSI_PATTERN, ''), 'latin1')
}

/**
 * Whether a stream's output should be stripped: the explicit setting, or
 * "not a terminal" when unset.
 */
export function shouldStrip(setting: boolean | undefined, stream: OutputStream): boolean {
  return setting ?? !stream.isTTY
}

function writeChunk(stream: OutputStream, chunk: Buffer): Promise<void> {
  if (chunk.length === 0) return Promise.resolve()
  return new Promise((resolve, reject) => {
    stream.write(chunk, (error) => (error ? reject(error) : resolve()))
  })
}

export async function writeResult(
  result: CommandResult,
  streams: { stdout: OutputStream; stderr: OutputStream },
  strip: StripOptions
): Promise<void> {
  await writeChunk(streams.stdout, strip.stdout ? stripAnsi(result.stdout) : result.stdout)
  await writeChunk(streams.stderr, strip.stderr ? stripAnsi(result.stderr) : result.stderr)
}
