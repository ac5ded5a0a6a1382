/**
 * Stdin Draining
 *
 * When stdin is part of the cache key it has to be read to EOF before the key
 * exists, and the buffered bytes are handed to the child on a miss.
 */

import { StdinReadError, errorMessage } from '../errors'

export type StdinMode = 'include' | 'exclude' | 'auto'

/**
 * Decide whether stdin participates. `auto` includes it unless it is a terminal.
 */
export function shouldIncludeStdin(mode: StdinMode, isTTY: boolean | undefined): boolean {
  if (mode === 'auto') return isTTY !== true
  return mode === 'include'
}

/**
 * Read a stream until EOF.
 * @throws StdinReadError
 */
export async function readStdin(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = []
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk)
    }
  } catch (error) {
    throw new StdinReadError(`Could not read stdin: ${errorMessage(error)}`, { cause: error })
  }
  return Buffer.concat(chunks)
}
