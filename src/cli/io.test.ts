import { describe, expect, it } from 'vitest'
import { type OutputStream, shouldStrip, stripAnsi, writeResult } from './io'

class MemoryStream implements OutputStream {
  readonly chunks: Buffer[] = []

  constructor(readonly isTTY = false) {}

  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean {
    this.chunks.push(Buffer.from(chunk))
    callback()
    return true
  }

  text(): string {
    return Buffer.concat(this.chunks).toString()
  }
}

describe('stripAnsi', () => {
  it('removes color codes', () => {
    expect(stripAnsi(Buffer.from('\u001b[1;31mred\u001b[0m plain')).toString()).toBe('red plain')
  })

  it('removes OSC hyperlinks', () => {
    const link = '\u001b]8;;https://example.com\u0007link\u001b]8;;\u0007'
    expect(stripAnsi(Buffer.from(link)).toString()).toBe('link')
  })

  it('keeps bytes that are not valid UTF-8', () => {
    const data = Buffer.from([0xff, 0x1b, 0x5b, 0x30, 0x6d, 0xfe])
    expect(stripAnsi(data)).toEqual(Buffer.from([0xff, 0xfe]))
  })

  it('returns input without escapes unchanged', () => {
    const data = Buffer.from('héllo')
    expect(stripAnsi(data)).toBe(data)
  })
})

describe('shouldStrip', () => {
  it('follows an explicit setting', () => {
    expect(shouldStrip(true, new MemoryStream(true))).toBe(true)
    expect(shouldStrip(false, new MemoryStream(false))).toBe(false)
  })

  it('strips only non-terminal streams when unset', () => {
    expect(shouldStrip(undefined, new MemoryStream(true))).toBe(false)
    expect(shouldStrip(undefined, new MemoryStream(false))).toBe(true)
  })
})

describe('writeResult', () => {
  const result = {
    stdout: Buffer.from('\u001b[32mok\u001b[0m\n'),
    stderr: Buffer.from('\u001b[33mwarn\u001b[0m\n'),
    exitCode: 0
  }

  it('strips each stream independently', async () => {
    const stdout = new MemoryStream()
    const stderr = new MemoryStream()

    await writeResult(result, { stdout, stderr }, { stdout: true, stderr: false })

    expect(stdout.text()).toBe('ok\n')
    expect(stderr.text()).toBe('\u001b[33mwarn\u001b[0m\n')
  })

  it('skips empty output', async () => {
    const stdout = new MemoryStream()
    const stderr = new MemoryStream()

    await writeResult(
      { stdout: Buffer.alloc(0), stderr: Buffer.from('x'), exitCode: 1 },
      { stdout, stderr },
      { stdout: false, stderr: false }
    )

    expect(stdout.chunks).toHaveLength(0)
    expect(stderr.text()).toBe('x')
  })

  it('rejects when a write fails', async () => {
    const broken: OutputStream = {
      write: (_chunk, callback) => {
        callback(new Error('EPIPE'))
        return false
      }
    }

    await expect(
      writeResult(result, { stdout: broken, stderr: new MemoryStream() }, {
        stdout: false,
        stderr: false
      })
    ).rejects.toThrow('EPIPE')
  })
})
