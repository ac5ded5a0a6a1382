import { describe, expect, it } from 'vitest'
import { ExecutionError } from '../errors'
import { signalExitCode, spawnExecutor } from './execute'

function nodeScript(source: string): { shell: false; argv: string[] } {
  return { shell: false, argv: [process.execPath, '-e', source] }
}

describe('spawnExecutor', () => {
  it('captures stdout, stderr and the exit code', async () => {
    const result = await spawnExecutor({
      command: nodeScript(
        "process.stdout.write('out'); process.stderr.write('err'); process.exitCode = 3"
      ),
      env: {}
    })

    expect(result.stdout.toString()).toBe('out')
    expect(result.stderr.toString()).toBe('err')
    expect(result.exitCode).toBe(3)
  })

  it('passes exactly the given environment', async () => {
    const result = await spawnExecutor({
      command: nodeScript('process.stdout.write(JSON.stringify(process.env))'),
      env: { GREETING: 'hello' }
    })

    expect(JSON.parse(result.stdout.toString())).toEqual({ GREETING: 'hello' })
  })

  it('feeds buffered stdin to the child', async () => {
    const result = await spawnExecutor({
      command: nodeScript(
        "process.stdout.write(require('fs').readFileSync(0, 'utf-8').toUpperCase())"
      ),
      env: {},
      stdin: Buffer.from('piped input')
    })

    expect(result.stdout.toString()).toBe('PIPED INPUT')
  })

  it('runs scripts through the given shell', async () => {
    const result = await spawnExecutor({
      command: { shell: true, script: 'printf "%s|%s" "$GREETING" second' },
      env: { GREETING: 'hi' },
      shellPath: '/bin/sh'
    })

    expect(result.stdout.toString()).toBe('hi|second')
    expect(result.exitCode).toBe(0)
  })

  it('reports a killed child with the signal exit code', async () => {
    const result = await spawnExecutor({
      command: nodeScript('setTimeout(() => {}, 10000)'),
      env: {},
      timeoutMs: 100
    })

    expect(result.exitCode).toBe(143)
  })

  it('rejects with ExecutionError when the command does not exist', async () => {
    const attempt = spawnExecutor({
      command: { shell: false, argv: ['/nonexistent/runcached-test-command'] },
      env: {}
    })

    await expect(attempt).rejects.toBeInstanceOf(ExecutionError)
    await expect(attempt).rejects.toMatchObject({ code: 'ENOENT' })
  })
})

describe('signalExitCode', () => {
  it('adds the signal number to 128', () => {
    expect(signalExitCode('SIGTERM')).toBe(143)
    expect(signalExitCode('SIGKILL')).toBe(137)
  })
})
