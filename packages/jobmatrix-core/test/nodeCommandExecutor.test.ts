import { tmpdir } from 'node:os'

import { describe, expect, it } from 'vitest'

import { createNodeCommandExecutor } from '../src/index.js'

describe('createNodeCommandExecutor', () => {
  const executor = createNodeCommandExecutor()
  const cwd = tmpdir()

  it('captures output and merges the request environment', async () => {
    const result = await executor({
      command: 'printf "%s" "$JOBMATRIX_GREETING"; printf "warn" >&2',
      cwd,
      env: { JOBMATRIX_GREETING: 'hello' },
    })

    expect(result).toMatchObject({
      successful: true,
      exitCode: 0,
      stdout: 'hello',
      stderr: 'warn',
      timedOut: false,
      aborted: false,
    })
  })

  it('reports non-zero exit codes', async () => {
    const result = await executor({ command: 'exit 3', cwd, env: {} })

    expect(result.successful).toBe(false)
    expect(result.exitCode).toBe(3)
  })

  it('stops commands that exceed their timeout', async () => {
    const result = await executor({ command: 'exec sleep 5', cwd, env: {}, timeoutMs: 50 })

    expect(result.successful).toBe(false)
    expect(result.timedOut).toBe(true)
    expect(result.signal).toBe('SIGTERM')
  })

  it('stops every process a timed out command started', async () => {
    const result = await executor({ command: 'sleep 3; true', cwd, env: {}, timeoutMs: 100 })

    expect(result.successful).toBe(false)
    expect(result.timedOut).toBe(true)
    expect(result.durationMs).toBeLessThan(1_500)
  })

  it('returns once an aborted command exits even when a descendant keeps the output open', async () => {
    const controller = new AbortController()
    const pending = executor({
      command: '(trap "" TERM; sleep 3) & wait',
      cwd,
      env: {},
      signal: controller.signal,
    })
    setTimeout(() => controller.abort(), 100)

    const result = await pending

    expect(result.aborted).toBe(true)
    expect(result.durationMs).toBeLessThan(1_500)
  })

  it('stops commands when the signal aborts', async () => {
    const controller = new AbortController()
    const pending = executor({ command: 'exec sleep 5', cwd, env: {}, signal: controller.signal })
    controller.abort()

    const result = await pending

    expect(result.successful).toBe(false)
    expect(result.aborted).toBe(true)
  })
})
