import { spawn, type ChildProcess } from 'node:child_process'

import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from '../contracts/executor.js'

/**
 * Options of the Node.js shell command executor.
 */
export interface NodeCommandExecutorOptions {
  /** Delay between SIGTERM and SIGKILL for an interrupted command (default 2000). */
  readonly killGraceMs?: number
}

const DEFAULT_KILL_GRACE_MS = 2_000

/**
 * Creates a Node.js shell command executor.
 *
 * Each command runs in its own process group on POSIX systems, so a timeout or an
 * abort stops the shell together with everything it started.
 *
 * @param options Executor options.
 * @returns Command executor implementation.
 */
export const createNodeCommandExecutor = (
  options: NodeCommandExecutorOptions = {}
): CommandExecutor => {
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS

  return async (request: CommandExecutionRequest): Promise<CommandExecutionResult> => {
    const startedAt = Date.now()

    return await new Promise<CommandExecutionResult>((resolve) => {
      const env: NodeJS.ProcessEnv = { ...process.env, ...request.env }
      const child = spawn(request.command, {
        cwd: request.cwd,
        env,
        shell: true,
        detached: OWN_PROCESS_GROUP,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      let timedOut = false
      let aborted = false
      let error: unknown
      let settled = false
      // Outlives an `exit` settle so that descendants ignoring SIGTERM are still killed.
      let killHandle: NodeJS.Timeout | null = null

      const terminate = (): void => {
        signalCommand(child, 'SIGTERM')
        killHandle ??= setTimeout(() => signalCommand(child, 'SIGKILL'), killGraceMs).unref()
      }

      const timeoutHandle =
        typeof request.timeoutMs === 'number' && request.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true
              terminate()
            }, request.timeoutMs)
          : null

      const onAbort = (): void => {
        aborted = true
        terminate()
      }

      if (request.signal?.aborted) {
        onAbort()
      } else {
        request.signal?.addEventListener('abort', onAbort, { once: true })
      }

      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf8')
      })

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8')
      })

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (settled) {
          return
        }

        settled = true
        if (timeoutHandle) {
          clearTimeout(timeoutHandle)
        }
        request.signal?.removeEventListener('abort', onAbort)

        const successful = !timedOut && !aborted && exitCode === 0 && error === undefined

        resolve({
          successful,
          timedOut,
          aborted,
          durationMs: Date.now() - startedAt,
          exitCode,
          signal,
          stdout,
          stderr,
          error,
        })
      }

      child.on('error', (spawnError: Error) => {
        error = spawnError
        if (child.pid === undefined) {
          finish(null, null)
        }
      })

      // An interrupted command may leave a descendant outside its group holding the pipes.
      child.on('exit', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (timedOut || aborted) {
          child.stdout?.destroy()
          child.stderr?.destroy()
          finish(exitCode, signal)
        }
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (killHandle) {
          clearTimeout(killHandle)
        }
        finish(exitCode, signal)
      })
    })
  }
}

const OWN_PROCESS_GROUP = process.platform !== 'win32'

const signalCommand = (child: ChildProcess, signal: NodeJS.Signals): void => {
  if (child.pid === undefined) {
    return
  }

  if (OWN_PROCESS_GROUP) {
    try {
      process.kill(-child.pid, signal)
      return
    } catch {
      // The group is gone or not ours; fall back to the shell itself.
    }
  }

  if (child.exitCode === null && child.signalCode === null) {
    child.kill(signal)
  }
}
