import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from 'vitest'

import type {
  CacheStore,
  CommandExecutionResult,
  CommandExecutor,
  DeployRequest,
  PipelinePlan,
} from '../src/index.js'
import {
  CacheManager,
  ConfigurationError,
  formatRunResultAsJson,
  planPipeline,
  resolveExitCode,
  runPlan,
} from '../src/index.js'

const createExecutor = (failingCommands: readonly string[] = []): CommandExecutor => {
  return async (request): Promise<CommandExecutionResult> => {
    const successful = !failingCommands.includes(request.command)
    return {
      successful,
      timedOut: false,
      aborted: false,
      durationMs: 1,
      exitCode: successful ? 0 : 1,
      signal: null,
      stdout: '',
      stderr: '',
    }
  }
}

const createPlan = (): PipelinePlan => {
  return planPipeline({
    matrix: {
      axes: [{ name: 'toolchain', values: ['stable', 'nightly'], envVar: 'TOOLCHAIN' }],
      include: [{ name: 'docs', values: { toolchain: 'stable' }, env: { BUILD_DOC: 'true' } }],
      allowFailures: [{ values: { toolchain: 'nightly' } }],
    },
    scripts: {
      default: { script: [{ id: 'test', name: 'Test', command: 'npm test' }] },
      'doc-build': { script: [{ id: 'docs', name: 'Docs', command: 'npm run docs' }] },
    },
    deploy: {
      provider: 'pages',
      localDir: 'docs/dist',
      on: { branch: 'main', trigger: { env: { BUILD_DOC: 'true' } } },
    },
    cwd: '/repo',
  })
}

describe('runPlan', () => {
  it('runs every job and deploys after a passing pipeline on the deploy branch', async () => {
    const requests: DeployRequest[] = []
    const deployed: string[] = []

    const result = await runPlan({
      plan: createPlan(),
      executor: createExecutor(),
      context: { branch: 'main', env: {} },
      deployAction: async (request): Promise<void> => {
        requests.push(request)
      },
      reporters: [
        {
          onDeploy: (report): void => {
            deployed.push(report.decision.reason)
          },
        },
      ],
    })

    expect(result.exitCode).toBe(0)
    expect(result.pipeline.jobs.map((job) => job.status)).toEqual(['success', 'success', 'success'])
    expect(result.deploy.fired).toBe(true)
    expect(requests.map((request) => request.triggerJob.name)).toEqual(['docs'])
    expect(deployed).toEqual(['ready'])
  })

  it('only evaluates the gate without a deploy action', async () => {
    const result = await runPlan({
      plan: createPlan(),
      executor: createExecutor(),
      context: { branch: 'main', env: {} },
    })

    expect(result.deploy).toEqual({
      decision: { shouldDeploy: true, reason: 'ready', triggerJobId: 'job-3' },
      fired: false,
    })
  })

  it('exits with 1 when the deployment fails', async () => {
    const result = await runPlan({
      plan: createPlan(),
      executor: createExecutor(),
      context: { branch: 'main', env: {} },
      deployAction: async (): Promise<void> => {
        throw new Error('rejected')
      },
    })

    expect(result.pipeline.status).toBe('success')
    expect(result.exitCode).toBe(1)
    expect(resolveExitCode(result.pipeline, result.deploy)).toBe(1)
  })

  it('exits with 1 when a required job fails', async () => {
    const result = await runPlan({
      plan: createPlan(),
      executor: createExecutor(['npm run docs']),
      context: { branch: 'main', env: {} },
    })

    expect(result.pipeline.status).toBe('failed')
    expect(result.deploy.decision.reason).toBe('pipeline_failed')
    expect(result.exitCode).toBe(1)
  })

  it('rejects a worker limit that is not a positive integer', async () => {
    const run = runPlan({
      plan: createPlan(),
      executor: createExecutor(),
      context: { branch: 'main', env: {} },
      maxParallel: Number.NaN,
    })

    await expect(run).rejects.toBeInstanceOf(ConfigurationError)
    await expect(run).rejects.toThrow('maxParallel must be a positive integer, got NaN')
  })

  it('finalizes the cache of every running job when the run is cancelled', async () => {
    const workRoot = await mkdtemp(join(tmpdir(), 'jobmatrix-run-'))
    const controller = new AbortController()
    const cleanups: string[] = []
    const store: CacheStore = {
      restore: async (): Promise<boolean> => false,
      persist: async (): Promise<void> => undefined,
    }
    const executor: CommandExecutor = async (request) => {
      controller.abort()
      return await new Promise<CommandExecutionResult>((resolve) => {
        const aborted: CommandExecutionResult = {
          successful: false,
          timedOut: false,
          aborted: true,
          durationMs: 1,
          exitCode: null,
          signal: 'SIGTERM',
          stdout: '',
          stderr: '',
        }
        if (request.signal?.aborted) {
          resolve(aborted)
          return
        }
        request.signal?.addEventListener('abort', () => resolve(aborted), { once: true })
      })
    }

    try {
      const result = await runPlan({
        plan: createPlan(),
        executor,
        context: { branch: 'main', env: {} },
        cacheManager: new CacheManager({
          settings: { directories: ['target'] },
          store,
          workRoot,
          beforeCache: async (_handle, status): Promise<void> => {
            cleanups.push(status)
          },
        }),
        signal: controller.signal,
      })

      expect(result.pipeline.cancelled).toBe(true)
      expect(result.pipeline.jobs.map((job) => [job.status, job.reason, job.cache?.persisted])).toEqual([
        ['errored', 'cancelled', true],
        ['errored', 'cancelled', true],
        ['errored', 'cancelled', true],
      ])
      expect(cleanups).toEqual(['errored', 'errored', 'errored'])
      expect(result.exitCode).toBe(1)
    } finally {
      await rm(workRoot, { recursive: true, force: true })
    }
  })
})

describe('formatRunResultAsJson', () => {
  it('serializes job identities, statuses and the deploy report', async () => {
    const result = await runPlan({
      plan: createPlan(),
      executor: createExecutor(['npm test']),
      context: { branch: 'feature', env: {} },
      maxParallel: 1,
    })

    const parsed: unknown = JSON.parse(formatRunResultAsJson(result))

    expect(parsed).toMatchObject({
      exitCode: 1,
      pipeline: {
        status: 'failed',
        cancelled: false,
        summary: { total: 3, succeeded: 1, failed: 2, errored: 0, allowedFailures: 1 },
      },
      deploy: {
        decision: { shouldDeploy: false, reason: 'pipeline_failed' },
        fired: false,
        error: null,
      },
    })
    expect(parsed).toHaveProperty('pipeline.jobs.1.key', 'toolchain=nightly')
    expect(parsed).toHaveProperty('pipeline.jobs.1.suppressed', true)
    expect(parsed).toHaveProperty('pipeline.jobs.2.mode', 'doc-build')
    expect(parsed).not.toHaveProperty('pipeline.jobs.0.job')
  })
})
