import {
  planPipeline,
  type CommandExecutionRequest,
  type CommandExecutionResult,
  type DeployRequest,
} from '@jobmatrix/core'
import { describe, expect, it } from 'vitest'

import { createCommandDeployAction } from '../src/deploy/commandDeployAction.js'

const plan = planPipeline({
  matrix: { axes: [], include: [{ env: { BUILD_DOC: '1' } }] },
  scripts: {
    default: { script: [{ id: 'test', name: 'Test', command: 'npm test' }] },
    'doc-build': { script: [{ id: 'docs', name: 'Docs', command: 'npm run docs' }] },
  },
  cwd: '/repo',
})

const createRequest = (overrides: Partial<DeployRequest> = {}): DeployRequest => {
  const triggerJob = plan.jobs[0]
  if (!triggerJob) {
    throw new Error('missing trigger job')
  }

  return {
    provider: 'pages',
    localDir: '/repo/target/doc',
    branch: 'main',
    triggerJob,
    flags: triggerJob.env,
    ...overrides,
  }
}

const createResult = (overrides: Partial<CommandExecutionResult> = {}): CommandExecutionResult => {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    aborted: false,
    durationMs: 3,
    successful: true,
    ...overrides,
  }
}

describe('createCommandDeployAction', () => {
  it('passes flags and deploy variables to the command', async () => {
    const requests: CommandExecutionRequest[] = []
    const action = createCommandDeployAction({
      command: './deploy.sh',
      cwd: '/repo',
      timeoutMs: 5_000,
      executor: async (request) => {
        requests.push(request)
        return createResult()
      },
    })

    await action(createRequest({ tag: 'v1.0.0', token: 'test-secret' }))

    expect(requests).toEqual([
      {
        command: './deploy.sh',
        cwd: '/repo',
        timeoutMs: 5_000,
        env: {
          BUILD_DOC: '1',
          JOBMATRIX_DEPLOY_DIR: '/repo/target/doc',
          JOBMATRIX_BRANCH: 'main',
          JOBMATRIX_TAG: 'v1.0.0',
          JOBMATRIX_DEPLOY_TOKEN: 'test-secret',
        },
      },
    ])
  })

  it('leaves tag and token out when absent', async () => {
    const requests: CommandExecutionRequest[] = []
    const action = createCommandDeployAction({
      command: './deploy.sh',
      cwd: '/repo',
      executor: async (request) => {
        requests.push(request)
        return createResult()
      },
    })

    await action(createRequest())

    expect(requests[0]?.env).toEqual({
      BUILD_DOC: '1',
      JOBMATRIX_DEPLOY_DIR: '/repo/target/doc',
      JOBMATRIX_BRANCH: 'main',
    })
  })

  it('rejects with the last stderr line when the command fails', async () => {
    const action = createCommandDeployAction({
      command: './deploy.sh',
      cwd: '/repo',
      executor: async () =>
        createResult({
          exitCode: 2,
          successful: false,
          stderr: 'uploading\nremote rejected the upload\n',
        }),
    })

    await expect(action(createRequest())).rejects.toThrow(
      'deploy command exited with code 2: remote rejected the upload'
    )
  })

  it('reports timeouts and spawn errors', async () => {
    const timedOut = createCommandDeployAction({
      command: './deploy.sh',
      cwd: '/repo',
      executor: async () => createResult({ exitCode: null, successful: false, timedOut: true }),
    })
    const unstartable = createCommandDeployAction({
      command: './deploy.sh',
      cwd: '/repo',
      executor: async () =>
        createResult({ exitCode: null, successful: false, error: new Error('spawn sh ENOENT') }),
    })

    await expect(timedOut(createRequest())).rejects.toThrow('deploy command timed out')
    await expect(unstartable(createRequest())).rejects.toThrow(
      'deploy command could not be started: spawn sh ENOENT'
    )
  })
})
