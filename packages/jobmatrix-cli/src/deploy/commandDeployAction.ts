import {
  describeError,
  type CommandExecutionResult,
  type CommandExecutor,
  type DeployAction,
} from '@jobmatrix/core'

/**
 * Environment variables handed to the deploy command.
 */
export const DEPLOY_ENV = {
  dir: 'JOBMATRIX_DEPLOY_DIR',
  branch: 'JOBMATRIX_BRANCH',
  tag: 'JOBMATRIX_TAG',
  token: 'JOBMATRIX_DEPLOY_TOKEN',
} as const

/**
 * Options of the command deploy action.
 */
export interface CommandDeployActionOptions {
  /** Shell command performing the deployment. */
  readonly command: string
  /** Working directory of the command. */
  readonly cwd: string
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  /** Command timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Creates a deploy action that runs a shell command with the trigger job's flags
 * plus the deploy directory, branch, tag and token in its environment.
 *
 * @param options Action options.
 * @returns Deploy action rejecting when the command does not succeed.
 */
export const createCommandDeployAction = (options: CommandDeployActionOptions): DeployAction => {
  return async (request): Promise<void> => {
    const result = await options.executor({
      command: options.command,
      cwd: options.cwd,
      env: {
        ...request.flags,
        [DEPLOY_ENV.dir]: request.localDir,
        [DEPLOY_ENV.branch]: request.branch,
        ...(request.tag ? { [DEPLOY_ENV.tag]: request.tag } : {}),
        ...(request.token ? { [DEPLOY_ENV.token]: request.token } : {}),
      },
      timeoutMs: options.timeoutMs,
    })

    if (!result.successful) {
      throw new Error(describeDeployFailure(result))
    }
  }
}

const describeDeployFailure = (result: CommandExecutionResult): string => {
  if (result.timedOut) {
    return 'deploy command timed out'
  }

  if (result.error !== undefined) {
    return `deploy command could not be started: ${describeError(result.error)}`
  }

  const lastLine = result.stderr.trim().split('\n').at(-1)
  const suffix = lastLine ? `: ${lastLine}` : ''
  return `deploy command exited with code ${String(result.exitCode)}${suffix}`
}
