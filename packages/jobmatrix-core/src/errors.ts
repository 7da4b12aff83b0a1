/**
 * Stable machine-readable error codes.
 */
export type JobMatrixErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'STEP_FAILURE'
  | 'CACHE_ERROR'
  | 'DEPLOY_ERROR'

/**
 * Base class of every orchestrator error.
 */
export class JobMatrixError extends Error {
  public readonly code: JobMatrixErrorCode

  public constructor(code: JobMatrixErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Invalid pipeline description. Raised before any job starts.
 */
export class ConfigurationError extends JobMatrixError {
  public constructor(message: string) {
    super('CONFIGURATION_ERROR', message)
  }
}

/**
 * A step of a job did not succeed. Stops the remaining steps of that job only.
 */
export class StepFailure extends JobMatrixError {
  public readonly stepId: string
  public readonly phase: 'prepare' | 'script' | 'after_success'
  public readonly exitCode: number | null
  /** True when the step's process could not be started at all. */
  public readonly spawnError: boolean

  public constructor(input: {
    stepId: string
    stepName: string
    phase: 'prepare' | 'script' | 'after_success'
    exitCode: number | null
    spawnError?: boolean
    detail: string
  }) {
    super('STEP_FAILURE', `Step "${input.stepName}" ${input.detail}`)
    this.stepId = input.stepId
    this.phase = input.phase
    this.exitCode = input.exitCode
    this.spawnError = input.spawnError ?? false
  }
}

/**
 * Cache store I/O failure. Never decides a job outcome.
 */
export class CacheError extends JobMatrixError {
  public readonly cacheKey: string

  public constructor(cacheKey: string, message: string, cause?: unknown) {
    super('CACHE_ERROR', message, { cause })
    this.cacheKey = cacheKey
  }
}

/**
 * Deployment action failure.
 */
export class DeployError extends JobMatrixError {
  public readonly provider: string

  public constructor(provider: string, message: string, cause?: unknown) {
    super('DEPLOY_ERROR', message, { cause })
    this.provider = provider
  }
}

/**
 * Formats an unknown thrown value for messages.
 *
 * @param error Thrown value.
 * @returns Error message text.
 */
export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}
