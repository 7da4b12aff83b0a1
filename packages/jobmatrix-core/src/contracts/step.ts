/**
 * Terminal status of one step inside a job.
 */
export type StepStatus = 'passed' | 'failed' | 'skipped' | 'timed_out'

/**
 * Failure or skip reason assigned to a step result.
 */
export type StepResultReason =
  | 'command_failed'
  | 'command_timeout'
  | 'command_aborted'
  | 'spawn_error'
  | 'previous_step_failed'

/**
 * Phase of the job lifecycle a step belongs to.
 */
export type StepPhase = 'prepare' | 'script' | 'after_success'

/**
 * Immutable definition of one opaque job step.
 */
export interface PipelineStep {
  /** Stable machine identifier for programmatic usage. */
  readonly id: string
  /** Human readable label used in logs and summaries. */
  readonly name: string
  /** Shell command executed for this step. */
  readonly command: string
  /** Optional working directory override. */
  readonly cwd?: string
  /** Optional environment override merged over the job environment. */
  readonly env?: Readonly<Record<string, string>>
  /** Optional timeout in milliseconds for this step alone. */
  readonly timeoutMs?: number
}

/**
 * Captured process output data for one execution.
 */
export interface StepExecutionOutput {
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
}

/**
 * Result object recorded for each step of a job.
 */
export interface StepResult {
  /** Step identifier copied from the step definition. */
  readonly id: string
  /** Step display name copied from the step definition. */
  readonly name: string
  /** Lifecycle phase the step ran in. */
  readonly phase: StepPhase
  /** Final status. */
  readonly status: StepStatus
  /** Reason for non-success outcomes. */
  readonly reason?: StepResultReason
  /** Step start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Step finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total step duration in milliseconds. */
  readonly durationMs: number
  /** Captured process output. */
  readonly output: StepExecutionOutput
}
