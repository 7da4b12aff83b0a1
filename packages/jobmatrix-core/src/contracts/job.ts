import type { CacheReport } from './cache.js'
import type { JobSpec } from './matrix.js'
import type { StepResult } from './step.js'

/**
 * States of the job state machine.
 */
export type JobPhase =
  | 'pending'
  | 'preparing'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'finalizing'
  | 'done'

/**
 * Terminal job status.
 */
export type JobStatus = 'success' | 'failed' | 'errored'

/**
 * Reason attached to a non-success job status.
 */
export type JobOutcomeReason =
  | 'prepare_failed'
  | 'step_failed'
  | 'job_timeout'
  | 'cancelled'
  | 'executor_error'

/**
 * Warning raised during a job without changing its status.
 */
export interface JobWarning {
  /** Machine-readable warning kind. */
  readonly code: 'cache_acquire_failed' | 'cache_release_failed' | 'after_success_failed'
  /** Human-readable message. */
  readonly message: string
}

/**
 * Failed step that decided the job outcome.
 */
export interface JobFailure {
  /** Failed step id, absent when the job failed outside a step. */
  readonly stepId?: string
  /** Phase the step ran in. */
  readonly phase?: StepResult['phase']
  /** Human-readable message. */
  readonly message: string
}

/**
 * Outcome of one job run.
 */
export interface JobOutcome {
  /** Job id copied from the job spec. */
  readonly id: string
  /** Job display name. */
  readonly name: string
  /** Executed job spec. */
  readonly job: JobSpec
  /** Terminal status, independent of allow-failure. */
  readonly status: JobStatus
  /** Reason for non-success outcomes. */
  readonly reason?: JobOutcomeReason
  /** Exit code of the last executed step, null when unavailable. */
  readonly exitCode: number | null
  /** Copied from the job spec. */
  readonly allowFailure: boolean
  /** True when allow-failure keeps this outcome out of the pipeline status. */
  readonly suppressed: boolean
  /** State machine history in visiting order. */
  readonly phases: readonly JobPhase[]
  /** Step results in execution order, including skipped steps. */
  readonly steps: readonly StepResult[]
  /** Step failure that decided the outcome. */
  readonly failure?: JobFailure
  /** Cache activity, null when no cache is configured or acquisition failed. */
  readonly cache: CacheReport | null
  /** Non-fatal problems. */
  readonly warnings: readonly JobWarning[]
  /** Job start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Job finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total job duration in milliseconds. */
  readonly durationMs: number
}
