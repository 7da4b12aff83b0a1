import type { DeployReport } from './deploy.js'
import type { JobOutcome, JobPhase, JobWarning } from './job.js'
import type { JobSpec } from './matrix.js'
import type { PipelineOutcome } from './pipeline.js'
import type { StepResult } from './step.js'

/**
 * Event hooks for pipeline run reporting.
 *
 * Jobs run concurrently, so job-level hooks of different jobs interleave.
 */
export interface PipelineReporter {
  /**
   * Called once before any job starts.
   *
   * @param jobs Jobs scheduled for execution.
   */
  onPipelineStart?(jobs: readonly JobSpec[]): Promise<void> | void

  /**
   * Called when a job enters a new state.
   *
   * @param job Job spec.
   * @param phase Entered state.
   */
  onJobPhase?(job: JobSpec, phase: JobPhase): Promise<void> | void

  /**
   * Called after a step of a job completes or is skipped.
   *
   * @param job Job spec.
   * @param result Step result.
   */
  onStepComplete?(job: JobSpec, result: StepResult): Promise<void> | void

  /**
   * Called for non-fatal job problems such as cache failures.
   *
   * @param job Job spec.
   * @param warning Warning details.
   */
  onJobWarning?(job: JobSpec, warning: JobWarning): Promise<void> | void

  /**
   * Called after a job finished finalizing.
   *
   * @param outcome Job outcome.
   */
  onJobComplete?(outcome: JobOutcome): Promise<void> | void

  /**
   * Called once after every job finished.
   *
   * @param outcome Pipeline outcome.
   */
  onPipelineComplete?(outcome: PipelineOutcome): Promise<void> | void

  /**
   * Called after the deploy gate was evaluated.
   *
   * @param report Gate report.
   */
  onDeploy?(report: DeployReport): Promise<void> | void
}
