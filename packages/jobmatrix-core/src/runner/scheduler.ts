import type { JobOutcome } from '../contracts/job.js'
import type { JobSpec } from '../contracts/matrix.js'
import type { PipelineOutcome, PipelineStatus, PipelineSummary } from '../contracts/pipeline.js'
import type { PipelineReporter } from '../contracts/reporter.js'
import { ConfigurationError } from '../errors.js'
import { createCancelledOutcome, type JobRunner } from './jobExecutor.js'

/**
 * Runtime options of the scheduler.
 */
export interface SchedulerOptions {
  /** Runs single jobs. */
  readonly runner: JobRunner
  /** Worker limit; defaults to one worker per job. */
  readonly maxParallel?: number
  /** Optional reporters for pipeline-level hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Runs every job of a pipeline concurrently and aggregates the outcome.
 *
 * A failing job never stops its siblings.
 */
export class Scheduler {
  private readonly options: Required<Pick<SchedulerOptions, 'now' | 'reporters'>> &
    Omit<SchedulerOptions, 'now' | 'reporters'>

  /**
   * Creates a scheduler.
   *
   * @param options Runtime options.
   * @throws ConfigurationError when `maxParallel` is not a positive integer.
   */
  public constructor(options: SchedulerOptions) {
    const { maxParallel } = options
    if (maxParallel !== undefined && (!Number.isInteger(maxParallel) || maxParallel < 1)) {
      throw new ConfigurationError(`maxParallel must be a positive integer, got ${String(maxParallel)}`)
    }

    this.options = {
      ...options,
      reporters: options.reporters ?? [],
      now: options.now ?? Date.now,
    }
  }

  /**
   * Runs all jobs and waits for every one of them, including their finalization.
   *
   * On cancellation, jobs that have not started yet are reported cancelled without running.
   *
   * @param jobs Jobs to run.
   * @param signal Cancels the pipeline.
   * @returns Pipeline outcome with job outcomes in job order.
   */
  public async runPipeline(
    jobs: readonly JobSpec[],
    signal?: AbortSignal
  ): Promise<PipelineOutcome> {
    const startedAt = this.options.now()

    for (const reporter of this.options.reporters) {
      await reporter.onPipelineStart?.(jobs)
    }

    const outcomes: (JobOutcome | undefined)[] = new Array<JobOutcome | undefined>(jobs.length)
    const workerCount = Math.max(1, Math.min(this.options.maxParallel ?? jobs.length, jobs.length))
    let nextIndex = 0

    const work = async (): Promise<void> => {
      while (nextIndex < jobs.length) {
        const index = nextIndex
        nextIndex += 1

        const job = jobs[index]
        if (!job) {
          continue
        }

        if (signal?.aborted) {
          const cancelled = createCancelledOutcome(job, this.options.now())
          outcomes[index] = cancelled
          for (const reporter of this.options.reporters) {
            await reporter.onJobComplete?.(cancelled)
          }
          continue
        }

        outcomes[index] = await this.options.runner.run(job, signal)
      }
    }

    const settled = await Promise.allSettled(
      Array.from({ length: workerCount }, async () => await work())
    )
    const rejected = settled.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    )
    if (rejected) {
      throw rejected.reason
    }

    const jobOutcomes = outcomes.filter((outcome): outcome is JobOutcome => outcome !== undefined)
    const finishedAt = this.options.now()
    const outcome: PipelineOutcome = {
      status: aggregateStatus(jobOutcomes),
      jobs: jobOutcomes,
      summary: buildSummary(jobOutcomes, finishedAt - startedAt),
      cancelled: signal?.aborted ?? false,
      startedAt,
      finishedAt,
    }

    for (const reporter of this.options.reporters) {
      await reporter.onPipelineComplete?.(outcome)
    }

    return outcome
  }
}

/**
 * Creates a scheduler.
 *
 * @param options Runtime options.
 * @returns Scheduler.
 */
export const createScheduler = (options: SchedulerOptions): Scheduler => {
  return new Scheduler(options)
}

/**
 * Success only when every job that is not allowed to fail succeeded.
 *
 * @param outcomes Job outcomes.
 * @returns Pipeline status.
 */
export const aggregateStatus = (outcomes: readonly JobOutcome[]): PipelineStatus => {
  return outcomes
    .filter((outcome) => !outcome.allowFailure)
    .every((outcome) => outcome.status === 'success')
    ? 'success'
    : 'failed'
}

const buildSummary = (outcomes: readonly JobOutcome[], durationMs: number): PipelineSummary => {
  return {
    total: outcomes.length,
    succeeded: outcomes.filter((outcome) => outcome.status === 'success').length,
    failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    errored: outcomes.filter((outcome) => outcome.status === 'errored').length,
    allowedFailures: outcomes.filter((outcome) => outcome.suppressed).length,
    warnings: outcomes.reduce((count, outcome) => count + outcome.warnings.length, 0),
    durationMs,
  }
}
