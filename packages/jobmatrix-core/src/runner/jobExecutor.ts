import { resolve } from 'node:path'

import type { CacheManager } from '../cache/cacheManager.js'
import { ConditionEvaluator } from '../conditions/conditionEvaluator.js'
import type { CacheHandle, CacheReport } from '../contracts/cache.js'
import type { CommandExecutionResult, CommandExecutor } from '../contracts/executor.js'
import type {
  JobFailure,
  JobOutcome,
  JobOutcomeReason,
  JobPhase,
  JobStatus,
  JobWarning,
} from '../contracts/job.js'
import type { JobSpec } from '../contracts/matrix.js'
import type { PipelineConfig } from '../contracts/pipeline.js'
import type { PipelineReporter } from '../contracts/reporter.js'
import type {
  PipelineStep,
  StepPhase,
  StepResult,
  StepResultReason,
  StepStatus,
} from '../contracts/step.js'
import { CacheError, describeError, StepFailure } from '../errors.js'

/**
 * Runtime options of the job executor.
 */
export interface JobExecutorOptions {
  /** Immutable pipeline configuration. */
  readonly config: PipelineConfig
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  /** Cache manager; jobs run without cache when omitted. */
  readonly cacheManager?: CacheManager
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Time a step may take to stop after the job was interrupted, in milliseconds (default 5000). */
  readonly abortGraceMs?: number
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

const DEFAULT_ABORT_GRACE_MS = 5_000

/**
 * Runs one job through a single lifecycle.
 */
export interface JobRunner {
  /**
   * Runs a job.
   *
   * @param job Job spec.
   * @param signal Cancels the job; finalization still runs.
   * @returns Job outcome.
   */
  run(job: JobSpec, signal?: AbortSignal): Promise<JobOutcome>
}

interface JobRunContext {
  readonly job: JobSpec
  readonly env: Readonly<Record<string, string>>
  readonly signal: AbortSignal
  readonly phases: JobPhase[]
  readonly steps: StepResult[]
  readonly warnings: JobWarning[]
}

interface JobVerdict {
  readonly status: JobStatus
  readonly reason?: JobOutcomeReason
  readonly failure?: JobFailure
}

/**
 * Environment variables the executor adds to every step.
 */
export const JOB_ENV = {
  jobId: 'JOBMATRIX_JOB_ID',
  mode: 'JOBMATRIX_MODE',
  cacheDir: 'JOBMATRIX_CACHE_DIR',
} as const

/**
 * Job lifecycle engine: Pending, Preparing, Running, Succeeded or Failed, Finalizing, Done.
 */
export class JobExecutor implements JobRunner {
  private readonly options: Required<Pick<JobExecutorOptions, 'now' | 'reporters' | 'abortGraceMs'>> &
    Omit<JobExecutorOptions, 'now' | 'reporters' | 'abortGraceMs'>
  private readonly evaluator: ConditionEvaluator

  /**
   * Creates a job executor.
   *
   * @param options Runtime options.
   */
  public constructor(options: JobExecutorOptions) {
    this.options = {
      ...options,
      reporters: options.reporters ?? [],
      abortGraceMs: options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS,
      now: options.now ?? Date.now,
    }
    this.evaluator = new ConditionEvaluator(options.config.scripts, options.config.modeFlags)
  }

  /**
   * Runs a job.
   *
   * Finalizing always runs once the job left Pending, including after a timeout,
   * a cancellation or an unexpected error.
   *
   * @param job Job spec.
   * @param signal Cancels the job.
   * @returns Job outcome.
   */
  public async run(job: JobSpec, signal?: AbortSignal): Promise<JobOutcome> {
    const startedAt = this.options.now()
    if (signal?.aborted) {
      return createCancelledOutcome(job, startedAt)
    }

    const controller = new AbortController()
    let cancelled = false
    let timedOut = false

    const onCancel = (): void => {
      cancelled = true
      controller.abort()
    }
    signal?.addEventListener('abort', onCancel, { once: true })

    const timeoutMs = job.timeoutMs ?? this.options.config.jobTimeoutMs
    const deadline =
      typeof timeoutMs === 'number' && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true
            controller.abort()
          }, timeoutMs)
        : null

    const phases: JobPhase[] = []
    const steps: StepResult[] = []
    const warnings: JobWarning[] = []
    let handle: CacheHandle | null = null
    let verdict: JobVerdict

    await this.enter(job, phases, 'pending')

    try {
      await this.enter(job, phases, 'preparing')
      handle = await this.acquireCache(job, warnings)

      const context: JobRunContext = {
        job,
        env: buildJobEnv(job, handle),
        signal: controller.signal,
        phases,
        steps,
        warnings,
      }
      const script = this.evaluator.resolveScript(job.mode)
      const prepareSteps = [...this.options.config.setup, ...(script.prepare ?? [])]
      verdict = await this.runMainPhases(context, prepareSteps, script.script, () => ({
        cancelled,
        timedOut,
      }))

      await this.enter(job, phases, verdict.status === 'success' ? 'succeeded' : 'failed')
      await this.enter(job, phases, 'finalizing')

      if (verdict.status === 'success') {
        await this.runAfterSuccess(context, script.afterSuccess ?? [])
      }
    } catch (error) {
      verdict = {
        status: 'errored',
        reason: 'executor_error',
        failure: { message: describeError(error) },
      }
      if (!phases.includes('failed')) {
        await this.enter(job, phases, 'failed')
      }
      if (!phases.includes('finalizing')) {
        await this.enter(job, phases, 'finalizing')
      }
    } finally {
      signal?.removeEventListener('abort', onCancel)
      if (deadline) {
        clearTimeout(deadline)
      }
    }

    const cache = handle ? await this.releaseCache(job, handle, verdict.status, warnings) : null

    await this.enter(job, phases, 'done')

    const finishedAt = this.options.now()
    const lastExecuted = [...steps]
      .reverse()
      .find((step) => step.status !== 'skipped' && step.phase !== 'after_success')
    const outcome: JobOutcome = {
      id: job.id,
      name: job.name,
      job,
      status: verdict.status,
      reason: verdict.reason,
      exitCode: lastExecuted?.output.exitCode ?? null,
      allowFailure: job.allowFailure,
      suppressed: job.allowFailure && verdict.status !== 'success',
      phases,
      steps,
      failure: verdict.failure,
      cache,
      warnings,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    }

    for (const reporter of this.options.reporters) {
      await reporter.onJobComplete?.(outcome)
    }

    return outcome
  }

  private async runMainPhases(
    context: JobRunContext,
    prepareSteps: readonly PipelineStep[],
    scriptSteps: readonly PipelineStep[],
    interruption: () => { readonly cancelled: boolean; readonly timedOut: boolean }
  ): Promise<JobVerdict> {
    try {
      await this.runSteps(context, 'prepare', prepareSteps)
    } catch (error) {
      if (!(error instanceof StepFailure)) {
        throw error
      }
      await this.skipSteps(context, 'script', scriptSteps)
      return classifyFailure(error, interruption())
    }

    await this.enter(context.job, context.phases, 'running')

    try {
      await this.runSteps(context, 'script', scriptSteps)
    } catch (error) {
      if (!(error instanceof StepFailure)) {
        throw error
      }
      return classifyFailure(error, interruption())
    }

    return { status: 'success' }
  }

  private async runAfterSuccess(
    context: JobRunContext,
    steps: readonly PipelineStep[]
  ): Promise<void> {
    try {
      await this.runSteps(context, 'after_success', steps)
    } catch (error) {
      if (!(error instanceof StepFailure)) {
        throw error
      }
      await this.warn(context.job, context.warnings, {
        code: 'after_success_failed',
        message: error.message,
      })
    }
  }

  /**
   * Runs steps in order and stops at the first failure.
   *
   * @throws StepFailure for the failed step, after the remaining steps were reported skipped.
   */
  private async runSteps(
    context: JobRunContext,
    phase: StepPhase,
    steps: readonly PipelineStep[]
  ): Promise<void> {
    for (const [index, step] of steps.entries()) {
      if (context.signal.aborted) {
        await this.skipSteps(context, phase, steps.slice(index), 'command_aborted')
        throw new StepFailure({
          stepId: step.id,
          stepName: step.name,
          phase,
          exitCode: null,
          detail: 'was not started because the job was interrupted',
        })
      }

      const result = await this.executeStep(context, phase, step)
      await this.record(context, result)

      if (result.status !== 'passed') {
        await this.skipSteps(context, phase, steps.slice(index + 1))
        throw new StepFailure({
          stepId: step.id,
          stepName: step.name,
          phase,
          exitCode: result.output.exitCode,
          spawnError: result.reason === 'spawn_error',
          detail: describeStepFailure(result),
        })
      }
    }
  }

  private async executeStep(
    context: JobRunContext,
    phase: StepPhase,
    step: PipelineStep
  ): Promise<StepResult> {
    const startedAt = this.options.now()
    const cwd = step.cwd ? resolve(this.options.config.cwd, step.cwd) : this.options.config.cwd

    let execution: CommandExecutionResult
    try {
      execution = await awaitExecution(
        this.options.executor({
          command: step.command,
          cwd,
          env: { ...context.env, ...step.env },
          timeoutMs: step.timeoutMs,
          signal: context.signal,
        }),
        context.signal,
        this.options.abortGraceMs
      )
    } catch (error) {
      execution = createErrorExecutionResult(error)
    }

    const { status, reason } = classifyExecution(execution)
    const finishedAt = this.options.now()

    return {
      id: step.id,
      name: step.name,
      phase,
      status,
      reason,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      output: {
        exitCode: execution.exitCode,
        signal: execution.signal,
        stdout: execution.stdout,
        stderr: execution.stderr,
      },
    }
  }

  private async skipSteps(
    context: JobRunContext,
    phase: StepPhase,
    steps: readonly PipelineStep[],
    reason: StepResultReason = 'previous_step_failed'
  ): Promise<void> {
    const at = this.options.now()

    for (const step of steps) {
      await this.record(context, {
        id: step.id,
        name: step.name,
        phase,
        status: 'skipped',
        reason,
        startedAt: at,
        finishedAt: at,
        durationMs: 0,
        output: { exitCode: null, signal: null, stdout: '', stderr: '' },
      })
    }
  }

  private async record(context: JobRunContext, result: StepResult): Promise<void> {
    context.steps.push(result)
    for (const reporter of this.options.reporters) {
      await reporter.onStepComplete?.(context.job, result)
    }
  }

  private async acquireCache(job: JobSpec, warnings: JobWarning[]): Promise<CacheHandle | null> {
    const cacheManager = this.options.cacheManager
    if (!cacheManager) {
      return null
    }

    try {
      return await cacheManager.acquire(job)
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error
      }
      await this.warn(job, warnings, { code: 'cache_acquire_failed', message: error.message })
      return null
    }
  }

  private async releaseCache(
    job: JobSpec,
    handle: CacheHandle,
    status: JobStatus,
    warnings: JobWarning[]
  ): Promise<CacheReport | null> {
    const cacheManager = this.options.cacheManager
    if (!cacheManager) {
      return null
    }

    try {
      return await cacheManager.release(handle, status)
    } catch (error) {
      await this.warn(job, warnings, {
        code: 'cache_release_failed',
        message: describeError(error),
      })
      return {
        cacheKey: handle.cacheKey,
        restored: handle.directories
          .filter((directory) => directory.restored)
          .map((directory) => directory.name),
        persisted: false,
      }
    }
  }

  private async warn(job: JobSpec, warnings: JobWarning[], warning: JobWarning): Promise<void> {
    warnings.push(warning)
    for (const reporter of this.options.reporters) {
      await reporter.onJobWarning?.(job, warning)
    }
  }

  private async enter(job: JobSpec, phases: JobPhase[], phase: JobPhase): Promise<void> {
    phases.push(phase)
    for (const reporter of this.options.reporters) {
      await reporter.onJobPhase?.(job, phase)
    }
  }
}

/**
 * Creates a job executor.
 *
 * @param options Runtime options.
 * @returns Job executor.
 */
export const createJobExecutor = (options: JobExecutorOptions): JobExecutor => {
  return new JobExecutor(options)
}

/**
 * Outcome of a job that was cancelled before it left Pending.
 *
 * @param job Job spec.
 * @param at Timestamp used for start and finish.
 * @returns Errored outcome with reason `cancelled`.
 */
export const createCancelledOutcome = (job: JobSpec, at: number): JobOutcome => {
  return {
    id: job.id,
    name: job.name,
    job,
    status: 'errored',
    reason: 'cancelled',
    exitCode: null,
    allowFailure: job.allowFailure,
    suppressed: job.allowFailure,
    phases: ['pending', 'done'],
    steps: [],
    cache: null,
    warnings: [],
    startedAt: at,
    finishedAt: at,
    durationMs: 0,
  }
}

const buildJobEnv = (job: JobSpec, handle: CacheHandle | null): Readonly<Record<string, string>> => {
  return {
    ...job.env,
    [JOB_ENV.jobId]: job.id,
    [JOB_ENV.mode]: job.mode,
    ...(handle ? { [JOB_ENV.cacheDir]: handle.root } : {}),
  }
}

const classifyExecution = (
  execution: CommandExecutionResult
): { status: StepStatus; reason?: StepResultReason } => {
  if (execution.successful) {
    return { status: 'passed' }
  }

  if (execution.aborted) {
    return { status: 'failed', reason: 'command_aborted' }
  }

  if (execution.timedOut) {
    return { status: 'timed_out', reason: 'command_timeout' }
  }

  if (execution.error !== undefined) {
    return { status: 'failed', reason: 'spawn_error' }
  }

  return { status: 'failed', reason: 'command_failed' }
}

const classifyFailure = (
  failure: StepFailure,
  interruption: { readonly cancelled: boolean; readonly timedOut: boolean }
): JobVerdict => {
  const details: JobFailure = {
    stepId: failure.stepId,
    phase: failure.phase,
    message: failure.message,
  }

  if (interruption.cancelled) {
    return { status: 'errored', reason: 'cancelled', failure: details }
  }

  if (interruption.timedOut) {
    return { status: 'failed', reason: 'job_timeout', failure: details }
  }

  if (failure.spawnError) {
    return { status: 'errored', reason: 'executor_error', failure: details }
  }

  return {
    status: 'failed',
    reason: failure.phase === 'prepare' ? 'prepare_failed' : 'step_failed',
    failure: details,
  }
}

const describeStepFailure = (result: StepResult): string => {
  switch (result.reason) {
    case 'command_timeout':
      return 'timed out'
    case 'command_aborted':
      return 'was aborted'
    case 'spawn_error':
      return `could not be started: ${result.output.stderr || 'spawn error'}`
    default:
      return `failed with exit code ${String(result.output.exitCode)}`
  }
}

/**
 * Waits for an execution, but no longer than the grace period once the signal aborted.
 *
 * An execution still running after the grace period is abandoned and reported aborted.
 */
const awaitExecution = (
  pending: Promise<CommandExecutionResult>,
  signal: AbortSignal,
  graceMs: number
): Promise<CommandExecutionResult> => {
  return new Promise<CommandExecutionResult>((resolveExecution, rejectExecution) => {
    let graceHandle: NodeJS.Timeout | null = null

    const settle = (): void => {
      signal.removeEventListener('abort', onAbort)
      if (graceHandle) {
        clearTimeout(graceHandle)
      }
    }

    const onAbort = (): void => {
      graceHandle = setTimeout(() => {
        settle()
        resolveExecution(createAbandonedExecutionResult(graceMs))
      }, graceMs)
    }

    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }

    void pending.then(
      (execution) => {
        settle()
        resolveExecution(execution)
      },
      (error: unknown) => {
        settle()
        rejectExecution(error)
      }
    )
  })
}

const createAbandonedExecutionResult = (graceMs: number): CommandExecutionResult => {
  return {
    successful: false,
    timedOut: false,
    aborted: true,
    durationMs: 0,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: `command did not stop within ${graceMs}ms of the interruption`,
  }
}

const createErrorExecutionResult = (error: unknown): CommandExecutionResult => {
  return {
    successful: false,
    timedOut: false,
    aborted: false,
    durationMs: 0,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: describeError(error),
    error,
  }
}
