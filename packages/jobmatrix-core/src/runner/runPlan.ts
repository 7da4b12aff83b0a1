import type { CacheManager } from '../cache/cacheManager.js'
import type { DeployAction, DeployReport, RepositoryContext } from '../contracts/deploy.js'
import type { CommandExecutor } from '../contracts/executor.js'
import type { PipelineOutcome, PipelinePlan } from '../contracts/pipeline.js'
import type { PipelineReporter } from '../contracts/reporter.js'
import { DeployGate } from '../deploy/deployGate.js'
import { createJobExecutor } from './jobExecutor.js'
import { createScheduler } from './scheduler.js'

/**
 * Everything needed to run a planned pipeline end to end.
 */
export interface RunPlanOptions {
  /** Validated plan. */
  readonly plan: PipelinePlan
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  /** Repository context for the deploy gate. */
  readonly context: RepositoryContext
  /** Cache manager; jobs run without cache when omitted. */
  readonly cacheManager?: CacheManager
  /** Deployment action; the gate is only evaluated when omitted. */
  readonly deployAction?: DeployAction
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Worker limit overriding the configured one. */
  readonly maxParallel?: number
  /** Cancels the run. */
  readonly signal?: AbortSignal
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Result of a full run.
 */
export interface PlanRunResult {
  /** Aggregated job outcomes. */
  readonly pipeline: PipelineOutcome
  /** Deploy gate result. */
  readonly deploy: DeployReport
  /** 0 when the pipeline passed and no deployment failed. */
  readonly exitCode: 0 | 1
}

/**
 * Runs every job of a plan, then the deploy gate.
 *
 * @param options Run options.
 * @returns Pipeline outcome, deploy report and exit code.
 */
export const runPlan = async (options: RunPlanOptions): Promise<PlanRunResult> => {
  const { plan } = options
  const reporters = options.reporters ?? []

  const scheduler = createScheduler({
    runner: createJobExecutor({
      config: plan.config,
      executor: options.executor,
      cacheManager: options.cacheManager,
      reporters,
      now: options.now,
    }),
    maxParallel: options.maxParallel ?? plan.config.maxParallel,
    reporters,
    now: options.now,
  })

  const pipeline = await scheduler.runPipeline(plan.jobs, options.signal)

  const gate = new DeployGate({ config: plan.config, action: options.deployAction })
  const deploy = await gate.maybeDeploy(pipeline, options.context)

  for (const reporter of reporters) {
    await reporter.onDeploy?.(deploy)
  }

  return {
    pipeline,
    deploy,
    exitCode: resolveExitCode(pipeline, deploy),
  }
}

/**
 * Derives the process exit code.
 *
 * @param pipeline Pipeline outcome.
 * @param deploy Deploy report.
 * @returns 0 on success, 1 otherwise.
 */
export const resolveExitCode = (pipeline: PipelineOutcome, deploy: DeployReport): 0 | 1 => {
  return pipeline.status === 'success' && !deploy.error ? 0 : 1
}
