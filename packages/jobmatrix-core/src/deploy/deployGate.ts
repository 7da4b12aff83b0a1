import type {
  DeployAction,
  DeployDecision,
  DeployReport,
  DeploySettings,
  RepositoryContext,
} from '../contracts/deploy.js'
import type { JobOutcome } from '../contracts/job.js'
import type { PipelineConfig, PipelineOutcome } from '../contracts/pipeline.js'
import { DeployError, describeError } from '../errors.js'
import { matchesJob } from '../matrix/matchJob.js'

/**
 * Runtime options of the deploy gate.
 */
export interface DeployGateOptions {
  /** Immutable pipeline configuration; the gate reads `config.deploy`. */
  readonly config: PipelineConfig
  /** Performs the deployment; without one the gate only evaluates. */
  readonly action?: DeployAction
}

/**
 * Decides whether the post-pipeline deployment runs and fires it at most once.
 */
export class DeployGate {
  private readonly settings: DeploySettings | undefined
  private readonly action: DeployAction | undefined
  private fired = false

  /**
   * Creates a deploy gate.
   *
   * @param options Runtime options.
   */
  public constructor(options: DeployGateOptions) {
    this.settings = options.config.deploy
    this.action = options.action
  }

  /**
   * Evaluates the firing conditions without side effects.
   *
   * The trigger job's own status is checked, so a pipeline that passed only because the
   * trigger job was allowed to fail does not deploy.
   *
   * @param outcome Final pipeline outcome.
   * @param context Repository context.
   * @returns Deploy decision.
   */
  public evaluate(outcome: PipelineOutcome, context: RepositoryContext): DeployDecision {
    const settings = this.settings
    if (!settings) {
      return { shouldDeploy: false, reason: 'not_configured' }
    }

    if (this.fired) {
      return { shouldDeploy: false, reason: 'already_deployed' }
    }

    if (outcome.status !== 'success') {
      return { shouldDeploy: false, reason: 'pipeline_failed' }
    }

    if (context.branch !== settings.on.branch) {
      return { shouldDeploy: false, reason: 'branch_mismatch' }
    }

    if (settings.on.tags && !context.tag) {
      return { shouldDeploy: false, reason: 'tag_required' }
    }

    const requiredEnv = Object.entries(settings.on.requiredEnv ?? {})
    if (requiredEnv.some(([key, value]) => context.env[key] !== value)) {
      return { shouldDeploy: false, reason: 'missing_env' }
    }

    const trigger = findTriggerOutcome(outcome, settings)
    if (!trigger) {
      return { shouldDeploy: false, reason: 'trigger_job_missing' }
    }

    if (trigger.status !== 'success') {
      return { shouldDeploy: false, reason: 'trigger_job_failed', triggerJobId: trigger.id }
    }

    return { shouldDeploy: true, reason: 'ready', triggerJobId: trigger.id }
  }

  /**
   * Evaluates the gate and runs the action when it opens.
   *
   * Once the action ran, whether it succeeded or not, later calls are no-ops. A gate
   * without an action reports its decision and never fires.
   *
   * @param outcome Final pipeline outcome.
   * @param context Repository context.
   * @returns Decision plus the action result.
   */
  public async maybeDeploy(
    outcome: PipelineOutcome,
    context: RepositoryContext
  ): Promise<DeployReport> {
    const decision = this.evaluate(outcome, context)
    const settings = this.settings
    const trigger = settings ? findTriggerOutcome(outcome, settings) : undefined
    const action = this.action
    if (!decision.shouldDeploy || !settings || !trigger || !action) {
      return { decision, fired: false }
    }

    this.fired = true

    try {
      await action({
        provider: settings.provider,
        localDir: settings.localDir,
        branch: context.branch,
        tag: context.tag,
        token: settings.tokenEnv ? context.env[settings.tokenEnv] : undefined,
        triggerJob: trigger.job,
        flags: trigger.job.env,
      })
      return { decision, fired: true }
    } catch (error) {
      return {
        decision,
        fired: true,
        error: new DeployError(
          settings.provider,
          `Deployment via ${settings.provider} failed: ${describeError(error)}`,
          error
        ),
      }
    }
  }
}

const findTriggerOutcome = (
  outcome: PipelineOutcome,
  settings: DeploySettings
): JobOutcome | undefined => {
  return outcome.jobs.find((jobOutcome) => matchesJob(settings.on.trigger, jobOutcome.job))
}
