import type { DeployError } from '../errors.js'
import type { JobSpec, MatrixMatcher } from './matrix.js'

/**
 * Conditions that must all hold before the deployment fires.
 */
export interface DeployConditions {
  /** Branch the pipeline must run on. */
  readonly branch: string
  /** Matcher selecting the one job whose own success is required. */
  readonly trigger: MatrixMatcher
  /** Requires a tag build when true. */
  readonly tags?: boolean
  /** Exact values the repository environment must carry. */
  readonly requiredEnv?: Readonly<Record<string, string>>
}

/**
 * Deployment settings of a pipeline.
 */
export interface DeploySettings {
  /** Provider label used in reports. */
  readonly provider: string
  /** Artifact directory handed to the action. */
  readonly localDir: string
  /** Environment variable holding the deploy token. */
  readonly tokenEnv?: string
  /** Firing conditions. */
  readonly on: DeployConditions
}

/**
 * Repository state the gate is evaluated against.
 */
export interface RepositoryContext {
  /** Current branch name. */
  readonly branch: string
  /** Tag of the build, when it is a tag build. */
  readonly tag?: string
  /** Repository environment used for required flags and the token. */
  readonly env: Readonly<Record<string, string | undefined>>
}

/**
 * Why the gate did or did not fire.
 */
export type DeployDecisionReason =
  | 'ready'
  | 'not_configured'
  | 'pipeline_failed'
  | 'branch_mismatch'
  | 'tag_required'
  | 'missing_env'
  | 'trigger_job_missing'
  | 'trigger_job_failed'
  | 'already_deployed'

/**
 * Result of evaluating the gate.
 */
export interface DeployDecision {
  /** True when the action should run. */
  readonly shouldDeploy: boolean
  /** Decision reason. */
  readonly reason: DeployDecisionReason
  /** Id of the trigger job, when one was found. */
  readonly triggerJobId?: string
}

/**
 * Payload handed to the deployment action.
 */
export interface DeployRequest {
  /** Provider label. */
  readonly provider: string
  /** Artifact directory. */
  readonly localDir: string
  /** Current branch. */
  readonly branch: string
  /** Current tag. */
  readonly tag?: string
  /** Deploy token read from the repository environment. */
  readonly token?: string
  /** Job whose success triggered the deploy. */
  readonly triggerJob: JobSpec
  /** Environment flags of the trigger job. */
  readonly flags: Readonly<Record<string, string>>
}

/**
 * Performs the deployment.
 */
export type DeployAction = (request: DeployRequest) => Promise<void>

/**
 * Outcome of one gate invocation.
 */
export interface DeployReport {
  /** Gate decision. */
  readonly decision: DeployDecision
  /** True when the action ran during this invocation. */
  readonly fired: boolean
  /** Action failure. */
  readonly error?: DeployError
}
