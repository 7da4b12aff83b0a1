export type {
  CacheDirectoryLease,
  CacheHandle,
  CacheReport,
  CacheSettings,
  CacheStore,
} from './contracts/cache.js'
export type {
  DeployAction,
  DeployConditions,
  DeployDecision,
  DeployDecisionReason,
  DeployReport,
  DeployRequest,
  DeploySettings,
  RepositoryContext,
} from './contracts/deploy.js'
export type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
} from './contracts/executor.js'
export type {
  JobFailure,
  JobOutcome,
  JobOutcomeReason,
  JobPhase,
  JobStatus,
  JobWarning,
} from './contracts/job.js'
export type {
  JobOrigin,
  JobSpec,
  MatrixAxis,
  MatrixDefinition,
  MatrixInclude,
  MatrixMatcher,
} from './contracts/matrix.js'
export type {
  ExclusiveJobMode,
  JobMode,
  ModeFlags,
  ModeScript,
  ModeScripts,
  ModeSelection,
} from './contracts/mode.js'
export type {
  BranchFilter,
  PipelineConfig,
  PipelineConfigInput,
  PipelineOutcome,
  PipelinePlan,
  PipelineStatus,
  PipelineSummary,
} from './contracts/pipeline.js'
export type { PipelineReporter } from './contracts/reporter.js'
export type {
  PipelineStep,
  StepExecutionOutput,
  StepPhase,
  StepResult,
  StepResultReason,
  StepStatus,
} from './contracts/step.js'

export type { JobMatrixErrorCode } from './errors.js'
export {
  CacheError,
  ConfigurationError,
  DeployError,
  describeError,
  JobMatrixError,
  StepFailure,
} from './errors.js'

export type { BeforeCacheHook, CacheManagerOptions } from './cache/cacheManager.js'
export { CacheManager } from './cache/cacheManager.js'
export { FileSystemCacheStore } from './cache/fileSystemCacheStore.js'
export { ConditionEvaluator, DEFAULT_MODE_FLAGS, MODE_PRIORITY } from './conditions/conditionEvaluator.js'
export type { DeployGateOptions } from './deploy/deployGate.js'
export { DeployGate } from './deploy/deployGate.js'
export { createNodeCommandExecutor } from './execution/nodeCommandExecutor.js'
export type { ExpandMatrixOptions } from './matrix/expandMatrix.js'
export { createCacheKey, expandMatrix } from './matrix/expandMatrix.js'
export type { MatchTarget } from './matrix/matchJob.js'
export { matchesJob } from './matrix/matchJob.js'
export {
  createPipelineConfig,
  isBranchAllowed,
  planPipeline,
  selectJobs,
} from './planning/planPipeline.js'
export { formatRunResultAsJson } from './reporters/jsonFormatter.js'
export type { JobExecutorOptions, JobRunner } from './runner/jobExecutor.js'
export {
  createCancelledOutcome,
  createJobExecutor,
  JOB_ENV,
  JobExecutor,
} from './runner/jobExecutor.js'
export type { PlanRunResult, RunPlanOptions } from './runner/runPlan.js'
export { resolveExitCode, runPlan } from './runner/runPlan.js'
export type { SchedulerOptions } from './runner/scheduler.js'
export { aggregateStatus, createScheduler, Scheduler } from './runner/scheduler.js'
