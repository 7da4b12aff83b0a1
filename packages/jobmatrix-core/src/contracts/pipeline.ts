import type { CacheSettings } from './cache.js'
import type { DeploySettings } from './deploy.js'
import type { JobOutcome } from './job.js'
import type { JobSpec, MatrixDefinition } from './matrix.js'
import type { ModeFlags, ModeScripts } from './mode.js'
import type { PipelineStep } from './step.js'

/**
 * Branch allow and deny lists. Entries wrapped in slashes are regular expressions.
 */
export interface BranchFilter {
  /** Only these branches run the pipeline. */
  readonly only?: readonly string[]
  /** These branches never run the pipeline. */
  readonly except?: readonly string[]
}

/**
 * Pipeline description before defaults are applied.
 */
export interface PipelineConfigInput {
  /** Build matrix. */
  readonly matrix: MatrixDefinition
  /** Base environment of every job. */
  readonly env?: Readonly<Record<string, string>>
  /** Overrides for the flag names selecting each exclusive mode. */
  readonly modeFlags?: Partial<ModeFlags>
  /** Steps every job runs first while preparing. */
  readonly setup?: readonly PipelineStep[]
  /** Step sequences keyed by mode. */
  readonly scripts: ModeScripts
  /** Cached directories. */
  readonly cache?: CacheSettings
  /** Gated deployment. */
  readonly deploy?: DeploySettings
  /** Branch filters. */
  readonly branches?: BranchFilter
  /** Default wall-clock limit per job. */
  readonly jobTimeoutMs?: number
  /** Worker limit. */
  readonly maxParallel?: number
  /** Working directory of steps without their own. */
  readonly cwd: string
}

/**
 * Immutable pipeline configuration shared by planner, executor, scheduler and gate.
 */
export interface PipelineConfig {
  readonly matrix: MatrixDefinition
  readonly env: Readonly<Record<string, string>>
  readonly modeFlags: ModeFlags
  readonly setup: readonly PipelineStep[]
  readonly scripts: ModeScripts
  readonly cache?: CacheSettings
  readonly deploy?: DeploySettings
  readonly branches?: BranchFilter
  readonly jobTimeoutMs?: number
  readonly maxParallel?: number
  readonly cwd: string
}

/**
 * Validated configuration plus the expanded jobs.
 */
export interface PipelinePlan {
  /** Frozen configuration. */
  readonly config: PipelineConfig
  /** Jobs in expansion order. */
  readonly jobs: readonly JobSpec[]
  /** Id of the deploy trigger job, when deploy is configured. */
  readonly deployTriggerId?: string
}

/**
 * Aggregate pipeline status.
 */
export type PipelineStatus = 'success' | 'failed'

/**
 * Summary counts for one pipeline run.
 */
export interface PipelineSummary {
  /** Number of jobs. */
  readonly total: number
  /** Jobs with status success. */
  readonly succeeded: number
  /** Jobs with status failed. */
  readonly failed: number
  /** Jobs with status errored. */
  readonly errored: number
  /** Non-success jobs suppressed by allow-failure. */
  readonly allowedFailures: number
  /** Warnings across all jobs. */
  readonly warnings: number
  /** Total pipeline runtime in milliseconds. */
  readonly durationMs: number
}

/**
 * Final pipeline run data.
 */
export interface PipelineOutcome {
  /** Success only when every job that may not fail succeeded. */
  readonly status: PipelineStatus
  /** Job outcomes in job order. */
  readonly jobs: readonly JobOutcome[]
  /** Aggregated counts. */
  readonly summary: PipelineSummary
  /** True when the run was cancelled. */
  readonly cancelled: boolean
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
}
