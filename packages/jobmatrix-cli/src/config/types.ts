import type {
  BranchFilter,
  ExclusiveJobMode,
  MatrixDefinition,
  MatrixMatcher,
  ModeFlags,
  PipelineStep,
} from '@jobmatrix/core'

/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * User-facing step definition loaded from config.
 */
export type CliConfigStep = PipelineStep

/**
 * Step sequences of one mode.
 */
export interface CliModeScript {
  /** Mode-specific setup steps. */
  readonly prepare?: readonly CliConfigStep[]
  /** Main steps, run fail-fast. */
  readonly script: readonly CliConfigStep[]
  /** Steps run after the main steps succeeded. */
  readonly afterSuccess?: readonly CliConfigStep[]
}

/**
 * Scripts keyed by mode. `default` is required.
 */
export type CliModeScripts = { readonly default: CliModeScript } & Readonly<
  Partial<Record<ExclusiveJobMode, CliModeScript>>
>

/**
 * Cache section of the config.
 */
export interface JobMatrixCacheConfig {
  /** Directory names cached per job. */
  readonly directories: readonly string[]
  /** Volatile subpaths pruned before persisting. */
  readonly prune?: readonly string[]
  /** Cross-run store location, relative to the pipeline cwd (default `.jobmatrix/cache`). */
  readonly storeDir?: string
  /** Job-local copies, relative to the pipeline cwd (default `.jobmatrix/work`). */
  readonly workDir?: string
}

/**
 * Deploy section of the config.
 */
export interface JobMatrixDeployConfig {
  /** Provider label used in reports. */
  readonly provider: string
  /** Shell command performing the deployment. */
  readonly command: string
  /** Artifact directory, relative to the pipeline cwd. */
  readonly localDir: string
  /** Environment variable holding the deploy token. */
  readonly tokenEnv?: string
  /** Deploy command timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Firing conditions. */
  readonly on: {
    /** Branch the pipeline must run on. */
    readonly branch: string
    /** Matcher selecting the trigger job. */
    readonly trigger: MatrixMatcher
    /** Requires a tag build when true. */
    readonly tags?: boolean
    /** Exact values the environment must carry. */
    readonly requiredEnv?: Readonly<Record<string, string>>
  }
}

/**
 * Top-level CLI config model.
 */
export interface JobMatrixConfig {
  /** Build matrix. */
  readonly matrix: MatrixDefinition
  /** Base environment of every job. */
  readonly env?: Readonly<Record<string, string>>
  /** Flag name overrides for the exclusive modes. */
  readonly modeFlags?: Partial<ModeFlags>
  /** Steps every job runs first. */
  readonly setup?: readonly CliConfigStep[]
  /** Step sequences keyed by mode. */
  readonly scripts: CliModeScripts
  /** Cached directories. */
  readonly cache?: JobMatrixCacheConfig
  /** Gated deployment. */
  readonly deploy?: JobMatrixDeployConfig
  /** Branch filters. */
  readonly branches?: BranchFilter
  /** Default wall-clock limit per job in milliseconds. */
  readonly jobTimeoutMs?: number
  /** Worker limit. */
  readonly maxParallel?: number
  /** Relative or absolute working directory for the whole pipeline. */
  readonly cwd?: string
  /** Default output behavior from config. */
  readonly output?: {
    /** Preferred output format. */
    readonly format?: CliOutputFormat
    /** Emits all step output on success when true. */
    readonly verbose?: boolean
  }
}
