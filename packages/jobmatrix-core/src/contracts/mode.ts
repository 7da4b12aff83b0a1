import type { PipelineStep } from './step.js'

/**
 * Modes that are switched on by a dedicated environment flag.
 */
export type ExclusiveJobMode = 'format-check' | 'coverage' | 'doc-build' | 'cross-target'

/**
 * Script branch a job runs. `default` applies when no flag is set.
 */
export type JobMode = ExclusiveJobMode | 'default'

/**
 * Environment flag names keyed by exclusive mode.
 */
export type ModeFlags = Readonly<Record<ExclusiveJobMode, string>>

/**
 * Result of mode selection for one job environment.
 */
export interface ModeSelection {
  /** Selected mode. */
  readonly mode: JobMode
  /** Flag that selected the mode, absent for `default`. */
  readonly flag?: string
  /** Flag value; the target platform for `cross-target`. */
  readonly value?: string
}

/**
 * Ordered step sequences of one mode.
 */
export interface ModeScript {
  /** Mode-specific setup run during the preparing phase. */
  readonly prepare?: readonly PipelineStep[]
  /** Main steps, run fail-fast. */
  readonly script: readonly PipelineStep[]
  /** Steps run only after the main steps succeeded. */
  readonly afterSuccess?: readonly PipelineStep[]
}

/**
 * Step sequences keyed by mode. `default` is mandatory.
 */
export type ModeScripts = Readonly<Partial<Record<ExclusiveJobMode, ModeScript>>> & {
  readonly default: ModeScript
}
