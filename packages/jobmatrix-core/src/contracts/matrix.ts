import type { JobMode } from './mode.js'

/**
 * One dimension of variation in a build matrix.
 */
export interface MatrixAxis {
  /** Axis name, unique within the matrix. */
  readonly name: string
  /** Ordered axis values. Must not be empty. */
  readonly values: readonly string[]
  /** Exports the job's value for this axis under this variable name. */
  readonly envVar?: string
}

/**
 * Partial assignment of axis values and environment used to select jobs.
 *
 * Keys left out are wildcards.
 */
export interface MatrixMatcher {
  /** Required axis values. */
  readonly values?: Readonly<Record<string, string>>
  /** Required environment values. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Include entry adding one job outright.
 */
export interface MatrixInclude {
  /** Optional display name. */
  readonly name?: string
  /** Axis values, full or partial. */
  readonly values?: Readonly<Record<string, string>>
  /** Environment overrides; these win over every other source. */
  readonly env?: Readonly<Record<string, string>>
  /** Marks this job's failure as non-fatal for the pipeline. */
  readonly allowFailure?: boolean
  /** Job needs elevated privileges. */
  readonly privileged?: boolean
  /** Extra services requested for the job. */
  readonly services?: readonly string[]
  /** Wall-clock limit for the whole job. */
  readonly timeoutMs?: number
}

/**
 * Declarative matrix description.
 */
export interface MatrixDefinition {
  /** Axes in declaration order; the first one varies slowest. */
  readonly axes: readonly MatrixAxis[]
  /** Jobs appended after the cross-product. */
  readonly include?: readonly MatrixInclude[]
  /** Cross-product combinations to drop. */
  readonly exclude?: readonly MatrixMatcher[]
  /** Jobs matching one of these are allowed to fail. */
  readonly allowFailures?: readonly MatrixMatcher[]
}

/**
 * Where a job spec came from.
 */
export type JobOrigin = 'matrix' | 'include'

/**
 * One fully resolved, runnable job. Frozen after expansion.
 */
export interface JobSpec {
  /** Stable id in expansion order (`job-1`, `job-2`, ...). */
  readonly id: string
  /** Zero-based position in expansion order. */
  readonly index: number
  /** Identity built from axis values and entry overrides. Unique per pipeline. */
  readonly key: string
  /** File system safe cache key derived from `key`. */
  readonly cacheKey: string
  /** Display name. */
  readonly name: string
  /** Cross-product member or include entry. */
  readonly origin: JobOrigin
  /** Resolved axis values. */
  readonly values: Readonly<Record<string, string>>
  /** Resolved environment. */
  readonly env: Readonly<Record<string, string>>
  /** Script branch selected from the environment. */
  readonly mode: JobMode
  /** Target platform for cross-target jobs. */
  readonly target?: string
  /** Failure does not fail the pipeline. */
  readonly allowFailure: boolean
  /** Job needs elevated privileges. */
  readonly privileged: boolean
  /** Extra services requested for the job. */
  readonly services: readonly string[]
  /** Wall-clock limit for the whole job. */
  readonly timeoutMs?: number
}
