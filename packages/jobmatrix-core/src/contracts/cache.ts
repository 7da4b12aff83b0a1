/**
 * Cache settings shared by every job of a pipeline.
 */
export interface CacheSettings {
  /** Directory names cached per job, relative to the job cache root. */
  readonly directories: readonly string[]
  /** Volatile subpaths removed before a directory is persisted. */
  readonly prune?: readonly string[]
}

/**
 * One cached directory leased to a job.
 */
export interface CacheDirectoryLease {
  /** Configured directory name. */
  readonly name: string
  /** Absolute path of the job-local copy. */
  readonly path: string
  /** True when content was restored from a previous run. */
  readonly restored: boolean
}

/**
 * Lease on the cache directories of one job for one run.
 */
export interface CacheHandle {
  /** Owning job id. */
  readonly jobId: string
  /** Store key derived from the job spec. */
  readonly cacheKey: string
  /** Job-local cache root holding every leased directory. */
  readonly root: string
  /** Leased directories in configured order. */
  readonly directories: readonly CacheDirectoryLease[]
}

/**
 * Cross-run persistence backend for cached directories.
 */
export interface CacheStore {
  /**
   * Copies a stored directory into the target path.
   *
   * @returns False on a cache miss.
   */
  restore(cacheKey: string, directory: string, targetPath: string): Promise<boolean>

  /**
   * Replaces the stored directory with the content of the source path.
   */
  persist(cacheKey: string, directory: string, sourcePath: string): Promise<void>
}

/**
 * Cache activity recorded on a job outcome.
 */
export interface CacheReport {
  /** Cache key used by the job. */
  readonly cacheKey: string
  /** Directories restored from a previous run. */
  readonly restored: readonly string[]
  /** True when every directory was persisted or skipped as an empty miss. */
  readonly persisted: boolean
}
