import { mkdir, readdir, rm } from 'node:fs/promises'
import { resolve } from 'node:path'

import type {
  CacheDirectoryLease,
  CacheHandle,
  CacheReport,
  CacheSettings,
  CacheStore,
} from '../contracts/cache.js'
import type { JobStatus } from '../contracts/job.js'
import type { JobSpec } from '../contracts/matrix.js'
import { CacheError, describeError } from '../errors.js'
import { isMissingPathError } from './fileSystemCacheStore.js'

/**
 * Cleanup run after a job's steps and before its cache is persisted.
 */
export type BeforeCacheHook = (handle: CacheHandle, status: JobStatus) => Promise<void>

/**
 * Runtime options of the cache manager.
 */
export interface CacheManagerOptions {
  /** Cached directories and volatile subpaths. */
  readonly settings: CacheSettings
  /** Cross-run persistence backend. */
  readonly store: CacheStore
  /** Directory holding the job-local cache copies of one run. */
  readonly workRoot: string
  /** Replaces the default cleanup, which prunes `settings.prune` from every directory. */
  readonly beforeCache?: BeforeCacheHook
}

/**
 * Leases cache directories to jobs and persists them after every job, whatever its status.
 */
export class CacheManager {
  private readonly options: CacheManagerOptions
  private readonly beforeCache: BeforeCacheHook

  /**
   * Creates a cache manager.
   *
   * @param options Runtime options.
   */
  public constructor(options: CacheManagerOptions) {
    this.options = options
    this.beforeCache =
      options.beforeCache ?? (async (handle): Promise<void> => this.pruneVolatilePaths(handle))
  }

  /**
   * Restores the job's cache directories into a fresh job-local root.
   *
   * A store miss leaves an empty directory behind.
   *
   * @param job Job spec; its cache key names the store entries.
   * @returns Cache handle owned by this job.
   * @throws CacheError on file system or store failures.
   */
  public async acquire(job: JobSpec): Promise<CacheHandle> {
    const root = resolve(this.options.workRoot, job.cacheKey)

    try {
      await rm(root, { recursive: true, force: true })
      await mkdir(root, { recursive: true })
    } catch (error) {
      throw new CacheError(
        job.cacheKey,
        `Could not prepare cache root ${root}: ${describeError(error)}`,
        error
      )
    }

    const directories: CacheDirectoryLease[] = []
    for (const name of this.options.settings.directories) {
      const path = resolve(root, name)

      try {
        const restored = await this.options.store.restore(job.cacheKey, name, path)
        if (!restored) {
          await mkdir(path, { recursive: true })
        }
        directories.push({ name, path, restored })
      } catch (error) {
        throw new CacheError(
          job.cacheKey,
          `Could not restore cache directory ${name}: ${describeError(error)}`,
          error
        )
      }
    }

    return {
      jobId: job.id,
      cacheKey: job.cacheKey,
      root,
      directories,
    }
  }

  /**
   * Runs the before-cache cleanup once, persists every directory and drops the job-local root.
   *
   * A directory that missed the store and is still empty is not persisted, so a job that
   * wrote nothing leaves the store unchanged.
   *
   * @param handle Handle returned by `acquire`.
   * @param status Final status of the job's steps.
   * @returns Cache activity summary.
   * @throws CacheError on cleanup, file system or store failures.
   */
  public async release(handle: CacheHandle, status: JobStatus): Promise<CacheReport> {
    try {
      await this.beforeCache(handle, status)
    } catch (error) {
      throw new CacheError(
        handle.cacheKey,
        `Before-cache cleanup failed: ${describeError(error)}`,
        error
      )
    }

    for (const directory of handle.directories) {
      try {
        if (!directory.restored && (await isEmptyDirectory(directory.path))) {
          continue
        }
        await this.options.store.persist(handle.cacheKey, directory.name, directory.path)
      } catch (error) {
        throw new CacheError(
          handle.cacheKey,
          `Could not persist cache directory ${directory.name}: ${describeError(error)}`,
          error
        )
      }
    }

    try {
      await rm(handle.root, { recursive: true, force: true })
    } catch (error) {
      throw new CacheError(
        handle.cacheKey,
        `Could not remove cache root ${handle.root}: ${describeError(error)}`,
        error
      )
    }

    return {
      cacheKey: handle.cacheKey,
      restored: handle.directories
        .filter((directory) => directory.restored)
        .map((directory) => directory.name),
      persisted: true,
    }
  }

  private async pruneVolatilePaths(handle: CacheHandle): Promise<void> {
    const prune = this.options.settings.prune ?? []

    for (const directory of handle.directories) {
      for (const subpath of prune) {
        await rm(resolve(directory.path, subpath), { recursive: true, force: true })
      }
    }
  }
}

const isEmptyDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await readdir(path)).length === 0
  } catch (error) {
    if (isMissingPathError(error)) {
      return true
    }
    throw error
  }
}
