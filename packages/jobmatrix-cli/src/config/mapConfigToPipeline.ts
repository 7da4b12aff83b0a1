import { resolve } from 'node:path'

import type { CacheSettings, PipelineConfigInput } from '@jobmatrix/core'

import type { JobMatrixConfig } from './types.js'

/**
 * Default cache store location, relative to the pipeline cwd.
 */
export const DEFAULT_CACHE_STORE_DIR = '.jobmatrix/cache'

/**
 * Default location of job-local cache copies, relative to the pipeline cwd.
 */
export const DEFAULT_CACHE_WORK_DIR = '.jobmatrix/work'

/**
 * Resolved cache wiring for the CLI.
 */
export interface MappedCache {
  /** Core cache settings. */
  readonly settings: CacheSettings
  /** Absolute store root. */
  readonly storeDir: string
  /** Absolute root for job-local copies. */
  readonly workRoot: string
}

/**
 * Resolved deploy command wiring for the CLI.
 */
export interface MappedDeployCommand {
  /** Shell command performing the deployment. */
  readonly command: string
  /** Working directory of the deploy command. */
  readonly cwd: string
  /** Deploy command timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Config split into the core pipeline input and the CLI-only wiring.
 */
export interface MappedPipeline {
  /** Core pipeline description. */
  readonly input: PipelineConfigInput
  /** Cache wiring, when caching is configured. */
  readonly cache?: MappedCache
  /** Deploy command, when deploy is configured. */
  readonly deployCommand?: MappedDeployCommand
}

/**
 * Maps a loaded config onto the core pipeline input.
 *
 * Relative paths resolve against `config.cwd`, which itself resolves against `cwd`.
 *
 * @param config Parsed CLI config.
 * @param cwd Base working directory.
 * @returns Core pipeline input plus CLI wiring.
 */
export const mapConfigToPipeline = (config: JobMatrixConfig, cwd: string): MappedPipeline => {
  const runCwd = config.cwd ? resolve(cwd, config.cwd) : cwd
  const deploy = config.deploy
  const cache = config.cache

  const input: PipelineConfigInput = {
    matrix: config.matrix,
    env: config.env,
    modeFlags: config.modeFlags,
    setup: config.setup,
    scripts: config.scripts,
    cache: cache ? { directories: cache.directories, prune: cache.prune } : undefined,
    deploy: deploy
      ? {
          provider: deploy.provider,
          localDir: resolve(runCwd, deploy.localDir),
          tokenEnv: deploy.tokenEnv,
          on: deploy.on,
        }
      : undefined,
    branches: config.branches,
    jobTimeoutMs: config.jobTimeoutMs,
    maxParallel: config.maxParallel,
    cwd: runCwd,
  }

  return {
    input,
    ...(cache
      ? {
          cache: {
            settings: { directories: cache.directories, prune: cache.prune },
            storeDir: resolve(runCwd, cache.storeDir ?? DEFAULT_CACHE_STORE_DIR),
            workRoot: resolve(runCwd, cache.workDir ?? DEFAULT_CACHE_WORK_DIR),
          },
        }
      : {}),
    ...(deploy
      ? {
          deployCommand: {
            command: deploy.command,
            cwd: runCwd,
            timeoutMs: deploy.timeoutMs,
          },
        }
      : {}),
  }
}
