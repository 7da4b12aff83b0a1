import { isAbsolute, normalize } from 'node:path'

import { ConditionEvaluator, DEFAULT_MODE_FLAGS } from '../conditions/conditionEvaluator.js'
import type { JobSpec } from '../contracts/matrix.js'
import type {
  BranchFilter,
  PipelineConfig,
  PipelineConfigInput,
  PipelinePlan,
} from '../contracts/pipeline.js'
import { ConfigurationError } from '../errors.js'
import { expandMatrix } from '../matrix/expandMatrix.js'
import { matchesJob } from '../matrix/matchJob.js'

/**
 * Applies defaults, validates settings the matrix does not cover and freezes the result.
 *
 * The input is copied, so freezing never touches caller-owned objects.
 *
 * @param input Pipeline description.
 * @returns Immutable pipeline configuration.
 * @throws ConfigurationError for invalid cache paths, limits or deploy settings.
 */
export const createPipelineConfig = (input: PipelineConfigInput): PipelineConfig => {
  const copy = structuredClone(input)

  const config: PipelineConfig = {
    ...copy,
    env: copy.env ?? {},
    modeFlags: { ...DEFAULT_MODE_FLAGS, ...copy.modeFlags },
    setup: copy.setup ?? [],
  }

  assertValidCache(config)
  assertPositive(config.jobTimeoutMs, 'jobTimeoutMs')
  assertPositiveInteger(config.maxParallel, 'maxParallel')

  if (config.deploy && config.deploy.on.branch.length === 0) {
    throw new ConfigurationError('deploy.on.branch must be a non-empty string')
  }

  return deepFreeze(config)
}

/**
 * Validates a pipeline and expands its matrix. Nothing runs before this succeeds.
 *
 * @param input Pipeline description or an already created configuration.
 * @returns Pipeline plan.
 * @throws ConfigurationError for any invalid setting, missing script or ambiguous deploy trigger.
 */
export const planPipeline = (input: PipelineConfigInput | PipelineConfig): PipelinePlan => {
  const config =
    Object.isFrozen(input) && isPipelineConfig(input) ? input : createPipelineConfig(input)
  const evaluator = new ConditionEvaluator(config.scripts, config.modeFlags)
  const jobs = expandMatrix(config.matrix, { env: config.env, evaluator })

  for (const job of jobs) {
    try {
      evaluator.resolveScript(job.mode)
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(`${job.id} (${job.key}): ${error.message}`)
      }
      throw error
    }
  }

  const deployTriggerId = resolveDeployTrigger(config, jobs)

  return {
    config,
    jobs,
    ...(deployTriggerId ? { deployTriggerId } : {}),
  }
}

/**
 * Narrows a plan to the given job ids, keeping expansion order.
 *
 * @param plan Pipeline plan.
 * @param ids Requested job ids; an empty list keeps every job.
 * @returns Narrowed plan.
 * @throws ConfigurationError for unknown ids.
 */
export const selectJobs = (plan: PipelinePlan, ids: readonly string[]): PipelinePlan => {
  if (ids.length === 0) {
    return plan
  }

  const known = new Set(plan.jobs.map((job) => job.id))
  for (const id of ids) {
    if (!known.has(id)) {
      throw new ConfigurationError(`Unknown job: ${id}`)
    }
  }

  const requested = new Set(ids)
  return {
    ...plan,
    jobs: plan.jobs.filter((job) => requested.has(job.id)),
  }
}

/**
 * Applies branch filters. Entries written as `/pattern/` are regular expressions.
 *
 * @param branches Branch filter.
 * @param branch Current branch.
 * @returns True when the pipeline runs on this branch.
 */
export const isBranchAllowed = (branches: BranchFilter | undefined, branch: string): boolean => {
  if (!branches) {
    return true
  }

  if (branches.except?.some((pattern) => branchMatches(pattern, branch))) {
    return false
  }

  if (branches.only && branches.only.length > 0) {
    return branches.only.some((pattern) => branchMatches(pattern, branch))
  }

  return true
}

const branchMatches = (pattern: string, branch: string): boolean => {
  if (pattern.length > 2 && pattern.startsWith('/') && pattern.endsWith('/')) {
    return new RegExp(pattern.slice(1, -1), 'u').test(branch)
  }

  return pattern === branch
}

const resolveDeployTrigger = (
  config: PipelineConfig,
  jobs: readonly JobSpec[]
): string | undefined => {
  const deploy = config.deploy
  if (!deploy) {
    return undefined
  }

  const matches = jobs.filter((job) => matchesJob(deploy.on.trigger, job))
  const [trigger] = matches
  if (!trigger) {
    throw new ConfigurationError('deploy.on.trigger does not match any job')
  }

  if (matches.length > 1) {
    const ids = matches.map((job) => job.id).join(', ')
    throw new ConfigurationError(`deploy.on.trigger must match exactly one job (matches: ${ids})`)
  }

  return trigger.id
}

const assertValidCache = (config: PipelineConfig): void => {
  if (!config.cache) {
    return
  }

  const seen = new Set<string>()
  for (const [index, directory] of config.cache.directories.entries()) {
    assertRelativePath(directory, `cache.directories[${index}]`)
    if (seen.has(directory)) {
      throw new ConfigurationError(`cache.directories must be unique (duplicate: ${directory})`)
    }
    seen.add(directory)
  }

  for (const [index, subpath] of (config.cache.prune ?? []).entries()) {
    assertRelativePath(subpath, `cache.prune[${index}]`)
  }
}

const assertRelativePath = (value: string, path: string): void => {
  const normalized = normalize(value)
  if (
    value.length === 0 ||
    isAbsolute(value) ||
    normalized === '.' ||
    normalized.split(/[\\/]/u).includes('..')
  ) {
    throw new ConfigurationError(`${path} must be a relative path inside the cache root`)
  }
}

const assertPositive = (value: number | undefined, path: string): void => {
  if (value !== undefined && !(value > 0)) {
    throw new ConfigurationError(`${path} must be greater than 0`)
  }
}

const assertPositiveInteger = (value: number | undefined, path: string): void => {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new ConfigurationError(`${path} must be a positive integer`)
  }
}

const isPipelineConfig = (value: PipelineConfigInput | PipelineConfig): value is PipelineConfig => {
  return value.env !== undefined && value.modeFlags !== undefined && value.setup !== undefined
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }

  return value
}
