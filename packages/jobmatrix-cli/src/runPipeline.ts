import {
  CacheManager,
  createNodeCommandExecutor,
  FileSystemCacheStore,
  formatRunResultAsJson,
  isBranchAllowed,
  planPipeline,
  runPlan,
  selectJobs,
  type CommandExecutor,
  type JobSpec,
  type PipelineReporter,
  type RepositoryContext,
} from '@jobmatrix/core'

import type { CliOptions } from './cliOptions.js'
import { loadJobMatrixConfig } from './config/loadConfig.js'
import { mapConfigToPipeline, type MappedPipeline } from './config/mapConfigToPipeline.js'
import type { CliOutputFormat } from './config/types.js'
import { createCommandDeployAction } from './deploy/commandDeployAction.js'
import { PrettyReporter } from './reporters/prettyReporter.js'

/**
 * Environment variables read by the CLI.
 */
export const CLI_ENV = {
  branch: 'JOBMATRIX_BRANCH',
  tag: 'JOBMATRIX_TAG',
} as const

/**
 * Runtime options for a CLI execution.
 */
export interface RunCliPipelineOptions extends Omit<CliOptions, 'help'> {
  /** Repository environment; defaults to `process.env`. */
  readonly env?: NodeJS.ProcessEnv
  /** Command executor; defaults to the Node.js shell executor. */
  readonly executor?: CommandExecutor
}

/**
 * Executes the pipeline according to CLI options.
 *
 * @param options CLI runtime options.
 * @returns Final exit code.
 * @throws ConfigurationError when the config cannot be loaded or planned.
 */
export const runCliPipeline = async (options: RunCliPipelineOptions): Promise<number> => {
  const env = options.env ?? process.env
  const loadedConfig = await loadJobMatrixConfig(options.cwd, options.configPath)
  const outputConfig = loadedConfig.config.output
  const format = options.formatProvided ? options.format : outputConfig?.format ?? options.format
  const verbose = options.verbose || outputConfig?.verbose === true

  const mapped = mapConfigToPipeline(loadedConfig.config, options.cwd)
  const plan = planPipeline(mapped.input)

  if (options.listJobs) {
    printJobs(plan.jobs, format)
    return 0
  }

  const branch = options.branch ?? env[CLI_ENV.branch]
  const tag = options.tag ?? env[CLI_ENV.tag]
  if (branch && !isBranchAllowed(plan.config.branches, branch)) {
    printBranchSkip(branch, format)
    return 0
  }

  const selectedPlan = selectJobs(plan, options.jobs)
  const executor = options.executor ?? createNodeCommandExecutor()
  const context: RepositoryContext = {
    branch: branch ?? '',
    ...(tag ? { tag } : {}),
    env,
  }
  const reporters: PipelineReporter[] = format === 'pretty' ? [new PrettyReporter({ verbose })] : []

  const controller = new AbortController()
  const abort = (): void => {
    controller.abort()
  }
  process.on('SIGINT', abort)
  process.on('SIGTERM', abort)

  try {
    const result = await runPlan({
      plan: selectedPlan,
      executor,
      context,
      cacheManager: createCacheManager(mapped),
      deployAction:
        options.deploy && mapped.deployCommand
          ? createCommandDeployAction({ ...mapped.deployCommand, executor })
          : undefined,
      reporters,
      maxParallel: options.maxParallel,
      signal: controller.signal,
    })

    if (format === 'json') {
      process.stdout.write(`${formatRunResultAsJson(result)}\n`)
    }

    return result.exitCode
  } finally {
    process.off('SIGINT', abort)
    process.off('SIGTERM', abort)
  }
}

const createCacheManager = (mapped: MappedPipeline): CacheManager | undefined => {
  if (!mapped.cache) {
    return undefined
  }

  return new CacheManager({
    settings: mapped.cache.settings,
    store: new FileSystemCacheStore(mapped.cache.storeDir),
    workRoot: mapped.cache.workRoot,
  })
}

const printJobs = (jobs: readonly JobSpec[], format: CliOutputFormat): void => {
  if (format === 'json') {
    const payload = {
      jobs: jobs.map((job) => ({
        id: job.id,
        name: job.name,
        key: job.key,
        mode: job.mode,
        allowFailure: job.allowFailure,
      })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  process.stdout.write(`Jobs (${jobs.length}):\n`)
  for (const job of jobs) {
    const suffix = job.allowFailure ? ' (allowed to fail)' : ''
    process.stdout.write(`- ${job.id}: ${job.name} [${job.mode}]${suffix}\n`)
  }
}

const printBranchSkip = (branch: string, format: CliOutputFormat): void => {
  if (format === 'json') {
    process.stdout.write(`${JSON.stringify({ exitCode: 0, skipped: 'branch_filtered', branch })}\n`)
    return
  }

  process.stdout.write(`ℹ️  Skipping pipeline: branch "${branch}" is filtered out\n`)
}
