import { resolve } from 'node:path'

import type { CliOutputFormat } from './config/types.js'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute working directory for config and execution. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Current branch; falls back to JOBMATRIX_BRANCH. */
  readonly branch?: string
  /** Current tag; falls back to JOBMATRIX_TAG. */
  readonly tag?: string
  /** Job ids to run; empty runs every job. */
  readonly jobs: readonly string[]
  /** Prints the expanded jobs and exits when true. */
  readonly listJobs: boolean
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Indicates whether output format was explicitly set via CLI flag. */
  readonly formatProvided?: true
  /** Emits full output for successful steps when true. */
  readonly verbose: boolean
  /** Worker limit overriding the config. */
  readonly maxParallel?: number
  /** Skips the deploy action when false; the gate is still evaluated. */
  readonly deploy: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Invalid command line arguments.
 */
export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

/**
 * Parses process arguments for the jobmatrix CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws CliUsageError when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let branch: string | undefined
  let tag: string | undefined
  const jobs: string[] = []
  let listJobs = false
  let format: CliOutputFormat = 'pretty'
  let formatProvided = false
  let verbose = false
  let maxParallel: number | undefined
  let deploy = true
  let help = false
  let cwd = baseCwd

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--verbose') {
      verbose = true
      continue
    }

    if (argument === '--list-jobs') {
      listJobs = true
      continue
    }

    if (argument === '--no-deploy') {
      deploy = false
      continue
    }

    const [name, inlineValue] = splitArgument(argument)
    if (!VALUE_FLAGS.has(name)) {
      throw new CliUsageError(`Unknown argument: ${argument}`)
    }

    let value = inlineValue
    if (value === undefined) {
      value = argv[index + 1]
      if (!value) {
        throw new CliUsageError(`${name} requires a value`)
      }
      index += 1
    }

    switch (name) {
      case '--config':
        configPath = value
        break
      case '--cwd':
        cwd = resolve(baseCwd, value)
        break
      case '--branch':
        branch = value
        break
      case '--tag':
        tag = value
        break
      case '--job':
        jobs.push(value)
        break
      case '--format':
        format = parseFormat(value)
        formatProvided = true
        break
      case '--max-parallel':
        maxParallel = parseMaxParallel(value)
        break
    }
  }

  return {
    cwd,
    configPath,
    branch,
    tag,
    jobs,
    listJobs,
    format,
    ...(formatProvided ? { formatProvided: true as const } : {}),
    verbose,
    maxParallel,
    deploy,
    help,
  }
}

/**
 * Returns help text for the jobmatrix CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: jobmatrix [options]',
    '',
    'Options:',
    '  --config <path>       Config file path (default: jobmatrix.config.ts or jobmatrix.config.json)',
    '  --cwd <path>          Base working directory',
    '  --branch <name>       Current branch (default: $JOBMATRIX_BRANCH)',
    '  --tag <name>          Current tag (default: $JOBMATRIX_TAG)',
    '  --job <id>            Run only this job; repeatable',
    '  --list-jobs           Print the expanded jobs and exit',
    '  --format <type>       Output format: pretty | json (default: pretty)',
    '  --verbose             Show stdout/stderr for successful steps',
    '  --max-parallel <n>    Maximum number of jobs running at once',
    '  --no-deploy           Evaluate the deploy gate without deploying',
    '  -h, --help            Show this help',
  ].join('\n')
}

const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--config',
  '--cwd',
  '--branch',
  '--tag',
  '--job',
  '--format',
  '--max-parallel',
])

const splitArgument = (argument: string): [string, string | undefined] => {
  const separatorIndex = argument.indexOf('=')
  if (!argument.startsWith('--') || separatorIndex < 0) {
    return [argument, undefined]
  }

  return [argument.slice(0, separatorIndex), argument.slice(separatorIndex + 1)]
}

const parseFormat = (value: string): CliOutputFormat => {
  if (value !== 'pretty' && value !== 'json') {
    throw new CliUsageError('--format must be "pretty" or "json"')
  }

  return value
}

const parseMaxParallel = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError('--max-parallel must be a positive integer')
  }

  return parsed
}
