import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import {
  ConfigurationError,
  MODE_PRIORITY,
  type ExclusiveJobMode,
  type MatrixAxis,
  type MatrixDefinition,
  type MatrixInclude,
  type MatrixMatcher,
  type ModeFlags,
} from '@jobmatrix/core'
import ts from 'typescript'

import type {
  CliConfigStep,
  CliModeScript,
  CliModeScripts,
  JobMatrixCacheConfig,
  JobMatrixConfig,
  JobMatrixDeployConfig,
} from './types.js'

/**
 * Default config file names, in lookup order.
 */
export const CONFIG_FILE_NAMES = ['jobmatrix.config.ts', 'jobmatrix.config.json'] as const

/**
 * Validated config plus the file it came from.
 */
export interface LoadedJobMatrixConfig {
  /** Parsed config. */
  readonly config: JobMatrixConfig
  /** Absolute config file path. */
  readonly configFilePath: string
}

/**
 * Loads and validates a jobmatrix config file.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws ConfigurationError when the config is missing or invalid.
 */
export const loadJobMatrixConfig = async (
  cwd: string,
  configPath?: string
): Promise<LoadedJobMatrixConfig> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    throw new ConfigurationError(
      `No config file found. Expected ${CONFIG_FILE_NAMES.join(' or ')}`
    )
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseJobMatrixConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    return resolve(cwd, configPath)
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = resolve(cwd, fileName)
    try {
      await readFile(candidate, 'utf8')
      return candidate
    } catch {
      continue
    }
  }

  return null
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    try {
      const parsed: unknown = JSON.parse(content)
      return parsed
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ConfigurationError(`Invalid JSON in ${configFilePath}: ${reason}`)
    }
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new ConfigurationError(`Unsupported config extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new ConfigurationError(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'jobmatrix-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule: unknown = await import(moduleUrl)

    if (isRecord(loadedModule) && loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (isRecord(loadedModule) && loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new ConfigurationError(
      `Config module ${configFilePath} must export default or named "config"`
    )
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }

  if ('default' in value) {
    return value.default
  }

  return value
}

/**
 * Validates an untyped config value.
 *
 * @param value Loaded config module value or parsed JSON.
 * @returns Typed config.
 * @throws ConfigurationError with a path-qualified message.
 */
export const parseJobMatrixConfig = (value: unknown): JobMatrixConfig => {
  if (!isRecord(value)) {
    throw new ConfigurationError('Config must be an object')
  }

  return {
    matrix: parseMatrix(value.matrix),
    env: parseOptionalStringRecord(value.env, 'env'),
    modeFlags: parseModeFlags(value.modeFlags),
    setup: parseOptionalSteps(value.setup, 'setup'),
    scripts: parseScripts(value.scripts),
    cache: parseCacheConfig(value.cache),
    deploy: parseDeployConfig(value.deploy),
    branches: parseBranches(value.branches),
    jobTimeoutMs: parseOptionalNumber(value.jobTimeoutMs, 'jobTimeoutMs'),
    maxParallel: parseOptionalNumber(value.maxParallel, 'maxParallel'),
    cwd: parseOptionalString(value.cwd, 'cwd'),
    output: parseOutputConfig(value.output),
  }
}

const parseMatrix = (value: unknown): MatrixDefinition => {
  if (!isRecord(value)) {
    throw new ConfigurationError('matrix must be an object')
  }

  if (!Array.isArray(value.axes)) {
    throw new ConfigurationError('matrix.axes must be an array')
  }

  return {
    axes: value.axes.map((axis, index) => parseAxis(axis, `matrix.axes[${index}]`)),
    include: parseOptionalArray(value.include, 'matrix.include', parseInclude),
    exclude: parseOptionalArray(value.exclude, 'matrix.exclude', parseMatcher),
    allowFailures: parseOptionalArray(value.allowFailures, 'matrix.allowFailures', parseMatcher),
  }
}

const parseAxis = (value: unknown, path: string): MatrixAxis => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const values = parseOptionalStringArray(value.values, `${path}.values`)
  if (!values) {
    throw new ConfigurationError(`${path}.values must be an array`)
  }

  return {
    name: parseRequiredString(value.name, `${path}.name`),
    values,
    envVar: parseOptionalString(value.envVar, `${path}.envVar`),
  }
}

const parseMatcher = (value: unknown, path: string): MatrixMatcher => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  return {
    values: parseOptionalStringRecord(value.values, `${path}.values`),
    env: parseOptionalStringRecord(value.env, `${path}.env`),
  }
}

const parseInclude = (value: unknown, path: string): MatrixInclude => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  return {
    ...parseMatcher(value, path),
    name: parseOptionalString(value.name, `${path}.name`),
    allowFailure: parseOptionalBoolean(value.allowFailure, `${path}.allowFailure`),
    privileged: parseOptionalBoolean(value.privileged, `${path}.privileged`),
    services: parseOptionalStringArray(value.services, `${path}.services`),
    timeoutMs: parseOptionalNumber(value.timeoutMs, `${path}.timeoutMs`),
  }
}

const parseModeFlags = (value: unknown): Partial<ModeFlags> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('modeFlags must be an object')
  }

  const flags: Partial<Record<ExclusiveJobMode, string>> = {}
  for (const key of Object.keys(value)) {
    const mode = toExclusiveMode(key)
    if (!mode) {
      throw new ConfigurationError(`modeFlags.${key} is not a known mode`)
    }
    flags[mode] = parseRequiredString(value[key], `modeFlags.${key}`)
  }

  return flags
}

const parseScripts = (value: unknown): CliModeScripts => {
  if (!isRecord(value)) {
    throw new ConfigurationError('scripts must be an object')
  }

  const scripts: Partial<Record<ExclusiveJobMode, CliModeScript>> = {}
  for (const key of Object.keys(value)) {
    if (key === 'default') {
      continue
    }

    const mode = toExclusiveMode(key)
    if (!mode) {
      throw new ConfigurationError(`scripts.${key} is not a known mode`)
    }
    scripts[mode] = parseModeScript(value[key], `scripts.${key}`)
  }

  if (value.default === undefined) {
    throw new ConfigurationError('scripts.default is required')
  }

  return {
    ...scripts,
    default: parseModeScript(value.default, 'scripts.default'),
  }
}

const parseModeScript = (value: unknown, path: string): CliModeScript => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const script = parseOptionalSteps(value.script, `${path}.script`)
  if (!script) {
    throw new ConfigurationError(`${path}.script must be an array`)
  }

  return {
    prepare: parseOptionalSteps(value.prepare, `${path}.prepare`),
    script,
    afterSuccess: parseOptionalSteps(value.afterSuccess, `${path}.afterSuccess`),
  }
}

const parseOptionalSteps = (value: unknown, path: string): readonly CliConfigStep[] | undefined => {
  const steps = parseOptionalArray(value, path, parseConfigStep)
  if (steps) {
    assertUniqueStepIds(steps, path)
  }

  return steps
}

const parseConfigStep = (value: unknown, path: string): CliConfigStep => {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  return {
    id: parseRequiredString(value.id, `${path}.id`),
    name: parseRequiredString(value.name, `${path}.name`),
    command: parseRequiredString(value.command, `${path}.command`),
    cwd: parseOptionalString(value.cwd, `${path}.cwd`),
    env: parseOptionalStringRecord(value.env, `${path}.env`),
    timeoutMs: parseOptionalNumber(value.timeoutMs, `${path}.timeoutMs`),
  }
}

const assertUniqueStepIds = (steps: readonly CliConfigStep[], path: string): void => {
  const seenById = new Set<string>()

  for (const step of steps) {
    if (seenById.has(step.id)) {
      throw new ConfigurationError(`${path} must use unique ids (duplicate: ${step.id})`)
    }

    seenById.add(step.id)
  }
}

const parseCacheConfig = (value: unknown): JobMatrixCacheConfig | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('cache must be an object')
  }

  const directories = parseOptionalStringArray(value.directories, 'cache.directories')
  if (!directories) {
    throw new ConfigurationError('cache.directories must be an array')
  }

  return {
    directories,
    prune: parseOptionalStringArray(value.prune, 'cache.prune'),
    storeDir: parseOptionalString(value.storeDir, 'cache.storeDir'),
    workDir: parseOptionalString(value.workDir, 'cache.workDir'),
  }
}

const parseDeployConfig = (value: unknown): JobMatrixDeployConfig | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('deploy must be an object')
  }

  const on = value.on
  if (!isRecord(on)) {
    throw new ConfigurationError('deploy.on must be an object')
  }

  return {
    provider: parseRequiredString(value.provider, 'deploy.provider'),
    command: parseRequiredString(value.command, 'deploy.command'),
    localDir: parseRequiredString(value.localDir, 'deploy.localDir'),
    tokenEnv: parseOptionalString(value.tokenEnv, 'deploy.tokenEnv'),
    timeoutMs: parseOptionalNumber(value.timeoutMs, 'deploy.timeoutMs'),
    on: {
      branch: parseRequiredString(on.branch, 'deploy.on.branch'),
      trigger: parseMatcher(on.trigger, 'deploy.on.trigger'),
      tags: parseOptionalBoolean(on.tags, 'deploy.on.tags'),
      requiredEnv: parseOptionalStringRecord(on.requiredEnv, 'deploy.on.requiredEnv'),
    },
  }
}

const parseBranches = (value: unknown): JobMatrixConfig['branches'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('branches must be an object')
  }

  return {
    only: parseOptionalStringArray(value.only, 'branches.only'),
    except: parseOptionalStringArray(value.except, 'branches.except'),
  }
}

const parseOutputConfig = (value: unknown): JobMatrixConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError('output must be an object')
  }

  const format = value.format
  if (format !== undefined && format !== 'pretty' && format !== 'json') {
    throw new ConfigurationError('output.format must be "pretty" or "json"')
  }

  const verbose = parseOptionalBoolean(value.verbose, 'output.verbose')

  return {
    format,
    verbose,
  }
}

const toExclusiveMode = (key: string): ExclusiveJobMode | undefined => {
  return MODE_PRIORITY.find((mode) => mode === key)
}

const parseOptionalArray = <T>(
  value: unknown,
  path: string,
  parseItem: (item: unknown, itemPath: string) => T
): readonly T[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path} must be an array`)
  }

  return value.map((item, index) => parseItem(item, `${path}[${index}]`))
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigurationError(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new ConfigurationError(`${path} must be a string`)
  }

  return value
}

const parseOptionalNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`${path} must be a valid number`)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${path} must be a boolean`)
  }

  return value
}

const parseOptionalStringArray = (value: unknown, path: string): readonly string[] | undefined => {
  return parseOptionalArray(value, path, (entry, entryPath) => {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new ConfigurationError(`${entryPath} must be a non-empty string`)
    }
    return entry
  })
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new ConfigurationError(`${path} must be an object`)
  }

  const parsed: Record<string, string> = {}

  for (const [key, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw new ConfigurationError(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
