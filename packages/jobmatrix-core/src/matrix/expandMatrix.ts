import { createHash } from 'node:crypto'

import type { ConditionEvaluator } from '../conditions/conditionEvaluator.js'
import type {
  JobOrigin,
  JobSpec,
  MatrixAxis,
  MatrixDefinition,
  MatrixInclude,
  MatrixMatcher,
} from '../contracts/matrix.js'
import type { ModeSelection } from '../contracts/mode.js'
import { ConfigurationError } from '../errors.js'
import { matchesJob } from './matchJob.js'

/**
 * Inputs besides the matrix itself.
 */
export interface ExpandMatrixOptions {
  /** Base environment of every job. */
  readonly env?: Readonly<Record<string, string>>
  /** Mode selection, run for every job so flag conflicts fail the expansion. */
  readonly evaluator: ConditionEvaluator
}

interface JobDraft {
  readonly origin: JobOrigin
  readonly values: Readonly<Record<string, string>>
  readonly overrides: Readonly<Record<string, string>>
  readonly env: Readonly<Record<string, string>>
  readonly entry?: MatrixInclude
}

/**
 * Expands a matrix into job specs.
 *
 * Order: the cross-product of all axes (first axis varies slowest) minus excluded
 * combinations, then every include entry once in declaration order. Without axes the
 * cross-product is a single empty combination, unless include entries exist, in which
 * case only the include entries are produced.
 *
 * @param definition Matrix definition.
 * @param options Base environment and mode evaluator.
 * @returns Frozen job specs.
 * @throws ConfigurationError for invalid axes, unknown axis references or conflicting mode flags.
 */
export const expandMatrix = (
  definition: MatrixDefinition,
  options: ExpandMatrixOptions
): readonly JobSpec[] => {
  const axes = definition.axes
  const includes = definition.include ?? []
  const excludes = definition.exclude ?? []
  const allowFailures = definition.allowFailures ?? []
  const baseEnv = options.env ?? {}

  assertValidAxes(axes)
  const axisNames = new Set(axes.map((axis) => axis.name))
  assertKnownAxes(axisNames, excludes, 'exclude')
  assertKnownAxes(axisNames, includes, 'include')
  assertKnownAxes(axisNames, allowFailures, 'allowFailures')

  const drafts: JobDraft[] = []

  const combinations = axes.length === 0 && includes.length > 0 ? [] : crossProduct(axes)
  for (const values of combinations) {
    const env = buildEnv(baseEnv, axes, values, {})
    if (excludes.some((matcher) => matchesJob(matcher, { values, env }))) {
      continue
    }

    drafts.push({ origin: 'matrix', values, overrides: {}, env })
  }

  for (const entry of includes) {
    const values = entry.values ?? {}
    const overrides = entry.env ?? {}
    drafts.push({
      origin: 'include',
      values,
      overrides,
      env: buildEnv(baseEnv, axes, values, overrides),
      entry,
    })
  }

  const keyCounts = new Map<string, number>()

  return drafts.map((draft, index) => {
    const identity = formatIdentity(axes, draft.values, draft.overrides)
    const occurrence = (keyCounts.get(identity) ?? 0) + 1
    keyCounts.set(identity, occurrence)
    const key = occurrence === 1 ? identity : `${identity} #${occurrence}`

    return createJobSpec(draft, index, key, allowFailures, options.evaluator)
  })
}

const createJobSpec = (
  draft: JobDraft,
  index: number,
  key: string,
  allowFailures: readonly MatrixMatcher[],
  evaluator: ConditionEvaluator
): JobSpec => {
  const id = `job-${index + 1}`
  let selection: ModeSelection
  try {
    selection = evaluator.selectMode(draft.env)
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${id} (${key}): ${error.message}`)
    }
    throw error
  }

  const entry = draft.entry
  const allowFailure =
    entry?.allowFailure ?? allowFailures.some((matcher) => matchesJob(matcher, draft))

  const job: JobSpec = {
    id,
    index,
    key,
    cacheKey: createCacheKey(key),
    name: entry?.name ?? key,
    origin: draft.origin,
    values: Object.freeze({ ...draft.values }),
    env: Object.freeze({ ...draft.env }),
    mode: selection.mode,
    ...(selection.mode === 'cross-target' ? { target: selection.value } : {}),
    allowFailure,
    privileged: entry?.privileged ?? false,
    services: Object.freeze([...(entry?.services ?? [])]),
    ...(entry?.timeoutMs !== undefined ? { timeoutMs: entry.timeoutMs } : {}),
  }

  return Object.freeze(job)
}

const crossProduct = (axes: readonly MatrixAxis[]): Readonly<Record<string, string>>[] => {
  let combinations: Record<string, string>[] = [{}]

  for (const axis of axes) {
    const next: Record<string, string>[] = []
    for (const combination of combinations) {
      for (const value of axis.values) {
        next.push({ ...combination, [axis.name]: value })
      }
    }
    combinations = next
  }

  return combinations
}

const buildEnv = (
  baseEnv: Readonly<Record<string, string>>,
  axes: readonly MatrixAxis[],
  values: Readonly<Record<string, string>>,
  overrides: Readonly<Record<string, string>>
): Readonly<Record<string, string>> => {
  const env: Record<string, string> = { ...baseEnv }

  for (const axis of axes) {
    const value = values[axis.name]
    if (axis.envVar && value !== undefined) {
      env[axis.envVar] = value
    }
  }

  return { ...env, ...overrides }
}

const formatIdentity = (
  axes: readonly MatrixAxis[],
  values: Readonly<Record<string, string>>,
  overrides: Readonly<Record<string, string>>
): string => {
  const parts: string[] = []

  for (const axis of axes) {
    const value = values[axis.name]
    if (value !== undefined) {
      parts.push(`${axis.name}=${value}`)
    }
  }

  const overrideParts = Object.entries(overrides)
    .sort(([leftKey], [rightKey]) => leftKey.localeCompare(rightKey))
    .map(([key, value]) => `${key}=${value}`)

  const identity = [...parts, ...overrideParts].join(' ')
  return identity.length > 0 ? identity : 'base'
}

/**
 * Derives a file system safe cache key from a job identity.
 *
 * @param key Job identity.
 * @returns Slug followed by a 12 character sha256 prefix.
 */
export const createCacheKey = (key: string): string => {
  const slug =
    key
      .replace(/[^A-Za-z0-9._-]+/gu, '-')
      .replace(/^-+|-+$/gu, '')
      .slice(0, 48) || 'job'
  const hash = createHash('sha256').update(key).digest('hex').slice(0, 12)

  return `${slug}-${hash}`
}

const assertValidAxes = (axes: readonly MatrixAxis[]): void => {
  const seenNames = new Set<string>()

  for (const [index, axis] of axes.entries()) {
    if (axis.name.length === 0) {
      throw new ConfigurationError(`axes[${index}] needs a non-empty name`)
    }

    if (seenNames.has(axis.name)) {
      throw new ConfigurationError(`Axis names must be unique (duplicate: ${axis.name})`)
    }
    seenNames.add(axis.name)

    if (axis.values.length === 0) {
      throw new ConfigurationError(`Axis "${axis.name}" must have at least one value`)
    }

    const seenValues = new Set<string>()
    for (const value of axis.values) {
      if (seenValues.has(value)) {
        throw new ConfigurationError(`Axis "${axis.name}" lists value "${value}" twice`)
      }
      seenValues.add(value)
    }
  }
}

const assertKnownAxes = (
  axisNames: ReadonlySet<string>,
  entries: readonly { readonly values?: Readonly<Record<string, string>> }[],
  path: string
): void => {
  for (const [index, entry] of entries.entries()) {
    for (const name of Object.keys(entry.values ?? {})) {
      if (!axisNames.has(name)) {
        throw new ConfigurationError(`${path}[${index}] references unknown axis: ${name}`)
      }
    }
  }
}
