import type {
  ExclusiveJobMode,
  JobMode,
  ModeFlags,
  ModeScript,
  ModeScripts,
  ModeSelection,
} from '../contracts/mode.js'
import { ConfigurationError } from '../errors.js'

/**
 * Exclusive modes in evaluation order. `default` applies after all of them.
 */
export const MODE_PRIORITY: readonly ExclusiveJobMode[] = [
  'format-check',
  'coverage',
  'doc-build',
  'cross-target',
]

/**
 * Flag names used when a pipeline does not override them.
 */
export const DEFAULT_MODE_FLAGS: ModeFlags = {
  'format-check': 'BUILD_FMT',
  coverage: 'TARPAULIN',
  'doc-build': 'BUILD_DOC',
  'cross-target': 'TARGET',
}

/**
 * Maps job environments onto typed modes and their step sequences.
 */
export class ConditionEvaluator {
  private readonly flags: ModeFlags
  private readonly scripts: ModeScripts

  /**
   * Creates an evaluator.
   *
   * @param scripts Step sequences keyed by mode.
   * @param flags Flag names keyed by exclusive mode.
   * @throws ConfigurationError when two modes share a flag name.
   */
  public constructor(scripts: ModeScripts, flags: ModeFlags = DEFAULT_MODE_FLAGS) {
    assertDistinctFlags(flags)
    this.flags = flags
    this.scripts = scripts
  }

  /**
   * Selects the mode of a job environment.
   *
   * A flag counts as set when its value is a non-empty string. At most one may be set.
   *
   * @param env Job environment.
   * @returns Selected mode with the flag that selected it.
   * @throws ConfigurationError when mutually exclusive flags are set together.
   */
  public selectMode(env: Readonly<Record<string, string>>): ModeSelection {
    const matched = MODE_PRIORITY.filter((mode) => isFlagSet(env[this.flags[mode]]))

    if (matched.length > 1) {
      const names = matched.map((mode) => `${this.flags[mode]} (${mode})`).join(', ')
      throw new ConfigurationError(`Mutually exclusive mode flags are set together: ${names}`)
    }

    const [mode] = matched
    if (!mode) {
      return { mode: 'default' }
    }

    const flag = this.flags[mode]
    return {
      mode,
      flag,
      value: env[flag],
    }
  }

  /**
   * Returns the step sequences of a mode.
   *
   * @param mode Job mode.
   * @returns Mode script.
   * @throws ConfigurationError when the mode has no script.
   */
  public resolveScript(mode: JobMode): ModeScript {
    const script = mode === 'default' ? this.scripts.default : this.scripts[mode]
    if (!script) {
      throw new ConfigurationError(`No script configured for mode "${mode}"`)
    }

    return script
  }
}

const isFlagSet = (value: string | undefined): boolean => {
  return typeof value === 'string' && value.length > 0
}

const assertDistinctFlags = (flags: ModeFlags): void => {
  const seen = new Map<string, ExclusiveJobMode>()

  for (const mode of MODE_PRIORITY) {
    const flag = flags[mode]
    if (flag.length === 0) {
      throw new ConfigurationError(`Mode "${mode}" needs a non-empty flag name`)
    }

    const owner = seen.get(flag)
    if (owner) {
      throw new ConfigurationError(`Modes "${owner}" and "${mode}" share the flag ${flag}`)
    }
    seen.set(flag, mode)
  }
}
