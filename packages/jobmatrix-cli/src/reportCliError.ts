import { ConfigurationError, JobMatrixError } from '@jobmatrix/core'

import { CliUsageError } from './cliOptions.js'

/**
 * Formats an error that stopped the CLI before a run report was written.
 *
 * Usage and configuration errors are expected and get a plain message; anything
 * else is reported with its error class.
 *
 * @param error Thrown value.
 * @returns Message for stderr, without a trailing newline.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof CliUsageError) {
    return `${error.message}\nRun "jobmatrix --help" for usage.`
  }

  if (error instanceof ConfigurationError) {
    return `Invalid pipeline configuration: ${error.message}`
  }

  if (error instanceof JobMatrixError) {
    return `${error.code}: ${error.message}`
  }

  if (error instanceof Error) {
    return `Unexpected ${error.name}: ${error.message}`
  }

  return `Unexpected error: ${String(error)}`
}

/**
 * Writes a fatal error to stderr and marks the process as failed.
 *
 * @param error Thrown value.
 */
export const reportCliError = (error: unknown): void => {
  process.stderr.write(`${formatCliError(error)}\n`)
  process.exitCode = 1
}
