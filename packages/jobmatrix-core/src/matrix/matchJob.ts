import type { MatrixMatcher } from '../contracts/matrix.js'

/**
 * Axis values and environment a matcher is checked against.
 */
export interface MatchTarget {
  readonly values: Readonly<Record<string, string>>
  readonly env: Readonly<Record<string, string>>
}

/**
 * Checks whether every key the matcher specifies has the same value on the target.
 *
 * Keys the matcher leaves out match anything, so an empty matcher matches every job.
 *
 * @param matcher Partial assignment.
 * @param target Job values and environment.
 * @returns True on a match.
 */
export const matchesJob = (matcher: MatrixMatcher, target: MatchTarget): boolean => {
  return (
    recordMatches(matcher.values, target.values) && recordMatches(matcher.env, target.env)
  )
}

const recordMatches = (
  expected: Readonly<Record<string, string>> | undefined,
  actual: Readonly<Record<string, string>>
): boolean => {
  if (!expected) {
    return true
  }

  return Object.entries(expected).every(([key, value]) => actual[key] === value)
}
