import type { JobOutcome } from '../contracts/job.js'
import type { PlanRunResult } from '../runner/runPlan.js'

/**
 * Formats a run result as JSON output.
 *
 * Job specs are reduced to their identity, values and flags; the deploy error becomes
 * its code and message.
 *
 * @param result Run result.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatRunResultAsJson = (result: PlanRunResult, indentation = 2): string => {
  const { pipeline, deploy, exitCode } = result

  const payload = {
    exitCode,
    pipeline: {
      status: pipeline.status,
      cancelled: pipeline.cancelled,
      summary: pipeline.summary,
      startedAt: pipeline.startedAt,
      finishedAt: pipeline.finishedAt,
      jobs: pipeline.jobs.map(toJobReport),
    },
    deploy: {
      decision: deploy.decision,
      fired: deploy.fired,
      error: deploy.error ? { code: deploy.error.code, message: deploy.error.message } : null,
    },
  }

  return JSON.stringify(payload, null, indentation)
}

const toJobReport = (outcome: JobOutcome): Record<string, unknown> => {
  const { job, ...rest } = outcome

  return {
    ...rest,
    key: job.key,
    mode: job.mode,
    values: job.values,
    target: job.target,
    privileged: job.privileged,
    services: job.services,
  }
}
