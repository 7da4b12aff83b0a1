import { describe, expect, it } from 'vitest'

import type {
  DeployRequest,
  DeploySettings,
  JobOutcome,
  JobStatus,
  PipelineOutcome,
  PipelinePlan,
  RepositoryContext,
} from '../src/index.js'
import {
  aggregateStatus,
  createCancelledOutcome,
  DeployError,
  DeployGate,
  planPipeline,
} from '../src/index.js'

const deploySettings: DeploySettings = {
  provider: 'pages',
  localDir: 'target/doc',
  tokenEnv: 'DEPLOY_TOKEN',
  on: { branch: 'main', trigger: { env: { BUILD_DOC: 'true' } } },
}

const createPlan = (
  deploy: DeploySettings | null = deploySettings,
  docsAllowedToFail = false
): PipelinePlan => {
  return planPipeline({
    matrix: {
      axes: [{ name: 'toolchain', values: ['stable', 'beta'] }],
      include: [
        {
          values: { toolchain: 'stable' },
          env: { BUILD_DOC: 'true' },
          allowFailure: docsAllowedToFail,
        },
      ],
    },
    scripts: {
      default: { script: [{ id: 'test', name: 'Test', command: 'npm test' }] },
      'doc-build': { script: [{ id: 'docs', name: 'Docs', command: 'npm run docs' }] },
    },
    deploy: deploy ?? undefined,
    cwd: '/repo',
  })
}

const createOutcome = (
  plan: PipelinePlan,
  statuses: Readonly<Record<string, JobStatus>> = {}
): PipelineOutcome => {
  const jobs: JobOutcome[] = plan.jobs.map((job) => {
    const status = statuses[job.id] ?? 'success'
    return {
      ...createCancelledOutcome(job, 0),
      status,
      reason: status === 'success' ? undefined : 'step_failed',
      suppressed: job.allowFailure && status !== 'success',
    }
  })

  return {
    status: aggregateStatus(jobs),
    jobs,
    summary: {
      total: jobs.length,
      succeeded: jobs.filter((job) => job.status === 'success').length,
      failed: jobs.filter((job) => job.status === 'failed').length,
      errored: jobs.filter((job) => job.status === 'errored').length,
      allowedFailures: jobs.filter((job) => job.suppressed).length,
      warnings: 0,
      durationMs: 0,
    },
    cancelled: false,
    startedAt: 0,
    finishedAt: 0,
  }
}

const mainContext: RepositoryContext = {
  branch: 'main',
  env: { DEPLOY_TOKEN: 'test-secret' },
}

describe('DeployGate', () => {
  it('stays closed on a feature branch even when every job passed', async () => {
    const plan = createPlan()
    const requests: DeployRequest[] = []
    const gate = new DeployGate({
      config: plan.config,
      action: async (request): Promise<void> => {
        requests.push(request)
      },
    })

    const report = await gate.maybeDeploy(createOutcome(plan), { ...mainContext, branch: 'feature' })

    expect(report).toEqual({
      decision: { shouldDeploy: false, reason: 'branch_mismatch' },
      fired: false,
    })
    expect(requests).toEqual([])
  })

  it('fires once with the trigger job flags and the token', async () => {
    const plan = createPlan()
    const requests: DeployRequest[] = []
    const gate = new DeployGate({
      config: plan.config,
      action: async (request): Promise<void> => {
        requests.push(request)
      },
    })
    const outcome = createOutcome(plan)

    const first = await gate.maybeDeploy(outcome, mainContext)
    const second = await gate.maybeDeploy(outcome, mainContext)

    expect(plan.deployTriggerId).toBe('job-3')
    expect(first).toEqual({
      decision: { shouldDeploy: true, reason: 'ready', triggerJobId: 'job-3' },
      fired: true,
    })
    expect(second).toEqual({
      decision: { shouldDeploy: false, reason: 'already_deployed' },
      fired: false,
    })
    expect(requests).toHaveLength(1)
    expect(requests[0]).toMatchObject({
      provider: 'pages',
      localDir: 'target/doc',
      branch: 'main',
      token: 'test-secret',
      flags: { BUILD_DOC: 'true' },
    })
    expect(requests[0]?.triggerJob.id).toBe('job-3')
  })

  it('reports an open gate without firing when it has no action', async () => {
    const plan = createPlan()
    const gate = new DeployGate({ config: plan.config })
    const outcome = createOutcome(plan)

    const first = await gate.maybeDeploy(outcome, mainContext)
    const second = await gate.maybeDeploy(outcome, mainContext)

    const ready = {
      decision: { shouldDeploy: true, reason: 'ready', triggerJobId: 'job-3' },
      fired: false,
    }
    expect(first).toEqual(ready)
    expect(second).toEqual(ready)
  })

  it('stays closed when the pipeline failed', () => {
    const plan = createPlan()
    const gate = new DeployGate({ config: plan.config })

    expect(gate.evaluate(createOutcome(plan, { 'job-2': 'failed' }), mainContext)).toEqual({
      shouldDeploy: false,
      reason: 'pipeline_failed',
    })
  })

  it('requires the trigger job itself to succeed', () => {
    const plan = createPlan(deploySettings, true)
    const gate = new DeployGate({ config: plan.config })
    const outcome = createOutcome(plan, { 'job-3': 'errored' })

    expect(outcome.status).toBe('success')
    expect(gate.evaluate(outcome, mainContext)).toEqual({
      shouldDeploy: false,
      reason: 'trigger_job_failed',
      triggerJobId: 'job-3',
    })
  })

  it('reports a missing trigger job when the run was narrowed', () => {
    const plan = createPlan()
    const gate = new DeployGate({ config: plan.config })
    const outcome = createOutcome({ ...plan, jobs: plan.jobs.slice(0, 2) })

    expect(gate.evaluate(outcome, mainContext).reason).toBe('trigger_job_missing')
  })

  it('checks tag and environment requirements', () => {
    const tagged = createPlan({ ...deploySettings, on: { ...deploySettings.on, tags: true } })
    const tagGate = new DeployGate({ config: tagged.config })

    expect(tagGate.evaluate(createOutcome(tagged), mainContext).reason).toBe('tag_required')
    expect(tagGate.evaluate(createOutcome(tagged), { ...mainContext, tag: 'v1.2.0' }).reason).toBe(
      'ready'
    )

    const gated = createPlan({
      ...deploySettings,
      on: { ...deploySettings.on, requiredEnv: { RELEASE_CHANNEL: 'stable' } },
    })
    const envGate = new DeployGate({ config: gated.config })

    expect(envGate.evaluate(createOutcome(gated), mainContext).reason).toBe('missing_env')
  })

  it('stays closed without deploy settings', () => {
    const plan = createPlan(null)
    const gate = new DeployGate({ config: plan.config })

    expect(gate.evaluate(createOutcome(plan), mainContext)).toEqual({
      shouldDeploy: false,
      reason: 'not_configured',
    })
  })

  it('reports action failures as a DeployError', async () => {
    const plan = createPlan()
    const gate = new DeployGate({
      config: plan.config,
      action: async (): Promise<void> => {
        throw new Error('upload rejected')
      },
    })

    const report = await gate.maybeDeploy(createOutcome(plan), mainContext)

    expect(report.fired).toBe(true)
    expect(report.error).toBeInstanceOf(DeployError)
    expect(report.error?.message).toBe('Deployment via pages failed: upload rejected')
    expect(report.error?.code).toBe('DEPLOY_ERROR')
  })
})
