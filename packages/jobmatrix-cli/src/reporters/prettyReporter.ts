import type {
  DeployReport,
  JobOutcome,
  JobPhase,
  JobSpec,
  JobWarning,
  PipelineOutcome,
  PipelineReporter,
  StepResult,
} from '@jobmatrix/core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Emits stdout/stderr also for successful steps. */
  readonly verbose: boolean
}

/**
 * Compact console reporter with failure-focused detail output.
 *
 * Lines of concurrent jobs interleave; every line carries its job id.
 */
export class PrettyReporter implements PipelineReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  /**
   * Handles pipeline start.
   *
   * @param jobs Scheduled jobs.
   */
  public onPipelineStart(jobs: readonly JobSpec[]): void {
    process.stdout.write(colorize(`jobmatrix: running ${jobs.length} jobs\n`, 'blue'))
  }

  /**
   * Announces a job once it starts preparing.
   *
   * @param job Job spec.
   * @param phase Entered state.
   */
  public onJobPhase(job: JobSpec, phase: JobPhase): void {
    if (phase === 'preparing') {
      process.stdout.write(colorize(`-> [${job.id}] ${job.name}\n`, 'blue'))
    }
  }

  /**
   * Handles step completion.
   *
   * @param job Job spec.
   * @param result Step result.
   */
  public onStepComplete(job: JobSpec, result: StepResult): void {
    const label = `[${job.id}] ${result.name}`
    if (result.status === 'passed') {
      process.stdout.write(colorize(`  ✓ ${label} ${result.durationMs}ms\n`, 'green'))
      if (this.options.verbose) {
        this.printOutput(result)
      }
      return
    }

    if (result.status === 'skipped') {
      process.stdout.write(
        colorize(`  ℹ ${label} skipped (${result.reason ?? 'no reason'})\n`, 'yellow')
      )
      return
    }

    process.stdout.write(
      colorize(
        `  ✗ ${label} ${result.status} (${result.reason ?? 'no reason'}, ${result.durationMs}ms)\n`,
        'red'
      )
    )
    this.printOutput(result)
  }

  /**
   * Handles non-fatal job problems.
   *
   * @param job Job spec.
   * @param warning Warning details.
   */
  public onJobWarning(job: JobSpec, warning: JobWarning): void {
    process.stdout.write(colorize(`  ⚠ [${job.id}] ${warning.message}\n`, 'yellow'))
  }

  /**
   * Handles job completion.
   *
   * @param outcome Job outcome.
   */
  public onJobComplete(outcome: JobOutcome): void {
    const label = `[${outcome.id}] ${outcome.name}`
    if (outcome.status === 'success') {
      process.stdout.write(colorize(`✓ ${label} passed (${outcome.durationMs}ms)\n`, 'green'))
      return
    }

    const reason = outcome.reason ?? 'no reason'
    if (outcome.suppressed) {
      process.stdout.write(
        colorize(`ℹ ${label} ${outcome.status} (${reason}, allowed to fail)\n`, 'yellow')
      )
      return
    }

    process.stdout.write(
      colorize(`✗ ${label} ${outcome.status} (${reason}, ${outcome.durationMs}ms)\n`, 'red')
    )
  }

  /**
   * Handles pipeline completion.
   *
   * @param outcome Pipeline outcome.
   */
  public onPipelineComplete(outcome: PipelineOutcome): void {
    const summary = outcome.summary
    process.stdout.write('\n')
    process.stdout.write(
      `Summary: total=${summary.total} succeeded=${summary.succeeded} failed=${summary.failed} errored=${summary.errored} allowedFailures=${summary.allowedFailures} warnings=${summary.warnings} duration=${summary.durationMs}ms\n`
    )
    if (outcome.cancelled) {
      process.stdout.write(colorize('Pipeline cancelled\n', 'yellow'))
    }

    if (outcome.status === 'success') {
      process.stdout.write(colorize('Result: ✅ PASS\n', 'green'))
      return
    }

    process.stdout.write(colorize('Result: FAIL\n', 'red'))
  }

  /**
   * Handles the deploy gate result.
   *
   * @param report Gate report.
   */
  public onDeploy(report: DeployReport): void {
    if (report.error) {
      process.stdout.write(colorize(`Deploy: failed (${report.error.message})\n`, 'red'))
      return
    }

    if (report.fired) {
      process.stdout.write(
        colorize(`Deploy: done (trigger ${report.decision.triggerJobId ?? 'unknown'})\n`, 'green')
      )
      return
    }

    if (report.decision.reason !== 'not_configured') {
      process.stdout.write(`Deploy: skipped (${report.decision.reason})\n`)
    }
  }

  private printOutput(result: StepResult): void {
    const stdout = result.output.stdout.trim()
    const stderr = result.output.stderr.trim()

    if (stdout) {
      process.stdout.write(colorize('    stdout:\n', 'yellow'))
      process.stdout.write(indent(stdout))
      process.stdout.write('\n')
    }

    if (stderr) {
      process.stdout.write(colorize('    stderr:\n', 'yellow'))
      process.stdout.write(indent(stderr))
      process.stdout.write('\n')
    }
  }
}

const indent = (text: string): string => {
  return text
    .split('\n')
    .map((line) => `      ${line}`)
    .join('\n')
}

const colorize = (text: string, color: 'red' | 'green' | 'yellow' | 'blue'): string => {
  const colors: Record<'red' | 'green' | 'yellow' | 'blue', string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
