import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk from 'chalk'
import type {JobFinishedEvent, Reporter, RunEvent, StepFailedEvent} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

type JobDisplayStatus = 'pending' | 'running' | 'success' | 'failure' | 'cancelled' | 'skipped'

type JobDisplayState = {
  displayName: string;
  label?: string;
  status: JobDisplayStatus;
  detail?: string;
  failure?: string;
}

const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

/**
 * Reporter with an interactive terminal UI: one live line per job instance,
 * the stderr tail of failed jobs once the run has finished.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly logUpdate = createLogUpdate(process.stderr)
  private readonly jobs = new Map<string, JobDisplayState>()
  private readonly stderrBuffers = new Map<string, string[]>()
  private frame = 0
  private timer: ReturnType<typeof setInterval> | undefined

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        const trigger = event.trigger.kind === 'push'
          ? `push to ${event.trigger.branch}`
          : `pull request ${event.trigger.number === undefined ? '' : `#${event.trigger.number}`}`.trimEnd()
        console.error(chalk.bold(`\n▶ ${chalk.cyan(event.workflowName)} ${chalk.gray(`(${trigger}, run ${event.runId})`)}\n`))
        for (const job of event.jobs) {
          this.jobs.set(job.id, {displayName: job.displayName, label: job.environment.label, status: 'pending'})
        }

        this.startRendering()
        break
      }

      case 'RUN_SKIPPED': {
        console.error(chalk.yellow(`\nNo run launched: ${event.reason}\n`))
        break
      }

      case 'JOB_SKIPPED': {
        this.jobs.set(event.jobId, {displayName: event.displayName, status: 'skipped', detail: 'condition'})
        break
      }

      case 'JOB_STARTING': {
        const job = this.jobs.get(event.job.id)
        if (job) {
          job.status = 'running'
        }

        break
      }

      case 'STEP_STARTING': {
        const job = this.jobs.get(event.job.id)
        if (job) {
          job.detail = event.step.displayName
        }

        break
      }

      case 'STEP_LOG': {
        if (this.verbose) {
          this.logUpdate.clear()
          console.error(`${chalk.gray(`  [${event.job.id}]`)} ${event.line}`)
          this.render()
        }

        if (event.stream === 'stderr') {
          this.bufferStderr(event.job.id, event.line)
        }

        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'JOB_FINISHED': {
        this.handleJobFinished(event)
        break
      }

      case 'RUN_FINISHED': {
        this.stopRendering()
        this.printFailedStderr()
        const counts = `${event.counts.success} succeeded, ${event.counts.failure} failed, ${event.counts.cancelled} cancelled`
        const summary = `${counts} in ${formatDuration(event.durationMs)}`
        switch (event.status) {
          case 'success': {
            console.error(chalk.bold.green(`\n✓ Run succeeded (${summary})\n`))
            break
          }

          case 'failure': {
            console.error(chalk.bold.red(`\n✗ Run failed (${summary})\n`))
            break
          }

          case 'cancelled': {
            console.error(chalk.bold.yellow(`\n⊘ Run cancelled (${summary})\n`))
            break
          }
        }

        break
      }

      case 'STEP_FINISHED':
      case 'STEP_SKIPPED': {
        break
      }
    }
  }

  private bufferStderr(jobId: string, line: string): void {
    let buffer = this.stderrBuffers.get(jobId)
    if (!buffer) {
      buffer = []
      this.stderrBuffers.set(jobId, buffer)
    }

    buffer.push(line)
    if (buffer.length > InteractiveReporter.maxStderrLines) {
      buffer.shift()
    }
  }

  private render(): void {
    const lines: string[] = []
    for (const job of this.jobs.values()) {
      lines.push(`  ${this.symbolFor(job)} ${this.textFor(job)}`)
    }

    this.logUpdate(lines.join('\n'))
    this.frame++
  }

  private symbolFor(job: JobDisplayState): string {
    switch (job.status) {
      case 'pending': {
        return chalk.gray('○')
      }

      case 'running': {
        return chalk.cyan(spinnerFrames[this.frame % spinnerFrames.length])
      }

      case 'success': {
        return chalk.green('✓')
      }

      case 'failure': {
        return chalk.red('✗')
      }

      case 'cancelled': {
        return chalk.yellow('⊘')
      }

      case 'skipped': {
        return chalk.gray('⊙')
      }
    }
  }

  private textFor(job: JobDisplayState): string {
    const label = job.label ? chalk.gray(` [${job.label}]`) : ''
    const suffix = job.detail ? ` (${job.detail})` : ''
    switch (job.status) {
      case 'pending': {
        return chalk.gray(job.displayName) + label
      }

      case 'running': {
        return `${job.displayName}${label}${chalk.gray(suffix)}`
      }

      case 'success': {
        return chalk.green(`${job.displayName}${suffix}`) + label
      }

      case 'failure': {
        return chalk.red(`${job.displayName}${suffix}`) + label
      }

      case 'cancelled': {
        return chalk.yellow(`${job.displayName}${suffix}`) + label
      }

      case 'skipped': {
        return chalk.gray(`${job.displayName}${suffix}`)
      }
    }
  }

  private startRendering(): void {
    if (!this.timer) {
      this.render()
      this.timer = setInterval(() => {
        this.render()
      }, 80)
    }
  }

  private stopRendering(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }

    this.render()
    this.logUpdate.done()
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const job = this.jobs.get(event.job.id)
    if (job && !event.continued) {
      job.failure = `${event.step.displayName}: ${event.message}`
    }
  }

  private handleJobFinished(event: JobFinishedEvent): void {
    const job = this.jobs.get(event.job.id)
    if (!job) {
      return
    }

    job.status = event.status
    job.detail = event.status === 'failure' && job.failure
      ? `${job.failure}, ${formatDuration(event.durationMs)}`
      : formatDuration(event.durationMs)

    if (event.status !== 'failure') {
      this.stderrBuffers.delete(event.job.id)
    }
  }

  private printFailedStderr(): void {
    for (const [jobId, job] of this.jobs) {
      if (job.status === 'failure') {
        const stderr = this.stderrBuffers.get(jobId)
        if (stderr?.length) {
          console.error(chalk.red(`  ── ${job.displayName} stderr ──`))
          for (const line of stderr) {
            console.error(chalk.red(`  ${line}`))
          }
        }
      }
    }
  }
}
