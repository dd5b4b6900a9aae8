import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadConfig} from '../../core/config.js'
import {RunStore} from '../../core/run-store.js'
import {formatDuration} from '../../core/utils.js'
import {colorStatus, getGlobalOptions, resolveWorkdir, statusSymbol} from '../utils.js'

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Show the jobs and steps of a stored run')
    .argument('<runId>', 'Run identifier (see `list`)')
    .action(async (runId: string, _options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const store = new RunStore(resolveWorkdir(global, await loadConfig(process.cwd())))
      const run = await store.read(runId)

      if (global.json) {
        console.log(JSON.stringify(run, null, 2))
        return
      }

      const trigger = run.event.kind === 'push'
        ? `push to ${run.event.branch}`
        : `pull request${run.event.number === undefined ? '' : ` #${run.event.number}`}`
      console.log(chalk.bold(`\nRun: ${chalk.cyan(run.runId)}`))
      console.log(`  Workflow:  ${run.workflowId}`)
      console.log(`  Event:     ${trigger}`)
      console.log(`  Status:    ${colorStatus(run.status)}`)
      console.log(`  Started:   ${run.startedAt}`)
      console.log(`  Duration:  ${formatDuration(run.durationMs)}`)

      for (const job of run.jobs) {
        console.log(`\n${statusSymbol(job.status)} ${chalk.bold(job.displayName)} ${chalk.gray(`[${job.environment.label}] ${job.instanceId}, ${formatDuration(job.durationMs)}`)}`)
        for (const step of job.steps) {
          const detail = step.error ? chalk.red(` ${step.error}`) : ''
          console.log(`    ${statusSymbol(step.status)} ${step.displayName}${chalk.gray(` (${formatDuration(step.durationMs)})`)}${detail}`)
        }

        if (job.failedStep) {
          console.log(chalk.red(`    Failed at ${job.failedStep.stepId}: ${job.failedStep.message}`))
        }
      }

      console.log()
    })
}
