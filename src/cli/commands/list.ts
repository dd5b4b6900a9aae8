import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadConfig} from '../../core/config.js'
import {RunStore} from '../../core/run-store.js'
import {formatDuration} from '../../core/utils.js'
import {colorStatus, getGlobalOptions, resolveWorkdir} from '../utils.js'

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List stored runs, newest first')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const store = new RunStore(resolveWorkdir(global, await loadConfig(process.cwd())))
      const runs = await store.list()

      if (global.json) {
        console.log(JSON.stringify(runs, null, 2))
        return
      }

      if (runs.length === 0) {
        console.log(chalk.gray('No runs found.'))
        return
      }

      const rows = runs.map(run => ({
        ...run,
        duration: formatDuration(run.durationMs),
        date: run.startedAt.replace('T', ' ').replace(/\.\d+Z$/, '')
      }))

      const runWidth = Math.max('RUN'.length, ...rows.map(r => r.runId.length))
      const workflowWidth = Math.max('WORKFLOW'.length, ...rows.map(r => r.workflowId.length))
      const statusWidth = Math.max('STATUS'.length, ...rows.map(r => r.status.length))
      const durationWidth = Math.max('DURATION'.length, ...rows.map(r => r.duration.length))

      console.log(chalk.bold(
        `${'RUN'.padEnd(runWidth)}  ${'WORKFLOW'.padEnd(workflowWidth)}  ${'STATUS'.padEnd(statusWidth)}  JOBS  ${'DURATION'.padStart(durationWidth)}  STARTED`
      ))
      for (const row of rows) {
        const status = colorStatus(row.status)
        console.log(
          `${row.runId.padEnd(runWidth)}  ${row.workflowId.padEnd(workflowWidth)}  ${status.padEnd(statusWidth + (status.length - row.status.length))}  ${String(row.jobCount).padStart(4)}  ${row.duration.padStart(durationWidth)}  ${row.date}`
        )
      }
    })
}
