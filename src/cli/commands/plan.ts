import chalk from 'chalk'
import type {Command} from 'commander'
import {buildContext, evaluateCondition} from '../../core/expression.js'
import {expandJob} from '../../core/matrix.js'
import {selectJobs} from '../../core/trigger.js'
import {WorkflowLoader} from '../../core/workflow-loader.js'
import {stepDisplayName} from '../../core/utils.js'
import {getGlobalOptions, parsePositiveInteger, resolveWorkflowFile} from '../utils.js'
import {eventFromOptions, type EventOptions} from './run.js'

type PlannedRow = {
  instance: string;
  job: string;
  runsOn: string;
  os: string;
  steps: string[];
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show which job instances an event would run, without running them')
    .argument('[workflow]', 'Workflow file or directory (default: current directory)')
    .option('-e, --event <kind>', 'Event kind: push or pull_request', 'push')
    .option('-b, --branch <name>', 'Branch pushed to, or source branch of the pull request')
    .option('--pr <number>', 'Pull request number', parsePositiveInteger)
    .action(async (workflowArg: string | undefined, options: EventOptions, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const workflow = await new WorkflowLoader().load(await resolveWorkflowFile(workflowArg))

      const event = eventFromOptions(options)
      if (!event) {
        return
      }

      const decision = selectJobs(workflow, event)
      if (!decision.launch) {
        if (json) {
          console.log(JSON.stringify({launch: false, reason: decision.reason}))
        } else {
          console.log(chalk.yellow(`No run launched: ${decision.reason}`))
        }

        return
      }

      const rows: PlannedRow[] = []
      const skipped: string[] = []
      const taken = new Set<string>()
      for (const job of decision.jobs) {
        if (job.if !== undefined && !await evaluateCondition(job.if, buildContext({event, jobId: job.id}))) {
          skipped.push(job.id)
          continue
        }

        for (const instance of expandJob(job, event, taken)) {
          rows.push({
            instance: instance.id,
            job: instance.displayName,
            runsOn: instance.environment.label,
            os: instance.environment.os,
            steps: instance.steps.map(step => stepDisplayName(step))
          })
        }
      }

      if (json) {
        console.log(JSON.stringify({launch: true, instances: rows, skipped}, null, 2))
        return
      }

      console.log(chalk.bold(`\n${workflow.name ?? workflow.id}: ${rows.length} job instance${rows.length === 1 ? '' : 's'}\n`))
      const instanceWidth = Math.max('INSTANCE'.length, ...rows.map(r => r.instance.length))
      const runsOnWidth = Math.max('RUNS-ON'.length, ...rows.map(r => r.runsOn.length))
      console.log(chalk.bold(`${'INSTANCE'.padEnd(instanceWidth)}  ${'RUNS-ON'.padEnd(runsOnWidth)}  OS`))
      for (const row of rows) {
        console.log(`${row.instance.padEnd(instanceWidth)}  ${row.runsOn.padEnd(runsOnWidth)}  ${row.os}`)
        for (const step of row.steps) {
          console.log(chalk.gray(`  - ${step}`))
        }
      }

      for (const jobId of skipped) {
        console.log(chalk.gray(`${jobId} (skipped by condition)`))
      }

      console.log()
    })
}
