import process from 'node:process'
import {join, resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {TriggerError, ValidationError} from '../../errors.js'
import {DirectoryCacheStore} from '../../engine/cache-store.js'
import {LocalProvisioner} from '../../engine/local-provisioner.js'
import {loadConfig} from '../../core/config.js'
import {Orchestrator} from '../../core/orchestrator.js'
import {ConsoleReporter} from '../../core/reporter.js'
import {RunStore} from '../../core/run-store.js'
import {CompositeStatusSink, LogStatusSink, RunStoreStatusSink, type StatusSink} from '../../core/status-sink.js'
import {parseEvent} from '../../core/trigger.js'
import {WorkflowLoader} from '../../core/workflow-loader.js'
import type {RepositoryEvent, VerityConfig} from '../../types.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {getGlobalOptions, parsePositiveInteger, processEnv, resolveWorkdir, resolveWorkflowFile} from '../utils.js'

export type EventOptions = {
  event: string;
  branch?: string;
  pr?: number;
}

type RunCommandOptions = EventOptions & {
  failFast?: boolean;
  concurrency?: number;
  localRunners?: boolean;
  source?: string;
  verbose?: boolean;
}

/**
 * Builds the event from CLI flags. An unrecognised event kind is not an error:
 * it prints a notice and yields undefined. A push without `--branch` is a
 * usage error.
 * @throws ValidationError when the event is a push and no branch was given
 */
export function eventFromOptions(options: EventOptions): RepositoryEvent | undefined {
  if (options.event === 'push' && !options.branch) {
    throw new ValidationError('A push event needs a branch: pass --branch <name>')
  }

  try {
    return parseEvent(options.event, {branch: options.branch, number: options.pr})
  } catch (error) {
    if (error instanceof TriggerError) {
      console.error(chalk.yellow(`No run launched: ${error.message}`))
      return undefined
    }

    throw error
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a workflow for a repository event')
    .argument('[workflow]', 'Workflow file or directory (default: current directory)')
    .option('-e, --event <kind>', 'Event kind: push or pull_request', 'push')
    .option('-b, --branch <name>', 'Branch pushed to, or source branch of the pull request')
    .option('--pr <number>', 'Pull request number', parsePositiveInteger)
    .option('--fail-fast', 'Cancel the other jobs as soon as one fails')
    .option('-c, --concurrency <number>', 'Max job instances running at once (default: all)', parsePositiveInteger)
    .option('--local-runners', 'Run every runner label on this host, whatever its OS')
    .option('-s, --source <dir>', 'Repository checked out into each environment (default: current directory)')
    .option('--verbose', 'Stream step output in real-time (interactive mode)')
    .action(async (workflowArg: string | undefined, options: RunCommandOptions, cmd: Command) => {
      const workflowFile = await resolveWorkflowFile(workflowArg)
      const global = getGlobalOptions(cmd)
      const projectConfig = await loadConfig(process.cwd())
      const config: VerityConfig = {
        ...projectConfig,
        ...(options.failFast ? {failFast: true} : {}),
        ...(options.concurrency === undefined ? {} : {concurrency: options.concurrency})
      }
      const workdir = resolveWorkdir(global, config)
      const workflow = await new WorkflowLoader().load(workflowFile)

      const event = eventFromOptions(options)
      if (!event) {
        return
      }

      const reporter = global.json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const sinks: StatusSink[] = [new RunStoreStatusSink(new RunStore(workdir))]
      if (global.json) {
        sinks.push(new LogStatusSink())
      }

      const orchestrator = new Orchestrator({
        provisioner: new LocalProvisioner({
          root: join(workdir, 'environments'),
          runners: config.runners,
          acceptAllLabels: options.localRunners
        }),
        reporter,
        statusSink: new CompositeStatusSink(...sinks),
        cacheStore: new DirectoryCacheStore(join(workdir, 'cache'))
      })

      const controller = new AbortController()
      const onSignal = (signal: NodeJS.Signals) => {
        controller.abort(new Error(`Received ${signal}`))
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const outcome = await orchestrator.run(workflow, event, {
          sourceDir: resolve(options.source ?? '.'),
          config,
          env: processEnv(),
          signal: controller.signal
        })

        if (outcome && outcome.status !== 'success') {
          process.exitCode = 1
        }
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
