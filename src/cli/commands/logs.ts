import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {loadConfig} from '../../core/config.js'
import {RunStore} from '../../core/run-store.js'
import {getGlobalOptions, resolveWorkdir} from '../utils.js'

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show the captured output of a job instance')
    .argument('<runId>', 'Run identifier (see `list`)')
    .argument('<instance>', 'Job instance identifier (see `show`)')
    .option('-s, --stream <stream>', 'Show only stdout or stderr', 'both')
    .action(async (runId: string, instanceId: string, options: {stream: string}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const store = new RunStore(resolveWorkdir(global, await loadConfig(process.cwd())))
      const lines = (await store.logs(runId, instanceId))
        .filter(entry => options.stream === 'both' || entry.stream === options.stream)

      if (global.json) {
        console.log(JSON.stringify(lines, null, 2))
        return
      }

      for (const entry of lines) {
        if (entry.stream === 'stderr') {
          process.stderr.write(chalk.red(entry.line) + '\n')
        } else {
          process.stdout.write(entry.line + '\n')
        }
      }
    })
}
