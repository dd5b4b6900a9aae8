#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {VerityError} from '../errors.js'
import {registerListCommand} from './commands/list.js'
import {registerLogsCommand} from './commands/logs.js'
import {registerPlanCommand} from './commands/plan.js'
import {registerRunCommand} from './commands/run.js'
import {registerShowCommand} from './commands/show.js'

async function main() {
  const program = new Command()

  program
    .name('verity')
    .description('Build verification runs for repository events')
    .version('0.1.0')
    .option('--workdir <path>', 'Runs, caches and environments root (default: $VERITY_WORKDIR or ./.verity)')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerPlanCommand(program)
  registerListCommand(program)
  registerShowCommand(program)
  registerLogsCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof VerityError) {
    console.error(chalk.red(`${error.name}: ${error.message}`))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
