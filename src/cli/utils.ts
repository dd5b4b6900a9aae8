import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import chalk from 'chalk'
import {InvalidArgumentError, type Command} from 'commander'
import {isNotFoundError, ValidationError} from '../errors.js'
import type {JobStatus, StepStatus, VerityConfig} from '../types.js'

export type GlobalOptions = {
  workdir?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Working directory holding runs, caches and environments.
 * Precedence: `--workdir`, `VERITY_WORKDIR`, `.verity.yml`, `./.verity`.
 */
export function resolveWorkdir(options: GlobalOptions, config: VerityConfig = {}): string {
  return resolve(options.workdir ?? process.env.VERITY_WORKDIR ?? config.workdir ?? '.verity')
}

export const workflowFilenames = [
  join('.github', 'workflows', 'build.yml'),
  'verity.yml',
  'verity.yaml',
  'verity.json'
]

/**
 * Resolves the workflow file to run: the given file, or the first known
 * workflow filename found in the given directory (default: current directory).
 */
export async function resolveWorkflowFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch (error) {
    throw new ValidationError(`Path does not exist: ${target}`, {cause: error})
  }

  for (const filename of workflowFilenames) {
    const candidate = join(target, filename)
    if (await exists(candidate)) {
      return candidate
    }
  }

  throw new ValidationError(
    `No workflow file found in ${target}. Expected one of: ${workflowFilenames.join(', ')}`
  )
}

/** Commander option parser accepting positive integers only. */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.')
  }

  return parsed
}

/** Process environment without its unset entries. */
export function processEnv(): Record<string, string> {
  return Object.fromEntries(
    Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined)
  )
}

export function statusSymbol(status: JobStatus | StepStatus): string {
  switch (status) {
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

export function colorStatus(status: JobStatus | StepStatus): string {
  switch (status) {
    case 'success': {
      return chalk.green(status)
    }

    case 'failure': {
      return chalk.red(status)
    }

    case 'cancelled': {
      return chalk.yellow(status)
    }

    case 'skipped': {
      return chalk.gray(status)
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch (error) {
    if (isNotFoundError(error)) {
      return false
    }

    throw error
  }
}
