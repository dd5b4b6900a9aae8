import process from 'node:process'
import {mkdir, mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {execa, ExecaError} from 'execa'
import {ProvisioningError} from '../errors.js'
import type {EnvironmentDescriptor, JobInstance, RunnerOs} from '../types.js'
import {Environment, Provisioner} from './provisioner.js'
import type {ExecRequest, ExecResult, OnLogLine} from './types.js'

export type LocalProvisionerOptions = {
  /** Directory receiving one temporary directory per instance (default: OS tmpdir) */
  root?: string;
  /** Runner labels explicitly mapped onto the host */
  runners?: Readonly<Record<string, 'host'>>;
  /** Map every runner label onto the host, whatever its OS */
  acceptAllLabels?: boolean;
}

export function hostOs(platform: NodeJS.Platform = process.platform): RunnerOs {
  switch (platform) {
    case 'linux': {
      return 'Linux'
    }

    case 'win32': {
      return 'Windows'
    }

    case 'darwin': {
      return 'macOS'
    }

    default: {
      return 'unknown'
    }
  }
}

/**
 * Runs job instances directly on the host, each in its own temporary directory.
 *
 * A label is accepted when its OS matches the host's, when it is mapped to
 * `host` in the project configuration, or when every label is accepted.
 */
export class LocalProvisioner extends Provisioner {
  private readonly os = hostOs()

  constructor(private readonly options: LocalProvisionerOptions = {}) {
    super()
  }

  accepts(descriptor: EnvironmentDescriptor): boolean {
    return this.options.acceptAllLabels === true
      || this.options.runners?.[descriptor.label] === 'host'
      || (descriptor.os !== 'unknown' && descriptor.os === this.os)
  }

  async provision(instance: JobInstance): Promise<Environment> {
    const {environment} = instance
    if (!this.accepts(environment)) {
      throw new ProvisioningError(environment.label, `no runner available on this ${this.os} host`)
    }

    const root = this.options.root ?? tmpdir()
    try {
      await mkdir(root, {recursive: true})
      const workdir = await mkdtemp(join(root, `verity-${instance.id}-`))
      return new LocalEnvironment(environment, workdir)
    } catch (error) {
      throw new ProvisioningError(environment.label, 'could not create a working directory', {cause: error})
    }
  }
}

export class LocalEnvironment extends Environment {
  async exec(request: ExecRequest, onLogLine: OnLogLine): Promise<ExecResult> {
    const startedAt = new Date()

    const proc = execa(request.command, {
      shell: true,
      cwd: this.workdir,
      env: request.env,
      reject: false,
      cancelSignal: request.signal,
      timeout: request.timeoutMs
    })

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line})
      }
    })()

    try {
      const [result] = await Promise.all([proc, stdoutDone, stderrDone])
      return toExecResult(result, startedAt)
    } catch (error) {
      // Line iteration rethrows the subprocess failure
      if (error instanceof ExecaError) {
        return toExecResult(error, startedAt)
      }

      throw error
    }
  }

  async release(): Promise<void> {
    await rm(this.workdir, {recursive: true, force: true})
  }
}

function toExecResult(result: {
  exitCode?: number;
  failed: boolean;
  isCanceled: boolean;
  timedOut: boolean;
  shortMessage?: string;
}, startedAt: Date): ExecResult {
  return {
    exitCode: result.exitCode ?? 1,
    startedAt,
    finishedAt: new Date(),
    cancelled: result.isCanceled,
    timedOut: result.timedOut,
    error: result.failed && result.exitCode === undefined ? result.shortMessage : undefined
  }
}
