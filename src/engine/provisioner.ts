import type {EnvironmentDescriptor, JobInstance} from '../types.js'
import type {ExecRequest, ExecResult, OnLogLine} from './types.js'

/**
 * Isolated execution context owned by one job instance.
 *
 * The instance runs every step through `exec()` and releases the
 * environment once its last step has completed.
 */
export abstract class Environment {
  constructor(
    readonly descriptor: EnvironmentDescriptor,
    /** Working directory the steps run in (the checked-out repository lands here) */
    readonly workdir: string
  ) {}

  /**
   * Runs a shell command in the environment.
   * @param request - Command, extra env, cancellation and timeout
   * @param onLogLine - Callback for real-time stdout/stderr lines
   */
  abstract exec(request: ExecRequest, onLogLine: OnLogLine): Promise<ExecResult>

  /**
   * Releases every resource held by the environment.
   */
  abstract release(): Promise<void>
}

/**
 * Abstract interface for preparing environments.
 *
 * Implementations:
 * - `LocalProvisioner`: runs jobs in temporary directories on the host
 *
 * @throws ProvisioningError when no environment can be provided for the
 * instance's runner label
 */
export abstract class Provisioner {
  abstract provision(instance: JobInstance): Promise<Environment>
}
