import type {InvocationResult, LogLine} from '../types.js'

/**
 * Callback for receiving output lines while a command runs.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Request to run one shell command inside a provisioned environment.
 */
export type ExecRequest = {
  /** Command text, interpreted by the environment's shell */
  command: string;
  /** Extra environment variables for the command */
  env?: Readonly<Record<string, string>>;
  /** Aborting the signal kills the command */
  signal?: AbortSignal;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Result of a command execution.
 */
export type ExecResult = InvocationResult & {
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
  /** True when the command was killed by its timeout */
  timedOut: boolean;
}
