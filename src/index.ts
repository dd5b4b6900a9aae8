/**
 * Library entry point.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {
 *   Orchestrator,
 *   WorkflowLoader,
 *   LocalProvisioner,
 *   DirectoryCacheStore,
 *   ConsoleReporter,
 *   LogStatusSink
 * } from 'verity-ci'
 *
 * const workflow = await new WorkflowLoader().load('.github/workflows/build.yml')
 * const orchestrator = new Orchestrator({
 *   provisioner: new LocalProvisioner(),
 *   reporter: new ConsoleReporter(),
 *   statusSink: new LogStatusSink(),
 *   cacheStore: new DirectoryCacheStore('.verity/cache')
 * })
 *
 * const outcome = await orchestrator.run(workflow, {kind: 'push', branch: 'master'}, {sourceDir: '.'})
 * console.log(outcome?.status)
 * ```
 */

export {
  Environment,
  Provisioner,
  LocalProvisioner,
  LocalEnvironment,
  CacheStore,
  DirectoryCacheStore,
  type LocalProvisionerOptions,
  type ExecRequest,
  type ExecResult,
  type OnLogLine
} from './engine/index.js'

export {
  Orchestrator,
  aggregateStatus,
  JobRunner,
  WorkflowLoader,
  selectJobs,
  parseEvent,
  concurrencyGroup,
  expandJob,
  expandMatrix,
  ConsoleReporter,
  CompositeReporter,
  LogStatusSink,
  RunStoreStatusSink,
  CompositeStatusSink,
  RunStore,
  loadConfig,
  type OrchestratorDependencies,
  type RunOptions,
  type TriggerDecision,
  type Reporter,
  type RunEvent,
  type StatusSink,
  type RunRecord,
  type RunSummary
} from './core/index.js'

export {resolveCapability, type Capability, type CapabilityContext, type PostJobHook} from './capabilities/index.js'

export {
  isRepositoryEvent,
  type RepositoryEvent,
  type PushEvent,
  type PullRequestEvent,
  type Workflow,
  type JobSpec,
  type StepSpec,
  type CapabilityStep,
  type CommandStep,
  type MatrixSpec,
  type JobInstance,
  type EnvironmentDescriptor,
  type JobResult,
  type StepResult,
  type RunOutcome,
  type RunStatus,
  type VerityConfig
} from './types.js'

export {
  VerityError,
  WorkflowError,
  ValidationError,
  TriggerError,
  ExecutionError,
  ProvisioningError,
  CacheError,
  CapabilityError,
  MissingParameterError,
  ReportError,
  RunStoreError,
  RunNotFoundError
} from './errors.js'
