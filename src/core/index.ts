export {Orchestrator, aggregateStatus} from './orchestrator.js'
export type {OrchestratorDependencies, RunOptions} from './orchestrator.js'
export {JobRunner} from './job-runner.js'
export type {JobRunOptions} from './job-runner.js'
export {WorkflowLoader, parseWorkflowFile} from './workflow-loader.js'
export {selectJobs, parseEvent, matchesBranch, concurrencyGroup} from './trigger.js'
export type {TriggerDecision} from './trigger.js'
export {expandJob, expandMatrix, describeEnvironment} from './matrix.js'
export {CommandInvocation, CapabilityInvocation, createInvocation} from './step-invocation.js'
export type {StepInvocation, InvocationContext} from './step-invocation.js'
export {buildContext, interpolate, evaluateCondition} from './expression.js'
export type {ExpressionContext} from './expression.js'
export {ConsoleReporter, CompositeReporter} from './reporter.js'
export type {
  Reporter,
  RunEvent,
  RunContext,
  JobRef,
  StepRef,
  RunStartEvent,
  RunSkippedEvent,
  JobSkippedEvent,
  JobStartingEvent,
  StepStartingEvent,
  StepLogEvent,
  StepFinishedEvent,
  StepFailedEvent,
  StepSkippedEvent,
  JobFinishedEvent,
  RunFinishedEvent
} from './reporter.js'
export {LogStatusSink, RunStoreStatusSink, CompositeStatusSink} from './status-sink.js'
export type {StatusSink} from './status-sink.js'
export {RunStore, generateRunId} from './run-store.js'
export type {RunRecord, RunSummary} from './run-store.js'
export {loadConfig, validateConfig, configFilename} from './config.js'
export {slugify, formatDuration, stepDisplayName} from './utils.js'
