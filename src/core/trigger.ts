import {TriggerError} from '../errors.js'
import {isRepositoryEvent, type JobSpec, type RepositoryEvent, type Workflow} from '../types.js'

export type TriggerDecision =
  | {launch: true; event: RepositoryEvent; jobs: readonly JobSpec[]}
  | {launch: false; reason: string}

/**
 * Decides whether an incoming event launches a run, and with which jobs.
 *
 * - push: accepted when the workflow listens to pushes and the branch matches
 *   one of its branch filters (no filter accepts every branch)
 * - pull_request: accepted whenever the workflow listens to pull requests,
 *   whatever the target branch
 * - anything else is rejected without launching a run
 *
 * Every accepted event selects the complete job set, in declaration order.
 */
export function selectJobs(workflow: Workflow, event: unknown): TriggerDecision {
  if (!isRepositoryEvent(event)) {
    return {launch: false, reason: `Unrecognized event: ${describe(event)}`}
  }

  switch (event.kind) {
    case 'push': {
      const rule = workflow.triggers.push
      if (!rule) {
        return {launch: false, reason: 'Workflow does not run on push'}
      }

      if (rule.branches.length > 0 && !rule.branches.some(pattern => matchesBranch(pattern, event.branch))) {
        return {launch: false, reason: `Branch "${event.branch}" does not match ${rule.branches.join(', ')}`}
      }

      return {launch: true, event, jobs: workflow.jobs}
    }

    case 'pull_request': {
      if (!workflow.triggers.pullRequest) {
        return {launch: false, reason: 'Workflow does not run on pull_request'}
      }

      return {launch: true, event, jobs: workflow.jobs}
    }
  }
}

/**
 * Builds a repository event from external input (CLI flags, webhook fields).
 * @throws TriggerError when the kind is not push or pull_request, or a push has no branch
 */
export function parseEvent(kind: string, fields: {branch?: string; number?: number} = {}): RepositoryEvent {
  const event: unknown = kind === 'push'
    ? {kind, branch: fields.branch}
    : {kind, branch: fields.branch, number: fields.number}

  if (!isRepositoryEvent(event)) {
    throw new TriggerError(kind === 'push'
      ? 'A push event needs a branch'
      : `Unrecognized event kind: "${kind}". Expected push or pull_request`)
  }

  return event
}

/**
 * Matches a branch name against a branch filter.
 * `*` matches any run of characters except `/`, `**` matches anything.
 */
export function matchesBranch(pattern: string, branch: string): boolean {
  if (!pattern.includes('*')) {
    return pattern === branch
  }

  const source = pattern
    .split('**')
    .map(part => part.split('*').map(s => escapeRegExp(s)).join('[^/]*'))
    .join('.*')
  return new RegExp(`^${source}$`).test(branch)
}

/** Concurrency group of an event: runs in the same group supersede each other. */
export function concurrencyGroup(workflowId: string, event: RepositoryEvent): string {
  if (event.kind === 'push') {
    return `${workflowId}:push:${event.branch}`
  }

  return `${workflowId}:pull_request:${event.number ?? event.branch ?? ''}`
}

function escapeRegExp(value: string): string {
  return value.replaceAll(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function describe(event: unknown): string {
  if (typeof event === 'object' && event !== null && 'kind' in event) {
    return String(event.kind)
  }

  return typeof event
}
