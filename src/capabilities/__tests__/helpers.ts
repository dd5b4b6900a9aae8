import type {CapabilityContext, PostJobHook} from '../index.js'
import type {CacheStore} from '../../engine/cache-store.js'
import type {LogLine} from '../../types.js'
import {FakeEnvironment, instance, type FakeCommand} from '../../__tests__/helpers.js'

/**
 * Capability context over a FakeEnvironment, recording log lines and
 * registered post-job hooks.
 */
export function capabilityContext(reference: string, options: {
  workdir?: string;
  sourceDir?: string;
  cacheStore?: CacheStore;
  script?: Record<string, FakeCommand>;
} = {}) {
  const lines: LogLine[] = []
  const hooks: PostJobHook[] = []
  const target = instance([])
  const environment = new FakeEnvironment(target, options.script ?? {}, options.workdir)

  const context: CapabilityContext = {
    reference,
    instance: target,
    environment,
    sourceDir: options.sourceDir ?? '/nonexistent',
    cacheStore: options.cacheStore,
    log(line) {
      lines.push(line)
    },
    registerPostJob(hook) {
      hooks.push(hook)
    }
  }

  return {context, environment, lines, hooks}
}
