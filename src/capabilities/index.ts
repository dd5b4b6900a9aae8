import {CapabilityError} from '../errors.js'
import type {CacheStore} from '../engine/cache-store.js'
import type {Environment} from '../engine/provisioner.js'
import type {OnLogLine} from '../engine/types.js'
import type {InvocationResult, JobInstance, VerityConfig} from '../types.js'
import {cacheCapability} from './builtin/cache.js'
import {checkoutCapability} from './builtin/checkout.js'
import {toolchainCapability} from './builtin/toolchain.js'
import {referenceName} from './reference.js'

export {referenceName} from './reference.js'

/** Work a capability defers until its job has succeeded (e.g. saving a cache). */
export type PostJobHook = {
  name: string;
  run(log: OnLogLine): Promise<void>;
}

/** Everything a capability may touch while it runs. */
export type CapabilityContext = {
  /** Full `uses:` reference, version included (e.g. "actions/checkout@v4"). */
  reference: string;
  instance: JobInstance;
  environment: Environment;
  /** Repository checked out by the `checkout` capability. */
  sourceDir: string;
  cacheStore?: CacheStore;
  signal?: AbortSignal;
  log: OnLogLine;
  registerPostJob(hook: PostJobHook): void;
}

export type Capability = {
  name: string;
  invoke(params: Readonly<Record<string, string>>, context: CapabilityContext): Promise<InvocationResult>;
}

const builtinCapabilities = new Map<string, Capability>([
  [checkoutCapability.name, checkoutCapability],
  [toolchainCapability.name, toolchainCapability],
  [cacheCapability.name, cacheCapability]
])

/**
 * Resolves a `uses:` reference to a capability.
 *
 * Resolution order (the version suffix is ignored):
 * 1. Alias: `config.capabilities[reference]` names a builtin
 * 2. Builtin: exact name (checkout, toolchain, cache)
 * 3. Pattern, on the part after the owner:
 *    `checkout` → checkout, `setup-*` or `*-toolchain` → toolchain,
 *    anything containing `cache` → cache
 */
export function resolveCapability(uses: string, config: VerityConfig = {}): Capability {
  const reference = referenceName(uses)

  const alias = config.capabilities?.[reference]
  if (alias) {
    const aliased = builtinCapabilities.get(alias)
    if (!aliased) {
      throw new CapabilityError('UNKNOWN_CAPABILITY', `Alias "${reference}" points to unknown capability "${alias}"`)
    }

    return aliased
  }

  const builtin = builtinCapabilities.get(reference)
  if (builtin) {
    return builtin
  }

  const name = reference.slice(reference.lastIndexOf('/') + 1).toLowerCase()
  const patterned = name === 'checkout'
    ? checkoutCapability
    : (name.startsWith('setup-') || name.endsWith('-toolchain'))
      ? toolchainCapability
      : name.includes('cache')
        ? cacheCapability
        : undefined

  if (!patterned) {
    throw new CapabilityError('UNKNOWN_CAPABILITY', `Unknown capability: "${uses}". Available capabilities: ${[...builtinCapabilities.keys()].join(', ')}`)
  }

  return patterned
}
