import {access} from 'node:fs/promises'
import {resolve} from 'node:path'
import {isNotFoundError} from '../../errors.js'
import type {Capability} from '../index.js'

/** Turns a free-form key into one the cache store accepts. */
export function normalizeCacheKey(key: string): string {
  return key.trim().replaceAll(/[^\w.-]+/g, '-').replaceAll('..', '.').replace(/^[.-]+/, '')
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Restores a directory from the cache store and saves it back once the job
 * has succeeded.
 *
 * Parameters:
 * - `key` (optional): cache key, defaults to `<runner.os>-<jobId>`
 * - `path` (optional): directory relative to the workspace, defaults to `target`
 *
 * The cache is advisory: an unavailable store is logged as a warning and
 * treated as a miss.
 */
export const cacheCapability: Capability = {
  name: 'cache',
  async invoke(params, context) {
    const {instance, environment, cacheStore, log} = context
    const key = normalizeCacheKey(params.key ?? `${environment.descriptor.os}-${instance.jobId}`)
    const path = resolve(environment.workdir, params.path ?? 'target')

    if (!cacheStore) {
      log({stream: 'stderr', line: 'warning: no cache store configured, caching disabled'})
      return {exitCode: 0}
    }

    try {
      const hit = await cacheStore.restore(key, path)
      log({stream: 'stdout', line: hit ? `Cache restored from key: ${key}` : `Cache not found for key: ${key}`})
    } catch (error) {
      log({stream: 'stderr', line: `warning: cache unavailable, continuing without it: ${describe(error)}`})
    }

    context.registerPostJob({
      name: `cache ${key}`,
      async run(postLog) {
        try {
          await access(path)
        } catch (error) {
          if (!isNotFoundError(error)) {
            throw error
          }

          postLog({stream: 'stdout', line: `Nothing to cache at ${params.path ?? 'target'}`})
          return
        }

        await cacheStore.save(key, path)
        postLog({stream: 'stdout', line: `Cache saved with key: ${key}`})
      }
    })

    return {exitCode: 0}
  }
}
