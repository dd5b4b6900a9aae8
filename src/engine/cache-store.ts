import {access, cp, mkdir, readdir, rename, rm} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {CacheError, isNotFoundError} from '../errors.js'

/**
 * Keyed store of reusable build artifacts, shared by every job instance.
 *
 * The cache is advisory: a miss or an unavailable store never changes the
 * outcome of a job.
 */
export abstract class CacheStore {
  /**
   * Copies the entry stored under `key` into `destination`.
   * @returns true on a hit, false when no entry exists
   * @throws CacheError when the store cannot be read
   */
  abstract restore(key: string, destination: string): Promise<boolean>

  /**
   * Stores the contents of `source` under `key`, replacing any previous entry.
   * @throws CacheError when the store cannot be written
   */
  abstract save(key: string, source: string): Promise<void>
}

/**
 * Cache store backed by a directory: `<root>/entries/<key>/`.
 *
 * ## Write Lifecycle
 *
 * 1. `save()` copies the source into `<root>/staging/<key>-<uuid>/`
 * 2. The previous entry (if any) is renamed aside, the staged copy is
 *    renamed into place, then the previous entry is removed
 *
 * Swaps for the same key are serialized within the process; concurrent
 * writers resolve as last write wins. Readers only ever see complete entries.
 */
export class DirectoryCacheStore extends CacheStore {
  private readonly pending = new Map<string, Promise<void>>()

  constructor(readonly root: string) {
    super()
  }

  entryPath(key: string): string {
    validateKey(key)
    return join(this.root, 'entries', key)
  }

  async restore(key: string, destination: string): Promise<boolean> {
    const entry = this.entryPath(key)
    if (!await exists(entry)) {
      return false
    }

    try {
      await mkdir(destination, {recursive: true})
      await cp(entry, destination, {recursive: true})
      return true
    } catch (error) {
      throw new CacheError(`Failed to restore cache "${key}"`, {cause: error})
    }
  }

  async save(key: string, source: string): Promise<void> {
    const entry = this.entryPath(key)
    const staging = join(this.root, 'staging', `${key}-${randomUUID()}`)

    try {
      await mkdir(join(this.root, 'entries'), {recursive: true})
      await mkdir(join(this.root, 'staging'), {recursive: true})
      await cp(source, staging, {recursive: true})
    } catch (error) {
      await rm(staging, {recursive: true, force: true})
      throw new CacheError(`Failed to stage cache "${key}"`, {cause: error})
    }

    await this.exclusive(key, async () => {
      const previous = `${staging}.previous`
      try {
        const hadEntry = await exists(entry)
        if (hadEntry) {
          await rename(entry, previous)
        }

        await rename(staging, entry)
        if (hadEntry) {
          await rm(previous, {recursive: true, force: true})
        }
      } catch (error) {
        await rm(staging, {recursive: true, force: true})
        throw new CacheError(`Failed to save cache "${key}"`, {cause: error})
      }
    })
  }

  /**
   * Lists the keys currently stored.
   */
  async keys(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.root, 'entries'), {withFileTypes: true})
      return entries.filter(e => e.isDirectory()).map(e => e.name).sort()
    } catch (error) {
      if (isNotFoundError(error)) {
        return []
      }

      throw new CacheError('Failed to list cache entries', {cause: error})
    }
  }

  private async exclusive(key: string, fn: () => Promise<void>): Promise<void> {
    const previous = this.pending.get(key) ?? Promise.resolve()
    const current = previous.then(fn)
    // The chain only orders swaps; the caller observes `current` itself
    const settled = current.then(noop, noop)
    this.pending.set(key, settled)

    try {
      await current
    } finally {
      if (this.pending.get(key) === settled) {
        this.pending.delete(key)
      }
    }
  }
}

/** Keys name a single directory under `entries/`: a word character first, never `.` or `..`. */
function validateKey(key: string): void {
  if (!/^\w[\w.-]*$/.test(key) || key.includes('..')) {
    throw new CacheError(`Invalid cache key: '${key}'`)
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

function noop(): void {}
