import {cp, readFile} from 'node:fs/promises'
import {relative, resolve} from 'node:path'
import ignore from 'ignore'
import {isNotFoundError} from '../../errors.js'
import type {Capability} from '../index.js'

const DEFAULT_IGNORES = [
  '.git',
  'node_modules',
  '.verity',
  '.DS_Store'
]

/**
 * Builds a predicate telling which paths of the repository are left out of
 * a checkout: the default ignores plus the root `.gitignore`.
 */
export async function buildIgnoreFilter(root: string): Promise<(path: string) => boolean> {
  const ig = ignore().add(DEFAULT_IGNORES)

  try {
    ig.add(await readFile(resolve(root, '.gitignore'), 'utf8'))
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error
    }
  }

  return (path: string) => {
    if (path === '') {
      return false
    }

    // Directory-only patterns (e.g. "dist/") match with a trailing slash
    return ig.ignores(path) || ig.ignores(path + '/')
  }
}

/**
 * Copies the repository into the environment's working directory.
 *
 * Parameters:
 * - `path` (optional): subdirectory of the workspace to check out into
 */
export const checkoutCapability: Capability = {
  name: 'checkout',
  async invoke(params, context) {
    const source = resolve(context.sourceDir)
    const destination = resolve(context.environment.workdir, params.path ?? '.')
    const isIgnored = await buildIgnoreFilter(source)

    let copied = 0
    await cp(source, destination, {
      recursive: true,
      filter(path) {
        const keep = !isIgnored(relative(source, path).split('\\').join('/'))
        if (keep && path !== source) {
          copied++
        }

        return keep
      }
    })

    context.log({stream: 'stdout', line: `Checked out ${source} (${copied} entries)`})
    return {exitCode: 0}
  }
}
