import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {isNotFoundError, ValidationError} from '../errors.js'
import type {VerityConfig} from '../types.js'
import {deepFreeze, isRecord} from './utils.js'

export const configFilename = '.verity.yml'

/**
 * Loads the project-level `.verity.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<VerityConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error: unknown) {
    if (isNotFoundError(error)) {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ValidationError(`${configFilename}: invalid YAML`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  return deepFreeze(validateConfig(parsed))
}

export function validateConfig(raw: unknown): VerityConfig {
  if (!isRecord(raw)) {
    throw new ValidationError(`${configFilename}: must be a mapping`)
  }

  const config: VerityConfig = {}

  if (raw.workdir !== undefined) {
    if (typeof raw.workdir !== 'string' || raw.workdir.length === 0) {
      throw new ValidationError(`${configFilename}: workdir must be a non-empty string`)
    }

    config.workdir = raw.workdir
  }

  if (raw.concurrency !== undefined) {
    if (typeof raw.concurrency !== 'number' || !Number.isInteger(raw.concurrency) || raw.concurrency < 1) {
      throw new ValidationError(`${configFilename}: concurrency must be a positive integer`)
    }

    config.concurrency = raw.concurrency
  }

  for (const flag of ['failFast', 'cancelInProgress'] as const) {
    const value = raw[flag]
    if (value !== undefined) {
      if (typeof value !== 'boolean') {
        throw new ValidationError(`${configFilename}: ${flag} must be a boolean`)
      }

      config[flag] = value
    }
  }

  if (raw.runners !== undefined) {
    if (!isRecord(raw.runners)) {
      throw new ValidationError(`${configFilename}: runners must be a mapping of label to "host"`)
    }

    const runners: Record<string, 'host'> = {}
    for (const [label, target] of Object.entries(raw.runners)) {
      if (target !== 'host') {
        throw new ValidationError(`${configFilename}: runner "${label}" must map to "host"`)
      }

      runners[label] = target
    }

    config.runners = runners
  }

  if (raw.capabilities !== undefined) {
    if (!isRecord(raw.capabilities)) {
      throw new ValidationError(`${configFilename}: capabilities must be a mapping of reference to capability name`)
    }

    const capabilities: Record<string, string> = {}
    for (const [reference, name] of Object.entries(raw.capabilities)) {
      if (typeof name !== 'string') {
        throw new ValidationError(`${configFilename}: capability "${reference}" must map to a capability name`)
      }

      capabilities[reference] = name
    }

    config.capabilities = capabilities
  }

  return config
}
