import {MissingParameterError, ProvisioningError} from '../../errors.js'
import type {Capability} from '../index.js'
import {referenceName} from '../reference.js'

const toolChecks: Record<string, string[]> = {
  rust: ['rustc --version', 'cargo --version'],
  node: ['node --version', 'npm --version'],
  python: ['python3 --version'],
  go: ['go version'],
  java: ['java -version']
}

const componentChecks: Record<string, string> = {
  rustfmt: 'cargo fmt --version',
  clippy: 'cargo clippy --version'
}

/**
 * Derives the tool a toolchain reference sets up:
 * `hecrj/setup-rust-action` → rust, `dtolnay/rust-toolchain` → rust.
 */
export function toolName(reference: string): string {
  const name = referenceName(reference)
  return name
    .slice(name.lastIndexOf('/') + 1)
    .toLowerCase()
    .replace(/^setup-/, '')
    .replace(/-(action|toolchain)$/, '')
}

/** Commands whose success proves the toolchain and its components are present. */
export function versionCommands(tool: string, components: readonly string[]): string[] {
  const base = toolChecks[tool] ?? [`${tool} --version`]
  return [...base, ...components.map(component => componentChecks[component] ?? `${component} --version`)]
}

/**
 * Verifies a toolchain is available in the environment.
 *
 * Nothing is installed: each version command must succeed, otherwise the
 * environment cannot run the job and provisioning fails.
 *
 * Parameters:
 * - `tool` (required with the bare `toolchain` reference): tool to check
 * - `components` (optional): comma or space separated extra components
 */
export const toolchainCapability: Capability = {
  name: 'toolchain',
  async invoke(params, context) {
    if (!params.tool && referenceName(context.reference) === 'toolchain') {
      throw new MissingParameterError('toolchain', 'tool')
    }

    const tool = params.tool ?? toolName(context.reference)
    const components = (params.components ?? '').split(/[\s,]+/).filter(Boolean)

    for (const command of versionCommands(tool, components)) {
      const result = await context.environment.exec({command, signal: context.signal}, context.log)
      if (result.cancelled) {
        return result
      }

      if (result.exitCode !== 0) {
        throw new ProvisioningError(context.environment.descriptor.label, `${command} exited with code ${result.exitCode}`)
      }
    }

    return {exitCode: 0}
  }
}
