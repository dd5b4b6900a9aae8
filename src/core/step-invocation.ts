import {resolveCapability, type CapabilityContext} from '../capabilities/index.js'
import type {CapabilityStep, CommandStep, InvocationResult, StepSpec, VerityConfig} from '../types.js'
import {interpolate, interpolateRecord, type ExpressionContext} from './expression.js'

/** Runtime inputs shared by both kinds of step. */
export type InvocationContext = Omit<CapabilityContext, 'reference'> & {
  expressions: ExpressionContext;
  /** Environment variables passed to commands, step `env` excluded. */
  env: Readonly<Record<string, string>>;
  config: VerityConfig;
}

/**
 * A step ready to run: either a command handed to the environment's shell
 * or a named capability invoked with its parameters.
 */
export type StepInvocation = {
  execute(context: InvocationContext): Promise<InvocationResult>;
}

export class CommandInvocation implements StepInvocation {
  constructor(readonly step: CommandStep) {}

  async execute(context: InvocationContext): Promise<InvocationResult> {
    const command = interpolate(this.step.run, context.expressions)
    const env = {...context.env, ...interpolateRecord(this.step.env ?? {}, context.expressions)}
    return context.environment.exec({command, env, signal: context.signal}, context.log)
  }
}

export class CapabilityInvocation implements StepInvocation {
  constructor(readonly step: CapabilityStep) {}

  async execute(context: InvocationContext): Promise<InvocationResult> {
    const capability = resolveCapability(this.step.uses, context.config)
    const params = interpolateRecord(this.step.params, context.expressions)
    return capability.invoke(params, {...context, reference: this.step.uses})
  }
}

export function createInvocation(step: StepSpec): StepInvocation {
  return step.kind === 'capability' ? new CapabilityInvocation(step) : new CommandInvocation(step)
}
