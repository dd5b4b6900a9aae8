export class VerityError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'VerityError'
  }
}

// -- Workflow errors ---------------------------------------------------------

export class WorkflowError extends VerityError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'WorkflowError'
  }
}

export class ValidationError extends WorkflowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class TriggerError extends WorkflowError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('UNKNOWN_EVENT', message, options)
    this.name = 'TriggerError'
  }
}

// -- Execution errors --------------------------------------------------------

export class ExecutionError extends VerityError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ExecutionError'
  }
}

export class ProvisioningError extends ExecutionError {
  constructor(label: string, reason: string, options?: {cause?: unknown}) {
    super('PROVISIONING_FAILED', `Failed to provision "${label}": ${reason}`, options)
    this.name = 'ProvisioningError'
  }
}

export class CacheError extends ExecutionError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CACHE_UNAVAILABLE', message, options)
    this.name = 'CacheError'
  }
}

// -- Capability errors -------------------------------------------------------

export class CapabilityError extends VerityError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CapabilityError'
  }
}

export class MissingParameterError extends CapabilityError {
  constructor(capability: string, paramName: string, options?: {cause?: unknown}) {
    super('MISSING_PARAMETER', `Capability "${capability}": "${paramName}" parameter is required`, options)
    this.name = 'MissingParameterError'
  }
}

// -- Reporting errors --------------------------------------------------------

export class ReportError extends VerityError {
  constructor(runId: string, options?: {cause?: unknown}) {
    super('REPORT_FAILED', `Failed to report outcome of run ${runId}`, options)
    this.name = 'ReportError'
  }
}

export class RunStoreError extends VerityError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RunStoreError'
  }
}

export class RunNotFoundError extends RunStoreError {
  constructor(runId: string, options?: {cause?: unknown}) {
    super('RUN_NOT_FOUND', `Run not found: ${runId}`, options)
    this.name = 'RunNotFoundError'
  }
}

/** True for filesystem errors reporting a missing file or directory. */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
