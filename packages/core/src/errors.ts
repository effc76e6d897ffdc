/**
 * Base error class for orchestrator errors
 */
export class DroverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'DroverError'
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DroverError)
    }
  }
}

/**
 * Unrecoverable setup problem. The CLI exits non-zero on these.
 */
export class ConfigurationError extends DroverError {
  constructor(message: string, context?: Record<string, unknown>, code = 'CONFIGURATION_ERROR') {
    super(message, code, context)
    this.name = 'ConfigurationError'
  }
}

/**
 * A blocking relationship that loops back on itself can never become
 * eligible
 */
export class DependencyCycleError extends ConfigurationError {
  constructor(public readonly cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`, { cycle }, 'DEPENDENCY_CYCLE')
    this.name = 'DependencyCycleError'
  }
}

export class WorkspaceError extends DroverError {
  constructor(
    message: string,
    public readonly workspacePath: string,
    public readonly stderr?: string
  ) {
    super(message, 'WORKSPACE_ERROR', { workspacePath, stderr })
    this.name = 'WorkspaceError'
  }
}

export class SessionError extends DroverError {
  constructor(message: string, public readonly sessionName: string) {
    super(message, 'SESSION_ERROR', { sessionName })
    this.name = 'SessionError'
  }
}

export function isDroverError(error: unknown): error is DroverError {
  return error instanceof DroverError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

export function isDependencyCycleError(error: unknown): error is DependencyCycleError {
  return error instanceof DependencyCycleError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
