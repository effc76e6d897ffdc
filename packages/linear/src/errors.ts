/**
 * Base error class for tracker errors
 */
export class TrackerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'TrackerError'
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrackerError)
    }
  }
}

/**
 * Error thrown when the tracker API returns an error response
 */
export class TrackerApiError extends TrackerError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly response?: unknown
  ) {
    super(message, 'TRACKER_API_ERROR', { statusCode, response })
    this.name = 'TrackerApiError'
  }
}

/**
 * A tracker operation kept failing with transient faults until its retry
 * budget ran out
 */
export class TrackerRetryExhaustedError extends TrackerError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(`${operation} gave up after ${attempts} attempts: ${lastError.message}`, 'RETRY_EXHAUSTED', {
      operation,
      attempts,
      lastErrorMessage: lastError.message,
    })
    this.name = 'TrackerRetryExhaustedError'
  }
}

/**
 * Error thrown when a referenced issue, state, label or user does not exist
 */
export class TrackerNotFoundError extends TrackerError {
  constructor(
    message: string,
    public readonly kind: 'issue' | 'state' | 'label' | 'user' | 'comment',
    public readonly ref: string
  ) {
    super(message, 'NOT_FOUND', { kind, ref })
    this.name = 'TrackerNotFoundError'
  }
}

/**
 * Error thrown when a tracker payload fails schema validation
 */
export class TrackerResponseError extends TrackerError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, 'INVALID_RESPONSE', { issues })
    this.name = 'TrackerResponseError'
  }
}

/**
 * Error thrown when opening a merge request fails
 */
export class MergeRequestError extends TrackerError {
  constructor(
    message: string,
    public readonly branch: string,
    public readonly stderr?: string
  ) {
    super(message, 'MERGE_REQUEST_ERROR', { branch, stderr })
    this.name = 'MergeRequestError'
  }
}

/**
 * Type guard to check if an error is a TrackerError
 */
export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError
}

const NETWORK_ERROR_PATTERNS = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'socket hang up',
  'fetch failed',
  'network error',
]

/**
 * Type guard to check if an error is retryable
 */
export function isRetryableError(
  error: unknown,
  retryableStatusCodes: number[] = [429, 500, 502, 503, 504]
): boolean {
  if (error instanceof TrackerApiError) {
    return retryableStatusCodes.includes(error.statusCode)
  }
  if (error instanceof TrackerError) {
    return false
  }
  const status = readStatus(error)
  if (status !== null) {
    return retryableStatusCodes.includes(status)
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase()
    return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern.toLowerCase()))
  }
  return false
}

/**
 * Transient infrastructure fault: either still retryable, or a retry budget
 * that ran out on one. The lifecycle treats these as infrastructure, not as
 * task outcomes.
 */
export function isTransientTrackerError(error: unknown): boolean {
  return error instanceof TrackerRetryExhaustedError || isRetryableError(error)
}

/**
 * Read an HTTP status from an SDK error (`status`, `statusCode`, or
 * `response.status`)
 */
export function readStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null
  for (const key of ['status', 'statusCode'] as const) {
    const value: unknown = Reflect.get(error, key)
    if (typeof value === 'number') return value
  }
  const response: unknown = Reflect.get(error, 'response')
  if (typeof response === 'object' && response !== null) {
    const value: unknown = Reflect.get(response, 'status')
    if (typeof value === 'number') return value
  }
  return null
}
