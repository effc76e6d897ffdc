import { describe, it, expect, vi } from 'vitest'
import { retryTrackerCall, backoffDelay, DEFAULT_RETRY_CONFIG, type TrackerBackoff } from './retry.js'
import {
  TrackerApiError,
  TrackerNotFoundError,
  TrackerRetryExhaustedError,
  isRetryableError,
  isTransientTrackerError,
} from './errors.js'

function policy(overrides: Partial<typeof DEFAULT_RETRY_CONFIG> = {}) {
  const backoffs: TrackerBackoff[] = []
  const sleep = vi.fn(async (_ms: number) => undefined)
  return {
    backoffs,
    sleep,
    policy: {
      config: { ...DEFAULT_RETRY_CONFIG, ...overrides },
      onBackoff: (backoff: TrackerBackoff) => backoffs.push(backoff),
      sleep,
    },
  }
}

describe('backoffDelay', () => {
  it('doubles per attempt and caps at maxDelayMs', () => {
    expect(backoffDelay(0, DEFAULT_RETRY_CONFIG)).toBe(1000)
    expect(backoffDelay(1, DEFAULT_RETRY_CONFIG)).toBe(2000)
    expect(backoffDelay(3, DEFAULT_RETRY_CONFIG)).toBe(8000)
    expect(backoffDelay(4, DEFAULT_RETRY_CONFIG)).toBe(10000)
  })
})

describe('retryTrackerCall', () => {
  it('returns the first successful result', async () => {
    const { policy: p, sleep } = policy()
    const fn = vi.fn(async () => 'ok')
    await expect(retryTrackerCall('getIssue', fn, p)).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('backs off on transient faults and reports each retry', async () => {
    const { policy: p, backoffs, sleep } = policy()
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TrackerApiError('busy', 503))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValue('ok')

    await expect(retryTrackerCall('listIssues', fn, p)).resolves.toBe('ok')

    expect(fn).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000])
    expect(backoffs.map(({ operation, attempt, delayMs, rateLimited, error }) => ({ operation, attempt, delayMs, rateLimited, message: error.message }))).toEqual([
      { operation: 'listIssues', attempt: 0, delayMs: 1000, rateLimited: false, message: 'busy' },
      { operation: 'listIssues', attempt: 1, delayMs: 2000, rateLimited: false, message: 'socket hang up' },
    ])
  })

  it('rethrows final errors untouched', async () => {
    const { policy: p } = policy()
    const notFound = new TrackerNotFoundError('Issue not found: X', 'issue', 'X')
    const fn = vi.fn(async () => {
      throw notFound
    })

    await expect(retryTrackerCall('getIssue', fn, p)).rejects.toBe(notFound)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('does not retry an operation whose own budget already ran out', async () => {
    const { policy: p } = policy()
    const exhausted = new TrackerRetryExhaustedError('postComment', 4, new Error('ETIMEDOUT'))
    const fn = vi.fn(async () => {
      throw exhausted
    })

    await expect(retryTrackerCall('openMergeRequest', fn, p)).rejects.toBe(exhausted)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('names the operation once the budget is spent', async () => {
    const { policy: p } = policy({ maxRetries: 1 })
    const fn = vi.fn(async () => {
      throw new TrackerApiError('down', 502)
    })

    const error = await retryTrackerCall('compareAndSetStatus', fn, p).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TrackerRetryExhaustedError)
    expect(error).toMatchObject({
      operation: 'compareAndSetStatus',
      attempts: 2,
      message: 'compareAndSetStatus gave up after 2 attempts: down',
    })
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('waits for Retry-After instead of backing off', async () => {
    const { policy: p, backoffs, sleep } = policy()
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new TrackerApiError('slow down', 429))
      .mockResolvedValue(7)

    await expect(retryTrackerCall('addLabels', fn, { ...p, retryAfterMs: () => 4000 })).resolves.toBe(7)

    expect(sleep).toHaveBeenCalledWith(4000)
    expect(backoffs[0]).toMatchObject({ operation: 'addLabels', delayMs: 4000, rateLimited: true })
  })
})

describe('error classification', () => {
  it('treats 429 and 5xx as retryable, 4xx as final', () => {
    expect(isRetryableError(new TrackerApiError('x', 429))).toBe(true)
    expect(isRetryableError(new TrackerApiError('x', 500))).toBe(true)
    expect(isRetryableError(new TrackerApiError('x', 400))).toBe(false)
  })

  it('reads status codes off foreign errors', () => {
    expect(isRetryableError({ status: 503 })).toBe(true)
    expect(isRetryableError({ response: { status: 401 } })).toBe(false)
  })

  it('recognises network failures by message', () => {
    expect(isRetryableError(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBe(true)
    expect(isRetryableError(new Error('validation failed'))).toBe(false)
  })

  it('counts exhausted retries as transient', () => {
    const exhausted = new TrackerRetryExhaustedError('getIssue', 4, new Error('ETIMEDOUT'))
    expect(isTransientTrackerError(exhausted)).toBe(true)
    expect(isTransientTrackerError(new TrackerNotFoundError('gone', 'issue', 'A'))).toBe(false)
  })
})
