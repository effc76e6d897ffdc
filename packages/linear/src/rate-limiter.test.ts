import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { TokenBucket, DEFAULT_RATE_LIMIT_CONFIG, extractRetryAfterMs } from './rate-limiter.js'

describe('TokenBucket', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('starts full with the default burst capacity', () => {
    const bucket = new TokenBucket()
    expect(bucket.availableTokens).toBe(DEFAULT_RATE_LIMIT_CONFIG.maxTokens)
    expect(DEFAULT_RATE_LIMIT_CONFIG).toEqual({ maxTokens: 60, refillRate: 1.25 })
  })

  it('takes one token per acquire', async () => {
    const bucket = new TokenBucket({ maxTokens: 3, refillRate: 1 })

    await bucket.acquire()
    await bucket.acquire()

    expect(bucket.availableTokens).toBe(1)
  })

  it('queues callers once the bucket is empty', async () => {
    const bucket = new TokenBucket({ maxTokens: 1, refillRate: 1 })
    await bucket.acquire()

    let resolved = false
    const pending = bucket.acquire().then(() => {
      resolved = true
    })

    await vi.advanceTimersByTimeAsync(0)
    expect(resolved).toBe(false)
    expect(bucket.pendingCount).toBe(1)

    await vi.advanceTimersByTimeAsync(1000)
    await pending

    expect(resolved).toBe(true)
    expect(bucket.pendingCount).toBe(0)
  })

  it('releases waiters in arrival order', async () => {
    const bucket = new TokenBucket({ maxTokens: 1, refillRate: 4 })
    await bucket.acquire()

    const order: string[] = []
    const first = bucket.acquire().then(() => order.push('first'))
    const second = bucket.acquire().then(() => order.push('second'))

    await vi.advanceTimersByTimeAsync(250)
    expect(order).toEqual(['first'])

    await vi.advanceTimersByTimeAsync(250)
    expect(order).toEqual(['first', 'second'])

    await Promise.all([first, second])
  })

  it('never refills past capacity', () => {
    const bucket = new TokenBucket({ maxTokens: 5, refillRate: 50 })
    vi.advanceTimersByTime(60_000)
    expect(bucket.availableTokens).toBe(5)
  })

  it('freezes refills while penalized', () => {
    const bucket = new TokenBucket({ maxTokens: 8, refillRate: 8 })

    bucket.penalize(2)
    expect(bucket.availableTokens).toBe(0)

    vi.advanceTimersByTime(2000)
    expect(bucket.availableTokens).toBe(0)

    vi.advanceTimersByTime(1000)
    expect(bucket.availableTokens).toBe(8)
  })

  it('holds queued callers until the penalty expires', async () => {
    const bucket = new TokenBucket({ maxTokens: 1, refillRate: 1 })
    bucket.penalize(3)

    let resolved = false
    const pending = bucket.acquire().then(() => {
      resolved = true
    })

    await vi.advanceTimersByTimeAsync(3500)
    expect(resolved).toBe(false)

    await vi.advanceTimersByTimeAsync(500)
    await pending
    expect(resolved).toBe(true)
  })
})

describe('extractRetryAfterMs', () => {
  it('ignores anything that is not a 429', () => {
    expect(extractRetryAfterMs(null)).toBeNull()
    expect(extractRetryAfterMs('429')).toBeNull()
    expect(extractRetryAfterMs({ status: 503 })).toBeNull()
    expect(extractRetryAfterMs({ response: { status: 200 } })).toBeNull()
  })

  it('defaults to one minute without a header', () => {
    expect(extractRetryAfterMs({ status: 429 })).toBe(60_000)
  })

  it('reads a plain header object on the response', () => {
    const error = { status: 429, response: { headers: { 'retry-after': '12' } } }
    expect(extractRetryAfterMs(error)).toBe(12_000)
  })

  it('reads fetch-style Headers', () => {
    const error = { response: { status: 429, headers: new Headers({ 'retry-after': '7' }) } }
    expect(extractRetryAfterMs(error)).toBe(7_000)
  })

  it('reads headers carried on the error itself', () => {
    const error = { statusCode: 429, headers: new Map([['retry-after', '5']]) }
    expect(extractRetryAfterMs(error)).toBe(5_000)
  })

  it('falls back to the default for unusable values', () => {
    expect(extractRetryAfterMs({ status: 429, headers: { 'retry-after': 'soon' } })).toBe(60_000)
    expect(extractRetryAfterMs({ status: 429, headers: { 'retry-after': '0' } })).toBe(60_000)
  })
})
