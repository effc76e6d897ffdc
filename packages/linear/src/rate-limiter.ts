/**
 * Token Bucket Rate Limiter
 *
 * Keeps tracker API calls below the workspace quota (Linear allows roughly
 * 100 requests per minute per key). Shared by every lifecycle in a process.
 *
 * Default: 60 burst capacity, 1.25 tokens/sec refill (~75 req/min sustained).
 */

import type { RateLimiterStrategy } from './types.js'
import { readStatus } from './errors.js'

export interface TokenBucketConfig {
  /** Maximum tokens (burst capacity) */
  maxTokens: number
  /** Tokens added per second */
  refillRate: number
}

export const DEFAULT_RATE_LIMIT_CONFIG: TokenBucketConfig = {
  maxTokens: 60,
  refillRate: 1.25,
}

/** Used when a 429 carries no usable Retry-After header */
export const DEFAULT_RETRY_AFTER_MS = 60_000

export class TokenBucket implements RateLimiterStrategy {
  private tokens: number
  private readonly maxTokens: number
  private readonly refillRate: number
  private lastRefill: number
  private waitQueue: Array<() => void> = []
  private refillTimer: ReturnType<typeof setTimeout> | null = null

  constructor(config: Partial<TokenBucketConfig> = {}) {
    const resolved = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config }
    this.maxTokens = resolved.maxTokens
    this.refillRate = resolved.refillRate
    this.tokens = this.maxTokens
    this.lastRefill = Date.now()
  }

  private refill(): void {
    const now = Date.now()
    const elapsed = (now - this.lastRefill) / 1000

    // lastRefill sits in the future while a penalty is active
    if (elapsed <= 0) return

    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate)
    this.lastRefill = now
  }

  private drainWaiters(): void {
    while (this.waitQueue.length > 0 && this.tokens >= 1) {
      const resolve = this.waitQueue.shift()
      if (!resolve) break
      this.tokens -= 1
      resolve()
    }
  }

  /**
   * Acquire a single token, queueing the caller until one refills
   */
  async acquire(): Promise<void> {
    this.refill()

    if (this.tokens >= 1 && this.waitQueue.length === 0) {
      this.tokens -= 1
      return
    }

    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve)
      this.scheduleRefillDrain()
    })
  }

  private scheduleRefillDrain(): void {
    if (this.refillTimer !== null) return

    const penaltyMs = Math.max(0, this.lastRefill - Date.now())
    const msPerToken = 1000 / this.refillRate
    this.refillTimer = setTimeout(() => {
      this.refillTimer = null
      this.refill()
      this.drainWaiters()

      if (this.waitQueue.length > 0) {
        this.scheduleRefillDrain()
      }
    }, penaltyMs + msPerToken)
  }

  /**
   * Drain the bucket after a 429 and freeze refills for `seconds`
   */
  penalize(seconds: number): void {
    this.tokens = 0
    this.lastRefill = Date.now() + seconds * 1000
  }

  get availableTokens(): number {
    this.refill()
    return Math.floor(this.tokens)
  }

  get pendingCount(): number {
    return this.waitQueue.length
  }
}

/**
 * Extract a Retry-After delay (ms) from a rate-limited SDK error.
 *
 * Returns null for anything that is not a 429. A 429 without a parseable
 * header falls back to DEFAULT_RETRY_AFTER_MS.
 */
export function extractRetryAfterMs(error: unknown): number | null {
  if (readStatus(error) !== 429) return null

  const headerValue = getRetryAfterHeader(error)
  if (headerValue === null) return DEFAULT_RETRY_AFTER_MS

  const seconds = parseInt(headerValue, 10)
  if (Number.isNaN(seconds) || seconds <= 0) return DEFAULT_RETRY_AFTER_MS

  return seconds * 1000
}

function readHeader(headers: unknown): string | null {
  if (typeof headers !== 'object' || headers === null) return null

  // Headers, Map, or anything else exposing get()
  const get: unknown = Reflect.get(headers, 'get')
  const value: unknown =
    typeof get === 'function'
      ? Reflect.apply(get, headers, ['retry-after'])
      : Reflect.get(headers, 'retry-after')
  return typeof value === 'string' && value ? value : null
}

function getRetryAfterHeader(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null

  const response: unknown = Reflect.get(error, 'response')
  if (typeof response === 'object' && response !== null) {
    const fromResponse = readHeader(Reflect.get(response, 'headers'))
    if (fromResponse) return fromResponse
  }

  return readHeader(Reflect.get(error, 'headers'))
}
