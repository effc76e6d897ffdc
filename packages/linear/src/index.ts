// Types
export type {
  Issue,
  IssueStatus,
  ExecutionTarget,
  Difficulty,
  TrackerComment,
  ListIssuesFilter,
  CompareAndSetResult,
  MergeRequestInput,
  MergeRequestResult,
  TrackerClient,
  StatusNameMap,
  RetryConfig,
  RateLimiterStrategy,
} from './types.js'
export { ISSUE_STATUSES, DEFAULT_STATUS_NAMES } from './types.js'

// Errors
export {
  TrackerError,
  TrackerApiError,
  TrackerRetryExhaustedError,
  TrackerNotFoundError,
  TrackerResponseError,
  MergeRequestError,
  isTrackerError,
  isRetryableError,
  isTransientTrackerError,
} from './errors.js'

// Retry and rate limiting
export { retryTrackerCall, backoffDelay, DEFAULT_RETRY_CONFIG } from './retry.js'
export type { TrackerBackoff, TrackerRetryPolicy } from './retry.js'
export {
  TokenBucket,
  extractRetryAfterMs,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_RETRY_AFTER_MS,
} from './rate-limiter.js'
export type { TokenBucketConfig } from './rate-limiter.js'

// Issue ingestion
export {
  createIssue,
  parseTarget,
  parseDifficulty,
  parseRepo,
  statusFromStateName,
  isIssueStatus,
  matchesTarget,
  TARGET_LABEL_PREFIX,
  DIFFICULTY_LABEL_PREFIX,
  REPO_LABEL_PREFIX,
} from './issue.js'
export type { IssueInit } from './issue.js'

// Clients
export { LinearTrackerClient } from './linear-tracker-client.js'
export type { LinearTrackerClientConfig, TrackerLogger } from './linear-tracker-client.js'
export { InMemoryTrackerClient } from './in-memory-tracker-client.js'
export type { InMemoryTrackerOptions } from './in-memory-tracker-client.js'

// Merge requests
export {
  createGhMergeRequestOpener,
  findMergeRequestUrl,
  execCommand,
} from './merge-request.js'
export type { CommandExecutor, CommandOutput, MergeRequestOpener } from './merge-request.js'
