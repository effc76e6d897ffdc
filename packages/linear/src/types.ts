/**
 * Tracker domain types
 *
 * The orchestrator never sees raw tracker payloads. Everything crossing the
 * tracker boundary is validated once and mapped onto these types.
 */

// ---------------------------------------------------------------------------
// Issue model
// ---------------------------------------------------------------------------

export const ISSUE_STATUSES = ['Backlog', 'Ready', 'InProgress', 'Blocked', 'InReview', 'Done'] as const

/**
 * Closed set of workflow states the orchestrator reasons about
 */
export type IssueStatus = (typeof ISSUE_STATUSES)[number]

export type ExecutionTarget = 'local' | 'remote'

export type Difficulty = 'easy' | 'medium' | 'hard'

export interface Issue {
  id: string
  /** Human-readable key, e.g. "ENG-42" */
  identifier: string
  /** Source repository name the work belongs to */
  repo: string
  title: string
  body: string
  status: IssueStatus
  labels: ReadonlySet<string>
  /** Assignee user id, null when unassigned */
  assignee: string | null
  /** Ids of issues that block this one */
  blockingIds: ReadonlySet<string>
  url: string
  /** Derived from `agent:local` / `agent:remote` labels; null when untagged */
  target: ExecutionTarget | null
  /** Derived from `difficulty:*` labels; null when untagged */
  difficulty: Difficulty | null
}

export interface TrackerComment {
  id: string
  body: string
  createdAt: Date
  /** Display name or email of the author; null for integrations */
  author: string | null
}

// ---------------------------------------------------------------------------
// Client contract
// ---------------------------------------------------------------------------

export interface ListIssuesFilter {
  statuses: readonly IssueStatus[]
  /** Every label listed must be present on the issue */
  labels?: readonly string[]
}

export interface CompareAndSetResult {
  applied: boolean
  /** Status observed when the write was attempted (the new status when applied) */
  current: IssueStatus | null
}

export interface MergeRequestInput {
  issueId: string
  repo: string
  branch: string
  baseBranch: string
  title: string
  body: string
  /** Workspace directory the request is opened from */
  cwd: string
}

export interface MergeRequestResult {
  url: string
}

/**
 * Typed CRUD over the external issue tracker.
 *
 * Implementations retry transient faults internally; an error escaping a
 * method has already exhausted its retry budget.
 */
export interface TrackerClient {
  listIssues(filter: ListIssuesFilter): Promise<Issue[]>
  /** Returns null when the issue does not exist */
  getIssue(id: string): Promise<Issue | null>
  getBlockingIds(id: string): Promise<string[]>

  /**
   * Write `next` only if the current status is one of `expected`.
   * Never retried blindly: the current status is re-read on every attempt.
   */
  compareAndSetStatus(
    id: string,
    expected: readonly IssueStatus[],
    next: IssueStatus
  ): Promise<CompareAndSetResult>
  setStatus(id: string, status: IssueStatus): Promise<void>

  /** Comments in creation order, oldest first */
  listComments(id: string): Promise<TrackerComment[]>
  postComment(id: string, body: string): Promise<TrackerComment>
  updateComment(commentId: string, body: string): Promise<void>

  /** `userRef` is a user id or email */
  assign(id: string, userRef: string): Promise<void>
  unassign(id: string): Promise<void>
  addLabels(id: string, names: readonly string[]): Promise<void>
  removeLabels(id: string, names: readonly string[]): Promise<void>

  openMergeRequest(input: MergeRequestInput): Promise<MergeRequestResult>
}

// ---------------------------------------------------------------------------
// Linear client configuration
// ---------------------------------------------------------------------------

/**
 * Maps each orchestrator status onto the workflow state name used by the
 * tracker team
 */
export type StatusNameMap = Record<IssueStatus, string>

export const DEFAULT_STATUS_NAMES: StatusNameMap = {
  Backlog: 'Backlog',
  Ready: 'Ready',
  InProgress: 'In Progress',
  Blocked: 'Blocked',
  InReview: 'In Review',
  Done: 'Done',
}

export interface RetryConfig {
  maxRetries?: number
  initialDelayMs?: number
  backoffMultiplier?: number
  maxDelayMs?: number
  retryableStatusCodes?: number[]
}

/**
 * Rate limiter contract. TokenBucket is the in-process implementation.
 */
export interface RateLimiterStrategy {
  acquire(): Promise<void>
  penalize(seconds: number): void
}
