/**
 * In-memory tracker
 *
 * Single-process TrackerClient. Every method does its reads and writes
 * without yielding in between, so compareAndSetStatus is atomic with
 * respect to concurrent callers in the same event loop.
 */

import type {
  CompareAndSetResult,
  Issue,
  IssueStatus,
  ListIssuesFilter,
  MergeRequestInput,
  MergeRequestResult,
  TrackerClient,
  TrackerComment,
} from './types.js'
import { TrackerNotFoundError } from './errors.js'
import { createIssue, type IssueInit } from './issue.js'

type TrackerMethod = keyof TrackerClient

export interface InMemoryTrackerOptions {
  /** Clock used for comment timestamps */
  now?: () => Date
  defaultRepo?: string
}

export class InMemoryTrackerClient implements TrackerClient {
  private readonly issues = new Map<string, Issue>()
  private readonly comments = new Map<string, TrackerComment[]>()
  private readonly commentIssue = new Map<string, string>()
  private readonly failures = new Map<TrackerMethod, Error[]>()
  private readonly now: () => Date
  private readonly defaultRepo: string
  private commentSeq = 0
  private mergeRequestSeq = 0

  /** Merge requests opened so far, in order */
  readonly mergeRequests: Array<MergeRequestInput & MergeRequestResult> = []

  constructor(options: InMemoryTrackerOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.defaultRepo = options.defaultRepo ?? 'default'
  }

  // -------------------------------------------------------------------------
  // Test and embedding helpers
  // -------------------------------------------------------------------------

  seed(...inits: IssueInit[]): this {
    for (const init of inits) {
      this.issues.set(init.id, createIssue(init, this.defaultRepo))
      if (!this.comments.has(init.id)) this.comments.set(init.id, [])
    }
    return this
  }

  /** Current stored copy of an issue */
  peek(id: string): Issue {
    return this.require(id)
  }

  /**
   * Queue an error to be thrown by the next call to `method`
   */
  failNext(method: TrackerMethod, error: Error): void {
    const queue = this.failures.get(method) ?? []
    queue.push(error)
    this.failures.set(method, queue)
  }

  private maybeFail(method: TrackerMethod): void {
    const error = this.failures.get(method)?.shift()
    if (error) throw error
  }

  private require(id: string): Issue {
    const issue = this.issues.get(id)
    if (!issue) {
      throw new TrackerNotFoundError(`Issue not found: ${id}`, 'issue', id)
    }
    return issue
  }

  private replace(id: string, patch: Partial<Issue>): void {
    this.issues.set(id, { ...this.require(id), ...patch })
  }

  private relabel(id: string, labels: Set<string>): void {
    const issue = this.require(id)
    this.issues.set(
      id,
      createIssue(
        {
          ...issue,
          labels,
          repo: issue.repo,
        },
        this.defaultRepo
      )
    )
  }

  // -------------------------------------------------------------------------
  // TrackerClient
  // -------------------------------------------------------------------------

  async listIssues(filter: ListIssuesFilter): Promise<Issue[]> {
    this.maybeFail('listIssues')
    const required = filter.labels ?? []
    return [...this.issues.values()].filter(
      (issue) =>
        filter.statuses.includes(issue.status) &&
        required.every((label) => issue.labels.has(label))
    )
  }

  async getIssue(id: string): Promise<Issue | null> {
    this.maybeFail('getIssue')
    return this.issues.get(id) ?? null
  }

  async getBlockingIds(id: string): Promise<string[]> {
    this.maybeFail('getBlockingIds')
    return [...this.require(id).blockingIds]
  }

  async compareAndSetStatus(
    id: string,
    expected: readonly IssueStatus[],
    next: IssueStatus
  ): Promise<CompareAndSetResult> {
    this.maybeFail('compareAndSetStatus')
    const issue = this.require(id)
    if (!expected.includes(issue.status)) {
      return { applied: false, current: issue.status }
    }
    this.replace(id, { status: next })
    return { applied: true, current: next }
  }

  async setStatus(id: string, status: IssueStatus): Promise<void> {
    this.maybeFail('setStatus')
    this.replace(id, { status })
  }

  async listComments(id: string): Promise<TrackerComment[]> {
    this.maybeFail('listComments')
    this.require(id)
    return (this.comments.get(id) ?? []).map((comment) => ({ ...comment }))
  }

  async postComment(id: string, body: string): Promise<TrackerComment> {
    this.maybeFail('postComment')
    this.require(id)
    const comment: TrackerComment = {
      id: `comment-${++this.commentSeq}`,
      body,
      createdAt: this.now(),
      author: null,
    }
    const thread = this.comments.get(id) ?? []
    thread.push(comment)
    this.comments.set(id, thread)
    this.commentIssue.set(comment.id, id)
    return { ...comment }
  }

  /**
   * Post a comment as a named human author
   */
  async postHumanComment(id: string, body: string, author: string): Promise<TrackerComment> {
    const comment = await this.postComment(id, body)
    const thread = this.comments.get(id) ?? []
    const stored = thread.find((c) => c.id === comment.id)
    if (stored) stored.author = author
    return { ...comment, author }
  }

  async updateComment(commentId: string, body: string): Promise<void> {
    this.maybeFail('updateComment')
    const issueId = this.commentIssue.get(commentId)
    const stored = issueId ? this.comments.get(issueId)?.find((c) => c.id === commentId) : undefined
    if (!stored) {
      throw new TrackerNotFoundError(`Comment not found: ${commentId}`, 'comment', commentId)
    }
    stored.body = body
  }

  async assign(id: string, userRef: string): Promise<void> {
    this.maybeFail('assign')
    this.replace(id, { assignee: userRef })
  }

  async unassign(id: string): Promise<void> {
    this.maybeFail('unassign')
    this.replace(id, { assignee: null })
  }

  async addLabels(id: string, names: readonly string[]): Promise<void> {
    this.maybeFail('addLabels')
    this.relabel(id, new Set([...this.require(id).labels, ...names]))
  }

  async removeLabels(id: string, names: readonly string[]): Promise<void> {
    this.maybeFail('removeLabels')
    const labels = new Set(this.require(id).labels)
    for (const name of names) labels.delete(name)
    this.relabel(id, labels)
  }

  async openMergeRequest(input: MergeRequestInput): Promise<MergeRequestResult> {
    this.maybeFail('openMergeRequest')
    this.require(input.issueId)
    const url = `https://example.test/${input.repo}/pull/${++this.mergeRequestSeq}`
    this.mergeRequests.push({ ...input, url })
    return { url }
  }
}
