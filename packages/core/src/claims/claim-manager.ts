/**
 * Claim Manager
 *
 * Exclusive ownership of an issue by one worker. The tracker is the only
 * shared state: a conditional status write admits a claimant, and a claim
 * comment carrying a machine marker settles any race the tracker's
 * read-then-write cannot rule out. Among live markers the earliest wins.
 */

import { hostname } from 'os'
import type { Issue, IssueStatus, TrackerClient, TrackerComment } from '@drover/linear'
import { latestExchange, type Answer } from '../protocol/comments.js'
import {
  formatClaimComment,
  formatReleaseComment,
  liveClaims,
  parseReleaseMarker,
  replaceClaimMarker,
  withdrawClaimComment,
  type ClaimEntry,
  type ClaimMarker,
} from '../protocol/markers.js'
import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../logger.js'

export interface ClaimRecord {
  kind: 'claimed'
  issueId: string
  identifier: string
  ownerId: string
  host: string
  claimedAt: Date
  heartbeatAt: Date
  commentId: string
  /** Body of the claim comment, rewritten on heartbeat */
  commentBody: string
  workspacePath: string
  /** True when an InProgress or Blocked issue was taken over */
  resumed: boolean
  /** ANSWER that unblocked the issue, when resumed from Blocked */
  answer: Answer | null
}

export type AlreadyClaimedReason =
  | 'status_changed'
  | 'lost_arbitration'
  | 'claimed_elsewhere'
  | 'not_resumable'

export interface AlreadyClaimed {
  kind: 'already_claimed'
  issueId: string
  reason: AlreadyClaimedReason
  /** Status observed when the claim was refused */
  current: IssueStatus | null
}

export type ClaimResult = ClaimRecord | AlreadyClaimed

export type ReleaseOutcome = 'done' | 'in_review' | 'blocked' | 'failed'

export interface ReleaseResult {
  /** False when someone else moved the issue first */
  applied: boolean
  current: IssueStatus | null
  /** Steps after the status write that failed */
  problems: string[]
}

export const RELEASE_STATUS: Record<ReleaseOutcome, IssueStatus> = {
  done: 'Done',
  in_review: 'InReview',
  blocked: 'Blocked',
  failed: 'Blocked',
}

export interface ClaimPlacement {
  workspacePath: string
  branch: string
}

export interface ClaimManagerOptions {
  /** Stable identity of this worker */
  ownerId?: string
  host?: string
  /** Label required for pickup; removed when the issue goes to a human */
  agentLabel?: string
  /** User id or email that Blocked and Failed issues are assigned to */
  reviewer?: string
  heartbeatIntervalMs: number
  /** A foreign claim whose heartbeat is older than this can be taken over */
  claimStaleAfterMs: number
  now?: () => Date
  logger?: Logger
}

export function defaultOwnerId(): string {
  return `${hostname()}-${process.pid}`
}

export function isClaimed(result: ClaimResult): result is ClaimRecord {
  return result.kind === 'claimed'
}

/**
 * The latest answer to the latest BLOCKED question, unless a release was
 * posted after it (a resumed run already consumed it)
 */
export function pendingAnswer(comments: readonly TrackerComment[]): Answer | null {
  const { answer } = latestExchange(comments)
  if (!answer) return null
  let answerIndex = -1
  let lastRelease = -1
  comments.forEach((comment, index) => {
    if (comment.id === answer.commentId) answerIndex = index
    if (parseReleaseMarker(comment.body)) lastRelease = index
  })
  return answerIndex > lastRelease ? answer : null
}

export class ClaimManager {
  private readonly ownerId: string
  private readonly host: string
  private readonly now: () => Date
  private readonly log: Logger

  constructor(
    private readonly tracker: TrackerClient,
    private readonly options: ClaimManagerOptions
  ) {
    this.ownerId = options.ownerId ?? defaultOwnerId()
    this.host = options.host ?? hostname()
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? createLogger({ workerId: this.ownerId })
  }

  get owner(): string {
    return this.ownerId
  }

  /**
   * Claim a Ready issue. A rejected conditional write is never retried.
   */
  async claim(issue: Issue, placement: ClaimPlacement): Promise<ClaimResult> {
    const fresh = await this.tracker.getIssue(issue.id)
    if (!fresh || fresh.status !== 'Ready') {
      return this.refuse(issue.id, 'status_changed', fresh?.status ?? null)
    }

    const cas = await this.tracker.compareAndSetStatus(issue.id, ['Ready'], 'InProgress')
    if (!cas.applied) {
      return this.refuse(issue.id, 'status_changed', cas.current)
    }

    return this.postAndArbitrate(fresh, placement, false, null)
  }

  /**
   * Take over an InProgress issue whose owner went quiet, or a Blocked issue
   * that has been answered
   */
  async resume(issue: Issue, placement: ClaimPlacement): Promise<ClaimResult> {
    const fresh = await this.tracker.getIssue(issue.id)
    if (!fresh) {
      return this.refuse(issue.id, 'status_changed', null)
    }

    if (fresh.status === 'InProgress') {
      const comments = await this.tracker.listComments(fresh.id)
      const foreign = liveClaims(comments).find(
        (entry) => entry.marker.owner !== this.ownerId && this.isFresh(entry)
      )
      if (foreign) {
        return this.refuse(fresh.id, 'claimed_elsewhere', fresh.status)
      }
      const cas = await this.tracker.compareAndSetStatus(fresh.id, ['InProgress'], 'InProgress')
      if (!cas.applied) {
        return this.refuse(fresh.id, 'status_changed', cas.current)
      }
      return this.postAndArbitrate(fresh, placement, true, null)
    }

    if (fresh.status === 'Blocked') {
      if (this.options.agentLabel && !fresh.labels.has(this.options.agentLabel)) {
        return this.refuse(fresh.id, 'not_resumable', fresh.status)
      }
      const answer = pendingAnswer(await this.tracker.listComments(fresh.id))
      if (!answer) {
        return this.refuse(fresh.id, 'not_resumable', fresh.status)
      }
      const cas = await this.tracker.compareAndSetStatus(fresh.id, ['Blocked'], 'InProgress')
      if (!cas.applied) {
        return this.refuse(fresh.id, 'status_changed', cas.current)
      }
      return this.postAndArbitrate(fresh, placement, true, answer)
    }

    return this.refuse(fresh.id, 'not_resumable', fresh.status)
  }

  /**
   * Refresh the heartbeat in the claim marker. Calls inside the heartbeat
   * interval return the record unchanged.
   */
  async heartbeat(claim: ClaimRecord): Promise<ClaimRecord> {
    const now = this.now()
    if (now.getTime() - claim.heartbeatAt.getTime() < this.options.heartbeatIntervalMs) {
      return claim
    }
    const body = replaceClaimMarker(claim.commentBody, this.markerFor(claim, now))
    await this.tracker.updateComment(claim.commentId, body)
    return { ...claim, heartbeatAt: now, commentBody: body }
  }

  /**
   * Move the issue to the outcome's status and post the closing comment.
   * Blocked and failed issues are handed to the reviewer.
   *
   * Only the status write can throw. Once it has been attempted the release
   * has happened, so a failing comment or hand-off is logged and reported in
   * `problems` instead.
   */
  async release(claim: ClaimRecord, outcome: ReleaseOutcome, message: string): Promise<ReleaseResult> {
    const next = RELEASE_STATUS[outcome]
    const cas = await this.tracker.compareAndSetStatus(claim.issueId, ['InProgress'], next)
    if (!cas.applied) {
      this.log.warn('Issue left InProgress before release; status not changed', {
        issue: claim.identifier,
        current: cas.current ?? 'missing',
        wanted: next,
      })
    }

    const problems: string[] = []
    const attempt = async (step: string, action: () => Promise<unknown>): Promise<void> => {
      try {
        await action()
      } catch (error) {
        this.log.error(`Release incomplete: could not ${step}`, { issue: claim.identifier, error: errorMessage(error) })
        problems.push(`${step}: ${errorMessage(error)}`)
      }
    }

    await attempt('post release comment', () =>
      this.tracker.postComment(
        claim.issueId,
        formatReleaseComment({ owner: this.ownerId, outcome, releasedAt: this.now().toISOString() }, message)
      )
    )
    if (outcome === 'blocked' || outcome === 'failed') {
      await attempt('hand issue to reviewer', () => this.handToHuman(claim.issueId))
    }

    return { applied: cas.applied, current: cas.current, problems }
  }

  /**
   * Give up a claim without an outcome, returning the issue to Ready
   */
  async unclaim(claim: ClaimRecord, reason: string): Promise<void> {
    const cas = await this.tracker.compareAndSetStatus(claim.issueId, ['InProgress'], 'Ready')
    if (!cas.applied) {
      this.log.warn('Issue left InProgress before unclaim', {
        issue: claim.identifier,
        current: cas.current ?? 'missing',
      })
    }
    await this.tracker.postComment(
      claim.issueId,
      formatReleaseComment(
        { owner: this.ownerId, outcome: 'cancelled', releasedAt: this.now().toISOString() },
        `Claim released: ${reason}`
      )
    )
  }

  private async handToHuman(issueId: string): Promise<void> {
    if (this.options.reviewer) {
      await this.tracker.assign(issueId, this.options.reviewer)
    }
    if (this.options.agentLabel) {
      await this.tracker.removeLabels(issueId, [this.options.agentLabel])
    }
  }

  private async postAndArbitrate(
    issue: Issue,
    placement: ClaimPlacement,
    resumed: boolean,
    answer: Answer | null
  ): Promise<ClaimResult> {
    const claimedAt = this.now()
    const marker: ClaimMarker = {
      owner: this.ownerId,
      host: this.host,
      workspace: placement.workspacePath,
      startedAt: claimedAt.toISOString(),
      heartbeatAt: claimedAt.toISOString(),
    }
    const body = formatClaimComment(marker, {
      identifier: issue.identifier,
      repo: issue.repo,
      branch: placement.branch,
    })
    const posted = await this.tracker.postComment(issue.id, body)

    const contenders = liveClaims(await this.tracker.listComments(issue.id)).filter(
      (entry) =>
        entry.commentId === posted.id ||
        (entry.marker.owner !== this.ownerId && this.isFresh(entry))
    )
    const winner = contenders.reduce<ClaimEntry | null>(
      (best, entry) => (best === null || entry.createdAt.getTime() < best.createdAt.getTime() ? entry : best),
      null
    )

    if (winner && winner.commentId !== posted.id) {
      this.log.info('Lost claim arbitration', { issue: issue.identifier, winner: winner.marker.owner })
      await this.tracker.updateComment(posted.id, withdrawClaimComment(body))
      return this.refuse(issue.id, 'lost_arbitration', 'InProgress')
    }

    return {
      kind: 'claimed',
      issueId: issue.id,
      identifier: issue.identifier,
      ownerId: this.ownerId,
      host: this.host,
      claimedAt,
      heartbeatAt: claimedAt,
      commentId: posted.id,
      commentBody: body,
      workspacePath: placement.workspacePath,
      resumed,
      answer,
    }
  }

  private isFresh(entry: ClaimEntry): boolean {
    const heartbeat = Date.parse(entry.marker.heartbeatAt)
    return this.now().getTime() - heartbeat <= this.options.claimStaleAfterMs
  }

  private markerFor(claim: ClaimRecord, heartbeatAt: Date): ClaimMarker {
    return {
      owner: claim.ownerId,
      host: claim.host,
      workspace: claim.workspacePath,
      startedAt: claim.claimedAt.toISOString(),
      heartbeatAt: heartbeatAt.toISOString(),
    }
  }

  private refuse(issueId: string, reason: AlreadyClaimedReason, current: IssueStatus | null): AlreadyClaimed {
    return { kind: 'already_claimed', issueId, reason, current }
  }
}
