/**
 * Issue Lifecycle
 *
 * Drives one issue through
 *
 *   claiming -> preparing -> running <-> nudging -> evaluating
 *            -> blocked | completing | failed -> terminal
 *
 * with `contended` when another worker owns the issue and `cancelled` when
 * the run is aborted. Once a claim is held, the run always ends in exactly
 * one release (or an unclaim on cancellation).
 */

import type { Issue, TrackerClient } from '@drover/linear'
import {
  isClaimed,
  type ClaimManager,
  type ClaimRecord,
  type ClaimResult,
  type ReleaseOutcome,
} from '../claims/claim-manager.js'
import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../logger.js'
import { blockedSince, formatBlockedComment } from '../protocol/comments.js'
import { decideLiveness, type LivenessPolicy } from '../session/liveness.js'
import type { Session, SessionController } from '../session/session-controller.js'
import { markerOutcome, type CompletionMarker } from '../workspace/completion-marker.js'
import type { TerminalState, Workspace, WorkspaceManager } from '../workspace/workspace-manager.js'
import { sessionOutputEntry, type ArtifactLog } from './artifact-log.js'
import { buildTaskInstruction } from './instructions.js'
import type {
  LifecycleEvents,
  LifecycleOutcome,
  LifecyclePhase,
  LifecycleResult,
  LifecycleRun,
} from './types.js'

export interface LifecycleSettings {
  pollIntervalMs: number
  liveness: LivenessPolicy
  /** `{identifier}` and `{title}` are substituted */
  nudgeMessage: string
  completeStatus: 'Done' | 'InReview'
  openMergeRequest: boolean
}

export interface IssueLifecycleDeps {
  tracker: TrackerClient
  claims: ClaimManager
  workspaces: WorkspaceManager
  sessions: SessionController
  settings: LifecycleSettings
  events?: LifecycleEvents
  /** Per-issue JSONL history of transitions, session output and outcomes */
  artifacts?: ArtifactLog
  logger?: Logger
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  now?: () => Date
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
export function sleepUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const done = (): void => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}

export function renderNudgeMessage(template: string, issue: Pick<Issue, 'identifier' | 'title'>): string {
  return template.replace(/\{identifier\}/g, issue.identifier).replace(/\{title\}/g, issue.title)
}

type Supervision =
  | { kind: 'completed'; marker: CompletionMarker; session: Session }
  | { kind: 'blocked'; questions: string[]; commented: boolean; session: Session }
  | { kind: 'failed'; reason: string; session: Session }
  | { kind: 'cancelled'; session: Session }

const MAX_LISTED_ITEMS = 20

function bulletList(items: readonly string[]): string[] {
  if (items.length === 0) return ['- (none)']
  const shown = items.slice(0, MAX_LISTED_ITEMS).map((item) => `- \`${item}\``)
  if (items.length > MAX_LISTED_ITEMS) shown.push(`- ... and ${items.length - MAX_LISTED_ITEMS} more`)
  return shown
}

export function formatCompletionComment(marker: CompletionMarker, mergeRequestUrl: string | null): string {
  const lines: string[] = ['Work completed.', '', `**Summary:** ${marker.summary.trim() || '(none)'}`, '']
  lines.push('**Files changed:**', ...bulletList(marker.files_changed), '')
  lines.push('**Commands run:**', ...bulletList(marker.commands_run))
  if (mergeRequestUrl) {
    lines.push('', `Pull request: ${mergeRequestUrl}`)
  }
  return lines.join('\n')
}

export function formatFailureComment(reason: string, output: string): string {
  const lines = [`Automated work on this issue failed: ${reason}`, '']
  if (output.trim()) {
    lines.push('Last session output:', '', '```text', output.replace(/```/g, "'''"), '```')
  } else {
    lines.push('No session output was captured.')
  }
  lines.push('', 'Assigned for human review.')
  return lines.join('\n')
}

function mergeRequestBody(issue: Issue, marker: CompletionMarker): string {
  const lines = [marker.summary.trim(), '', `Resolves ${issue.identifier}${issue.url ? ` (${issue.url})` : ''}`, '']
  lines.push('Files changed:', ...bulletList(marker.files_changed), '')
  lines.push('Commands run:', ...bulletList(marker.commands_run))
  return lines.join('\n')
}

export class IssueLifecycle {
  private readonly log: Logger
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly now: () => Date

  constructor(private readonly deps: IssueLifecycleDeps) {
    this.log = deps.logger ?? createLogger()
    this.sleep = deps.sleep ?? sleepUnlessAborted
    this.now = deps.now ?? (() => new Date())
  }

  async run({ issue, resume, signal }: LifecycleRun): Promise<LifecycleResult> {
    const log = this.log.child({ issueIdentifier: issue.identifier })
    const { claims, workspaces, sessions, artifacts } = this.deps
    let phase: LifecyclePhase = 'selecting'

    const transition = (to: LifecyclePhase, detail?: string): void => {
      this.deps.events?.onTransition?.({ issue, from: phase, to, at: this.now(), ...(detail && { detail }) })
      artifacts?.record(issue.identifier, { type: 'transition', from: phase, to, ...(detail && { detail }) })
      phase = to
      log.status(to, detail)
    }
    const finish = (outcome: LifecycleOutcome, claim: ClaimRecord | null): LifecycleResult => {
      this.deps.events?.onOutcome?.(issue, outcome)
      artifacts?.record(issue.identifier, { type: 'outcome', outcome })
      return { issue, outcome, claim }
    }

    // -- Claiming -----------------------------------------------------------
    transition('claiming')
    let result: ClaimResult
    try {
      const placement = await workspaces.placement(issue)
      result = resume ? await claims.resume(issue, placement) : await claims.claim(issue, placement)
    } catch (error) {
      log.warn('Skipping issue after claim error', { error: errorMessage(error) })
      return finish({ kind: 'skipped', reason: errorMessage(error) }, null)
    }
    if (!isClaimed(result)) {
      transition('contended', result.reason)
      return finish({ kind: 'contended' }, null)
    }
    const claim = result

    let workspace: Workspace | null = null
    let session: Session | null = null
    // Set once the claim's status write has happened; the run may not release again
    const settled: { outcome: LifecycleOutcome | null } = { outcome: null }

    const captureOutput = async (target: Session): Promise<string> => {
      const output = await sessions.capture(target)
      artifacts?.record(issue.identifier, sessionOutputEntry(target.name, output))
      return output
    }

    const cancel = async (): Promise<LifecycleResult> => {
      transition('cancelled')
      if (session) {
        try {
          await sessions.stop(session)
        } catch (error) {
          log.warn('Could not stop session', { session: session.name, error: errorMessage(error) })
        }
      }
      try {
        await claims.unclaim(claim, 'orchestrator stopped')
      } catch (error) {
        log.error('Could not give the claim back; it expires once its heartbeat is stale', {
          error: errorMessage(error),
        })
      }
      return finish({ kind: 'cancelled' }, claim)
    }

    const fail = async (reason: string): Promise<LifecycleResult> => {
      transition('failed', reason)
      const output = session ? await captureOutput(session) : ''
      try {
        if (session) await sessions.stop(session)
        await claims.release(claim, 'failed', formatFailureComment(reason, output))
        if (workspace) await workspaces.markTerminal(workspace, 'Failed')
      } catch (error) {
        log.error('Could not record failure on the issue', { error: errorMessage(error) })
      }
      transition('terminal', 'Failed')
      return finish({ kind: 'failed', reason }, claim)
    }

    const settle = async (
      outcome: LifecycleOutcome,
      release: ReleaseOutcome,
      message: string,
      terminal: TerminalState
    ): Promise<LifecycleResult> => {
      const report = await claims.release(claim, release, message)
      settled.outcome = outcome
      if (report.problems.length > 0) {
        log.warn('Issue released with incomplete follow-up', { problems: report.problems })
      }
      if (workspace) {
        try {
          await workspaces.markTerminal(workspace, terminal)
        } catch (error) {
          log.warn('Could not record terminal state in workspace', {
            path: workspace.rootPath,
            error: errorMessage(error),
          })
        }
      }
      transition('terminal', terminal)
      return finish(outcome, claim)
    }

    let supervision: Supervision
    try {
      // -- Preparing --------------------------------------------------------
      transition('preparing')
      const prepared = await workspaces.materialize(issue)
      workspace = prepared
      await workspaces.writeInstructions(prepared, buildTaskInstruction(issue, prepared))
      if (claim.answer) {
        await workspaces.archiveCompletionMarker(prepared)
        await workspaces.appendAnswer(prepared, claim.answer)
      }
      if (signal?.aborted) return await cancel()

      // -- Running ----------------------------------------------------------
      transition('running')
      const runStartedAt = this.now()
      const started = await sessions.start(prepared, issue)
      session = started
      supervision = await this.supervise(issue, started, runStartedAt, claim, signal, transition, log)
      session = supervision.session
    } catch (error) {
      if (signal?.aborted) return await cancel()
      return await fail(errorMessage(error))
    }

    if (supervision.kind === 'cancelled') return await cancel()
    if (supervision.kind === 'failed') return await fail(supervision.reason)

    // -- Evaluating -----------------------------------------------------------
    transition('evaluating')
    const finalSession = supervision.session
    const verdict = supervision.kind === 'completed' ? markerOutcome(supervision.marker) : 'blocked'
    if (supervision.kind === 'completed' && verdict === 'refused') {
      return await fail(`instruction refusal: ${supervision.marker.summary.trim()}`)
    }
    const blocked =
      supervision.kind === 'blocked'
        ? { questions: supervision.questions, commented: supervision.commented }
        : verdict === 'blocked'
          ? { questions: supervision.marker.blocked_questions ?? [], commented: false }
          : null

    try {
      await captureOutput(finalSession)
      await sessions.stop(finalSession)

      if (blocked) {
        transition('blocked')
        const message = blocked.commented
          ? 'Paused until the questions above are answered. Reply with a comment starting with `ANSWER` to resume.'
          : formatBlockedComment(blocked.questions)
        return await settle({ kind: 'blocked', questions: blocked.questions }, 'blocked', message, 'Blocked')
      }

      if (supervision.kind !== 'completed') {
        return await fail('Session ended without an outcome')
      }

      transition('completing')
      const marker = supervision.marker
      let mergeRequestUrl: string | null = null
      if (this.deps.settings.openMergeRequest && workspace) {
        await workspaces.publish(workspace)
        const request = await this.deps.tracker.openMergeRequest({
          issueId: issue.id,
          repo: issue.repo,
          branch: workspace.branchName,
          baseBranch: workspace.baseBranch,
          title: `${issue.identifier}: ${issue.title}`,
          body: mergeRequestBody(issue, marker),
          cwd: workspace.rootPath,
        })
        mergeRequestUrl = request.url
      }

      const status = this.deps.settings.completeStatus
      return await settle(
        { kind: 'done', status, mergeRequestUrl },
        status === 'InReview' ? 'in_review' : 'done',
        formatCompletionComment(marker, mergeRequestUrl),
        status
      )
    } catch (error) {
      if (settled.outcome) {
        log.error('Error after the issue was released', { error: errorMessage(error) })
        return { issue, outcome: settled.outcome, claim }
      }
      return await fail(errorMessage(error))
    }
  }

  private async supervise(
    issue: Issue,
    initial: Session,
    runStartedAt: Date,
    initialClaim: ClaimRecord,
    signal: AbortSignal | undefined,
    transition: (to: LifecyclePhase, detail?: string) => void,
    log: Logger
  ): Promise<Supervision> {
    const { sessions, claims, tracker, settings } = this.deps
    let session = initial
    let claim = initialClaim

    for (;;) {
      if (signal?.aborted) return { kind: 'cancelled', session }

      const poll = await sessions.poll(session)
      session = poll.session
      if (poll.kind === 'completed') {
        return { kind: 'completed', marker: poll.marker, session }
      }

      try {
        claim = await claims.heartbeat(claim)
      } catch (error) {
        log.warn('Heartbeat failed', { error: errorMessage(error) })
      }

      if (poll.kind === 'dead') {
        const question = blockedSince(await tracker.listComments(issue.id), runStartedAt)
        if (question) {
          return { kind: 'blocked', questions: question.questions, commented: true, session }
        }
      }

      const decision = decideLiveness(session, poll.kind === 'dead' ? 'dead' : 'running', this.now(), settings.liveness)
      switch (decision) {
        case 'wait':
          break
        case 'nudge':
          transition('nudging', `nudge ${session.nudgeCount + 1}/${settings.liveness.maxNudges}`)
          session = await sessions.nudge(session, renderNudgeMessage(settings.nudgeMessage, issue))
          this.deps.events?.onNudge?.(issue, session)
          transition('running')
          break
        case 'restart':
          log.status('restarted', poll.kind === 'dead' ? 'session exited without a completion marker' : 'session idle')
          session = await sessions.restart(session)
          this.deps.events?.onRestart?.(issue, session)
          break
        case 'fail': {
          const reason =
            poll.kind === 'dead'
              ? `session exited without a valid completion marker${poll.markerProblem ? ` (${poll.markerProblem})` : ''}`
              : 'session stopped making progress after nudges and restarts'
          return { kind: 'failed', reason, session }
        }
      }

      await this.sleep(settings.pollIntervalMs, signal)
    }
  }
}
