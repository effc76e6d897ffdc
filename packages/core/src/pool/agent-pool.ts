/**
 * Agent Pool
 *
 * Keeps up to `maxConcurrency` issue lifecycles running at once, each on a
 * different issue. Candidates are re-selected whenever a slot frees up, so
 * an issue whose blockers finish during a drain is picked up in the same
 * run.
 */

import { matchesTarget, type ExecutionTarget, type Issue, type TrackerClient } from '@drover/linear'
import { pendingAnswer } from '../claims/claim-manager.js'
import type { DependencyResolver } from '../dependencies/dependency-resolver.js'
import { DroverError, errorMessage, isDependencyCycleError } from '../errors.js'
import { sleepUnlessAborted, type IssueLifecycle } from '../lifecycle/issue-lifecycle.js'
import type { LifecycleOutcomeKind, LifecycleResult } from '../lifecycle/types.js'
import { createLogger, type Logger } from '../logger.js'
import { sessionNameFor } from '../session/session-controller.js'

export type PoolMode = 'drain' | 'continuous'

export interface PoolRunOptions {
  maxConcurrency: number
  target: ExecutionTarget | 'any'
  mode: PoolMode
  /** Start at most this many lifecycles in total */
  limit?: number
}

export interface PoolCandidate {
  issue: Issue
  /** InProgress takeover or answered Blocked issue */
  resume: boolean
}

export interface PoolRunSummary {
  started: number
  outcomes: Record<LifecycleOutcomeKind, number>
  results: LifecycleResult[]
  errors: Array<{ issueId: string; error: string }>
}

export interface ActiveLifecycle {
  issueId: string
  identifier: string
  resume: boolean
  startedAt: Date
}

export interface PoolStatus {
  running: boolean
  maxConcurrency: number
  active: ActiveLifecycle[]
  completed: number
  blocked: number
  failed: number
}

export interface AgentPoolDeps {
  tracker: TrackerClient
  lifecycle: Pick<IssueLifecycle, 'run'>
  resolver: Pick<DependencyResolver, 'selectEligible'>
  /** Used to skip InProgress issues whose session is already running here */
  sessions: { isAlive(name: string): Promise<boolean> }
  agentLabel?: string
  pollIntervalMs: number
  logger?: Logger
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  now?: () => Date
}

function emptyOutcomes(): Record<LifecycleOutcomeKind, number> {
  return { done: 0, blocked: 0, failed: 0, contended: 0, cancelled: 0, skipped: 0 }
}

export class AgentPool {
  private readonly log: Logger
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly now: () => Date
  private readonly active = new Map<string, ActiveLifecycle>()
  private controller: AbortController | null = null
  private maxConcurrency = 0
  private summary: PoolRunSummary = { started: 0, outcomes: emptyOutcomes(), results: [], errors: [] }

  constructor(private readonly deps: AgentPoolDeps) {
    this.log = deps.logger ?? createLogger()
    this.sleep = deps.sleep ?? sleepUnlessAborted
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Issues that could be started now, Ready ones first. Nothing is claimed.
   *
   * @throws {DependencyCycleError} when a candidate's blockers form a cycle
   */
  async candidates(target: ExecutionTarget | 'any', exclude: ReadonlySet<string> = new Set()): Promise<PoolCandidate[]> {
    const { tracker, agentLabel } = this.deps
    const labels = agentLabel ? [agentLabel] : undefined
    const wanted = (issue: Issue): boolean => !exclude.has(issue.id) && matchesTarget(issue, target)

    const ready = (await tracker.listIssues({ statuses: ['Ready'], labels })).filter(wanted)
    const eligible = await this.deps.resolver.selectEligible(ready)
    const selected: PoolCandidate[] = eligible.map((issue) => ({ issue, resume: false }))

    const resumable = (await tracker.listIssues({ statuses: ['InProgress', 'Blocked'], labels })).filter(wanted)
    for (const issue of resumable) {
      if (issue.status === 'InProgress') {
        if (await this.deps.sessions.isAlive(sessionNameFor(issue))) continue
      } else if (!pendingAnswer(await tracker.listComments(issue.id))) {
        continue
      }
      selected.push({ issue, resume: true })
    }
    return selected
  }

  /**
   * Run lifecycles until drained, `limit` is reached or `stop()` is called.
   *
   * @throws {DependencyCycleError} after cancelling every running lifecycle
   */
  async run(options: PoolRunOptions): Promise<PoolRunSummary> {
    if (this.controller) {
      throw new DroverError('Agent pool is already running', 'POOL_RUNNING')
    }
    const controller = new AbortController()
    this.controller = controller
    this.maxConcurrency = options.maxConcurrency
    this.summary = { started: 0, outcomes: emptyOutcomes(), results: [], errors: [] }

    const inFlight = new Map<string, Promise<void>>()
    const attempted = new Set<string>()
    const { signal } = controller

    this.log.section(`Agent pool: ${options.mode}, up to ${options.maxConcurrency} at once, target ${options.target}`)

    try {
      while (!signal.aborted) {
        const remaining = options.limit === undefined ? Infinity : options.limit - this.summary.started
        const room = Math.min(options.maxConcurrency - inFlight.size, remaining)

        let launched = 0
        if (room > 0) {
          for (const candidate of await this.nextCandidates(options, attempted, inFlight)) {
            if (launched >= room) break
            attempted.add(candidate.issue.id)
            inFlight.set(candidate.issue.id, this.launch(candidate, signal, inFlight))
            launched++
          }
        }

        if (inFlight.size === 0) {
          const exhausted = options.limit !== undefined && this.summary.started >= options.limit
          if (options.mode === 'drain' || exhausted) break
          // Give contended and skipped issues another chance on the next poll
          this.forgetRetryable(attempted)
          await this.sleep(this.deps.pollIntervalMs, signal)
          continue
        }

        if (options.mode === 'continuous') {
          await Promise.race([...inFlight.values(), this.sleep(this.deps.pollIntervalMs, signal)])
        } else {
          await Promise.race(inFlight.values())
        }
      }
      await Promise.all(inFlight.values())
    } catch (error) {
      controller.abort()
      await Promise.allSettled(inFlight.values())
      throw error
    } finally {
      this.controller = null
    }

    const { outcomes } = this.summary
    this.log.success('Agent pool finished', {
      started: this.summary.started,
      done: outcomes.done,
      blocked: outcomes.blocked,
      failed: outcomes.failed,
    })
    return this.summary
  }

  /**
   * Abort every running lifecycle; each stops its session and gives its
   * claim back. `run()` resolves once they have all finished.
   */
  stop(): void {
    if (!this.controller) return
    this.log.warn('Stopping agent pool', { active: this.active.size })
    this.controller.abort()
  }

  getStatus(): PoolStatus {
    const { outcomes } = this.summary
    return {
      running: this.controller !== null,
      maxConcurrency: this.maxConcurrency,
      active: [...this.active.values()],
      completed: outcomes.done,
      blocked: outcomes.blocked,
      failed: outcomes.failed,
    }
  }

  private async nextCandidates(
    options: PoolRunOptions,
    attempted: ReadonlySet<string>,
    inFlight: ReadonlyMap<string, Promise<void>>
  ): Promise<PoolCandidate[]> {
    const exclude = new Set([...attempted, ...inFlight.keys()])
    try {
      return await this.candidates(options.target, exclude)
    } catch (error) {
      if (isDependencyCycleError(error)) {
        this.log.error('Dependency cycle; stopping selection', { cycle: error.cycle.join(' -> ') })
        throw error
      }
      this.log.error('Candidate selection failed', { error: errorMessage(error) })
      this.summary.errors.push({ issueId: 'selection', error: errorMessage(error) })
      return []
    }
  }

  private launch(candidate: PoolCandidate, signal: AbortSignal, inFlight: Map<string, Promise<void>>): Promise<void> {
    const { issue, resume } = candidate
    this.summary.started++
    this.active.set(issue.id, { issueId: issue.id, identifier: issue.identifier, resume, startedAt: this.now() })
    this.log.status('selected', `${issue.identifier}${resume ? ' (resume)' : ''}: ${issue.title}`)

    return this.deps.lifecycle
      .run({ issue, resume, signal })
      .then((result) => {
        this.summary.results.push(result)
        this.summary.outcomes[result.outcome.kind]++
      })
      .catch((error: unknown) => {
        this.log.error('Lifecycle crashed', { issue: issue.identifier, error: errorMessage(error) })
        this.summary.errors.push({ issueId: issue.id, error: errorMessage(error) })
      })
      .finally(() => {
        this.active.delete(issue.id)
        inFlight.delete(issue.id)
      })
  }

  private forgetRetryable(attempted: Set<string>): void {
    for (const result of this.summary.results) {
      if (result.outcome.kind === 'contended' || result.outcome.kind === 'skipped') {
        attempted.delete(result.issue.id)
      }
    }
  }
}
