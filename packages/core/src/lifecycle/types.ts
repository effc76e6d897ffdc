/**
 * Lifecycle types
 *
 * One lifecycle drives one issue from claim to a terminal state. Phases are
 * strictly sequential within an issue; every change is reported through
 * LifecycleEvents.
 */

import type { Issue } from '@drover/linear'
import type { ClaimRecord } from '../claims/claim-manager.js'
import type { Session } from '../session/session-controller.js'

export type LifecyclePhase =
  | 'selecting'
  | 'claiming'
  | 'preparing'
  | 'running'
  | 'nudging'
  | 'evaluating'
  | 'blocked'
  | 'completing'
  | 'failed'
  | 'terminal'
  | 'contended'
  | 'cancelled'

/** Where the issue ended up */
export type LifecycleOutcome =
  | { kind: 'done'; status: 'Done' | 'InReview'; mergeRequestUrl: string | null }
  | { kind: 'blocked'; questions: string[] }
  | { kind: 'failed'; reason: string }
  /** Another worker holds the issue */
  | { kind: 'contended' }
  /** Stopped before finishing; the claim was given back */
  | { kind: 'cancelled' }
  /** Not attempted because of a tracker fault during claiming */
  | { kind: 'skipped'; reason: string }

export type LifecycleOutcomeKind = LifecycleOutcome['kind']

export interface LifecycleTransition {
  issue: Issue
  from: LifecyclePhase
  to: LifecyclePhase
  at: Date
  detail?: string
}

export interface LifecycleEvents {
  onTransition?: (transition: LifecycleTransition) => void
  onNudge?: (issue: Issue, session: Session) => void
  onRestart?: (issue: Issue, session: Session) => void
  onOutcome?: (issue: Issue, outcome: LifecycleOutcome) => void
}

export interface LifecycleRun {
  issue: Issue
  /** True for InProgress or Blocked issues being taken over */
  resume: boolean
  signal?: AbortSignal
}

export interface LifecycleResult {
  issue: Issue
  outcome: LifecycleOutcome
  claim: ClaimRecord | null
}
