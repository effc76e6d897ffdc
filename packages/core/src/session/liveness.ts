/**
 * Liveness policy
 *
 * Pure decision over a session's timing state. The controller supplies the
 * inputs; the lifecycle acts on the result.
 *
 *   idle >= nudgeAfter            -> nudge
 *   every nudgeInterval after     -> nudge, up to maxNudges
 *   still idle after the last one -> restart, up to maxRestarts
 *   out of restarts               -> fail
 *
 * A dead session skips nudging and goes straight to restart or fail.
 */

export interface LivenessPolicy {
  nudgeAfterMs: number
  nudgeIntervalMs: number
  maxNudges: number
  maxRestarts: number
}

export interface LivenessState {
  lastActivityAt: Date
  nudgeCount: number
  lastNudgeAt: Date | null
  restartCount: number
}

export type LivenessDecision = 'wait' | 'nudge' | 'restart' | 'fail'

export function decideLiveness(
  state: LivenessState,
  health: 'running' | 'dead',
  now: Date,
  policy: LivenessPolicy
): LivenessDecision {
  const escalate = (): LivenessDecision => (state.restartCount < policy.maxRestarts ? 'restart' : 'fail')

  if (health === 'dead') {
    return escalate()
  }

  const idleMs = now.getTime() - state.lastActivityAt.getTime()

  if (state.nudgeCount === 0 || state.lastNudgeAt === null) {
    if (idleMs < policy.nudgeAfterMs) return 'wait'
    return policy.maxNudges > 0 ? 'nudge' : escalate()
  }

  if (now.getTime() - state.lastNudgeAt.getTime() < policy.nudgeIntervalMs) {
    return 'wait'
  }
  return state.nudgeCount < policy.maxNudges ? 'nudge' : escalate()
}
