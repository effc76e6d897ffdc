import { describe, it, expect } from 'vitest'
import { decideLiveness, type LivenessPolicy, type LivenessState } from './liveness.js'

const MIN = 60_000
const policy: LivenessPolicy = {
  nudgeAfterMs: 15 * MIN,
  nudgeIntervalMs: 5 * MIN,
  maxNudges: 3,
  maxRestarts: 1,
}

const t0 = new Date('2026-01-01T10:00:00.000Z')
const at = (minutes: number): Date => new Date(t0.getTime() + minutes * MIN)

function state(overrides: Partial<LivenessState> = {}): LivenessState {
  return { lastActivityAt: t0, nudgeCount: 0, lastNudgeAt: null, restartCount: 0, ...overrides }
}

describe('decideLiveness', () => {
  it('waits while the session is active', () => {
    expect(decideLiveness(state(), 'running', at(14), policy)).toBe('wait')
  })

  it('nudges once idle long enough', () => {
    expect(decideLiveness(state(), 'running', at(15), policy)).toBe('nudge')
  })

  it('spaces nudges by the nudge interval', () => {
    const nudged = state({ nudgeCount: 1, lastNudgeAt: at(15) })
    expect(decideLiveness(nudged, 'running', at(19), policy)).toBe('wait')
    expect(decideLiveness(nudged, 'running', at(20), policy)).toBe('nudge')
  })

  it('restarts after the last nudge goes unanswered', () => {
    const exhausted = state({ nudgeCount: 3, lastNudgeAt: at(25) })
    expect(decideLiveness(exhausted, 'running', at(29), policy)).toBe('wait')
    expect(decideLiveness(exhausted, 'running', at(30), policy)).toBe('restart')
  })

  it('fails once restarts are used up', () => {
    const exhausted = state({ nudgeCount: 3, lastNudgeAt: at(25), restartCount: 1 })
    expect(decideLiveness(exhausted, 'running', at(30), policy)).toBe('fail')
  })

  it('escalates straight away when nudging is disabled', () => {
    expect(decideLiveness(state(), 'running', at(15), { ...policy, maxNudges: 0 })).toBe('restart')
  })

  it('restarts a dead session within budget, then fails', () => {
    expect(decideLiveness(state(), 'dead', at(1), policy)).toBe('restart')
    expect(decideLiveness(state({ restartCount: 1 }), 'dead', at(1), policy)).toBe('fail')
    expect(decideLiveness(state(), 'dead', at(1), { ...policy, maxRestarts: 0 })).toBe('fail')
  })
})
