import { describe, it, expect } from 'vitest'
import { isRefusal, markerOutcome, parseCompletionMarker, type CompletionMarker } from './completion-marker.js'

function marker(overrides: Partial<CompletionMarker> = {}): CompletionMarker {
  return { task_id: 'ENG-1', summary: 'Fixed the login redirect', files_changed: [], commands_run: [], ...overrides }
}

describe('parseCompletionMarker', () => {
  it('rejects a marker written for another task', () => {
    const raw = JSON.stringify(marker({ task_id: 'ENG-2' }))
    expect(parseCompletionMarker(raw, 'ENG-1')).toEqual({
      kind: 'invalid',
      reason: 'task_id "ENG-2" does not match ENG-1',
    })
  })

  it('names the missing fields', () => {
    const raw = JSON.stringify({ task_id: 'ENG-1', summary: 'ok', files_changed: [] })
    expect(parseCompletionMarker(raw, 'ENG-1')).toEqual({ kind: 'invalid', reason: 'commands_run: Required' })
  })
})

describe('isRefusal', () => {
  it('matches refusal phrases regardless of case and spacing', () => {
    expect(isRefusal("I'M SORRY, but I  can't\nhelp with that")).toBe(true)
    expect(isRefusal('There were no actionable instructions in the task')).toBe(true)
    expect(isRefusal('The request was refused')).toBe(true)
  })

  it('does not flag ordinary summaries', () => {
    expect(isRefusal('Added retry handling to the webhook consumer')).toBe(false)
    expect(isRefusal('')).toBe(false)
  })
})

describe('markerOutcome', () => {
  it('reads a plain marker as done', () => {
    expect(markerOutcome(marker())).toBe('done')
  })

  it('reads a refusal summary as refused', () => {
    expect(markerOutcome(marker({ summary: 'I cannot help with this request.' }))).toBe('refused')
  })

  it('reads blocked questions as blocked', () => {
    expect(markerOutcome(marker({ blocked_questions: ['Which API version?'] }))).toBe('blocked')
    expect(markerOutcome(marker({ blocked: true }))).toBe('blocked')
  })

  it('keeps a blocked marker blocked when its summary reads as a refusal', () => {
    expect(markerOutcome(marker({ status: 'blocked', summary: "I'm sorry, I need the staging URL" }))).toBe('blocked')
  })
})
