import { describe, it, expect } from 'vitest'
import type { TrackerComment } from '@drover/linear'
import {
  parseBlockedComment,
  parseAnswerComment,
  latestExchange,
  blockedSince,
  formatBlockedComment,
} from './comments.js'

let seq = 0
function comment(body: string, minute = 0, author: string | null = null): TrackerComment {
  return { id: `c-${++seq}`, body, createdAt: new Date(Date.UTC(2026, 0, 1, 10, minute)), author }
}

describe('parseBlockedComment', () => {
  it('collects numbered and bulleted questions', () => {
    const parsed = parseBlockedComment(
      comment('BLOCKED\n\n1. Which API version?\n2) Keep the old route?\n- Who owns the schema?')
    )
    expect(parsed?.questions).toEqual(['Which API version?', 'Keep the old route?', 'Who owns the schema?'])
  })

  it('treats text after the prefix as the first question', () => {
    const parsed = parseBlockedComment(comment('BLOCKED: need the staging URL\n* and credentials owner'))
    expect(parsed?.questions).toEqual(['need the staging URL', 'and credentials owner'])
  })

  it('folds unnumbered prose into a single question', () => {
    const parsed = parseBlockedComment(comment('BLOCKED\nThe migration needs a decision.\nPlease advise.'))
    expect(parsed?.questions).toEqual(['The migration needs a decision. Please advise.'])
  })

  it('skips leading blank lines', () => {
    expect(parseBlockedComment(comment('\n\n  BLOCKED\n1. why'))?.questions).toEqual(['why'])
  })

  it('rejects comments that merely mention the keyword', () => {
    expect(parseBlockedComment(comment('Not BLOCKED anymore'))).toBeNull()
    expect(parseBlockedComment(comment('BLOCKEDNESS report'))).toBeNull()
    expect(parseBlockedComment(comment(''))).toBeNull()
  })
})

describe('parseAnswerComment', () => {
  it('returns the text after the prefix', () => {
    const parsed = parseAnswerComment(comment('ANSWER: use v2\nand drop the old route', 0, 'dana'))
    expect(parsed).toMatchObject({ text: 'use v2\nand drop the old route', author: 'dana' })
  })

  it('rejects an empty answer', () => {
    expect(parseAnswerComment(comment('ANSWER:   '))).toBeNull()
  })
})

describe('latestExchange', () => {
  it('pairs the latest BLOCKED with the first ANSWER after it', () => {
    const thread = [
      comment('BLOCKED\n1. first?', 1),
      comment('ANSWER: old answer', 2),
      comment('BLOCKED\n1. second?', 3),
      comment('unrelated chatter', 4),
      comment('ANSWER: new answer', 5),
      comment('ANSWER: later answer', 6),
    ]
    const exchange = latestExchange(thread)
    expect(exchange.blocked?.questions).toEqual(['second?'])
    expect(exchange.answer?.text).toBe('new answer')
  })

  it('reports an unanswered question', () => {
    const exchange = latestExchange([comment('ANSWER: early', 1), comment('BLOCKED\n1. q', 2)])
    expect(exchange.blocked?.questions).toEqual(['q'])
    expect(exchange.answer).toBeNull()
  })

  it('is empty without any BLOCKED comment', () => {
    expect(latestExchange([comment('ANSWER: orphan')])).toEqual({ blocked: null, answer: null })
  })
})

describe('blockedSince', () => {
  it('ignores questions posted before the session started', () => {
    const thread = [comment('BLOCKED\n1. stale', 1), comment('BLOCKED\n1. fresh', 20)]
    expect(blockedSince(thread, new Date(Date.UTC(2026, 0, 1, 10, 10)))?.questions).toEqual(['fresh'])
    expect(blockedSince(thread, new Date(Date.UTC(2026, 0, 1, 10, 30)))).toBeNull()
  })
})

describe('formatBlockedComment', () => {
  it('produces a comment the parser reads back', () => {
    const body = formatBlockedComment(['Which database?', 'Which region?'])
    expect(body.split('\n').slice(0, 4)).toEqual(['BLOCKED', '', '1. Which database?', '2. Which region?'])
    expect(parseBlockedComment(comment(body))?.questions).toEqual(['Which database?', 'Which region?'])
  })
})
