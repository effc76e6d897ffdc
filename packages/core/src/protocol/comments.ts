/**
 * Blocked/Resume comment protocol
 *
 * Two messages with a strict prefix grammar:
 *
 *   BLOCKED[: first question]
 *   1. question
 *   2. question
 *
 *   ANSWER[: text]
 *   free text
 *
 * Comments are parsed into typed values here; nothing else in the core looks
 * at raw comment text.
 */

import type { TrackerComment } from '@drover/linear'

export const BLOCKED_PREFIX = 'BLOCKED'
export const ANSWER_PREFIX = 'ANSWER'

export interface BlockedQuestion {
  commentId: string
  createdAt: Date
  questions: string[]
}

export interface Answer {
  commentId: string
  createdAt: Date
  author: string | null
  text: string
}

export interface ProtocolExchange {
  blocked: BlockedQuestion | null
  /** Set only when an ANSWER follows the latest BLOCKED */
  answer: Answer | null
}

const ITEM_PATTERN = /^\s*(?:\d+[.)]|[-*])\s+(.+?)\s*$/

/**
 * Split a comment into its first non-empty line and the rest
 */
function splitHead(body: string): { head: string; rest: string[] } | null {
  const lines = body.replace(/\r\n/g, '\n').split('\n')
  const start = lines.findIndex((line) => line.trim() !== '')
  if (start < 0) return null
  return { head: lines[start].trim(), rest: lines.slice(start + 1) }
}

/**
 * Text after a prefix keyword, or null when the line does not start with it.
 * The keyword must be followed by end of line, a colon or whitespace.
 */
function afterPrefix(head: string, prefix: string): string | null {
  if (!head.startsWith(prefix)) return null
  const tail = head.slice(prefix.length)
  if (tail !== '' && !/^[:\s]/.test(tail)) return null
  return tail.replace(/^:/, '').trim()
}

export function parseBlockedComment(comment: TrackerComment): BlockedQuestion | null {
  const parts = splitHead(comment.body)
  if (!parts) return null
  const inline = afterPrefix(parts.head, BLOCKED_PREFIX)
  if (inline === null) return null

  const questions: string[] = []
  if (inline) questions.push(inline)

  const loose: string[] = []
  for (const line of parts.rest) {
    if (line.trim().startsWith('<!--')) continue
    const item = line.match(ITEM_PATTERN)
    if (item) {
      questions.push(item[1])
    } else if (line.trim()) {
      loose.push(line.trim())
    }
  }
  // Unnumbered prose after the marker counts as one question
  if (questions.length === 0 && loose.length > 0) {
    questions.push(loose.join(' '))
  }

  return { commentId: comment.id, createdAt: comment.createdAt, questions }
}

export function parseAnswerComment(comment: TrackerComment): Answer | null {
  const parts = splitHead(comment.body)
  if (!parts) return null
  const inline = afterPrefix(parts.head, ANSWER_PREFIX)
  if (inline === null) return null

  const text = [inline, ...parts.rest].join('\n').trim()
  if (!text) return null

  return { commentId: comment.id, createdAt: comment.createdAt, author: comment.author, text }
}

/**
 * Latest BLOCKED question and the first ANSWER posted after it
 */
export function latestExchange(comments: readonly TrackerComment[]): ProtocolExchange {
  let blockedIndex = -1
  let blocked: BlockedQuestion | null = null
  comments.forEach((comment, index) => {
    const parsed = parseBlockedComment(comment)
    if (parsed) {
      blocked = parsed
      blockedIndex = index
    }
  })
  if (!blocked) return { blocked: null, answer: null }

  for (const comment of comments.slice(blockedIndex + 1)) {
    const answer = parseAnswerComment(comment)
    if (answer) return { blocked, answer }
  }
  return { blocked, answer: null }
}

/**
 * First BLOCKED comment posted at or after `since`
 */
export function blockedSince(comments: readonly TrackerComment[], since: Date): BlockedQuestion | null {
  for (const comment of comments) {
    if (comment.createdAt.getTime() < since.getTime()) continue
    const parsed = parseBlockedComment(comment)
    if (parsed) return parsed
  }
  return null
}

export function formatBlockedComment(questions: readonly string[], note?: string): string {
  const lines = [BLOCKED_PREFIX, '']
  if (questions.length === 0) {
    lines.push('1. The session stopped without saying what it needs. Please review the workspace.')
  } else {
    questions.forEach((question, index) => lines.push(`${index + 1}. ${question}`))
  }
  lines.push('')
  lines.push(`Reply with a comment starting with \`${ANSWER_PREFIX}\` to resume.`)
  if (note) {
    lines.push('')
    lines.push(note)
  }
  return lines.join('\n')
}
