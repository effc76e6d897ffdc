/**
 * Claim and release markers
 *
 * Machine-readable HTML comments embedded in otherwise human-readable tracker
 * comments. The claim marker's heartbeat is rewritten in place while the
 * claim is held.
 */

import { z } from 'zod'
import type { TrackerComment } from '@drover/linear'

const CLAIM_TAG = 'drover:claim'
const RELEASE_TAG = 'drover:release'

export const ClaimMarkerSchema = z.object({
  owner: z.string().min(1),
  host: z.string(),
  workspace: z.string(),
  startedAt: z.string().datetime(),
  heartbeatAt: z.string().datetime(),
})

export type ClaimMarker = z.infer<typeof ClaimMarkerSchema>

export const ReleaseMarkerSchema = z.object({
  owner: z.string().min(1),
  outcome: z.string(),
  releasedAt: z.string().datetime(),
})

export type ReleaseMarker = z.infer<typeof ReleaseMarkerSchema>

export interface ClaimEntry {
  commentId: string
  createdAt: Date
  marker: ClaimMarker
}

function encode(tag: string, value: object): string {
  // JSON never contains "-->" once ">" is escaped
  return `<!-- ${tag} ${JSON.stringify(value).replace(/>/g, '\\u003e')} -->`
}

function decode<T>(body: string, tag: string, schema: z.ZodType<T>): T | null {
  const start = body.indexOf(`<!-- ${tag} `)
  if (start < 0) return null
  const end = body.indexOf(' -->', start)
  if (end < 0) return null

  let raw: unknown
  try {
    raw = JSON.parse(body.slice(start + tag.length + 6, end))
  } catch {
    return null
  }
  const parsed = schema.safeParse(raw)
  return parsed.success ? parsed.data : null
}

export function parseClaimMarker(body: string): ClaimMarker | null {
  return decode(body, CLAIM_TAG, ClaimMarkerSchema)
}

export function parseReleaseMarker(body: string): ReleaseMarker | null {
  return decode(body, RELEASE_TAG, ReleaseMarkerSchema)
}

export interface ClaimCommentDetails {
  identifier: string
  repo: string
  branch: string
}

export function formatClaimComment(marker: ClaimMarker, details: ClaimCommentDetails): string {
  return [
    `Claimed by drover worker \`${marker.owner}\` on \`${marker.host || 'unknown host'}\`.`,
    '',
    `- Repo: ${details.repo}`,
    `- Branch: \`${details.branch}\``,
    `- Workspace: \`${marker.workspace}\``,
    `- Started: ${marker.startedAt}`,
    '',
    encode(CLAIM_TAG, marker),
  ].join('\n')
}

/**
 * Rewrite only the marker of an existing claim comment
 */
export function replaceClaimMarker(body: string, marker: ClaimMarker): string {
  const start = body.indexOf(`<!-- ${CLAIM_TAG} `)
  const end = start < 0 ? -1 : body.indexOf(' -->', start)
  if (start < 0 || end < 0) return `${body}\n\n${encode(CLAIM_TAG, marker)}`
  return body.slice(0, start) + encode(CLAIM_TAG, marker) + body.slice(end + 4)
}

/**
 * Strip the marker from a claim that lost arbitration so it no longer counts
 */
export function withdrawClaimComment(body: string): string {
  const start = body.indexOf(`<!-- ${CLAIM_TAG} `)
  const end = start < 0 ? -1 : body.indexOf(' -->', start)
  const text = start < 0 || end < 0 ? body : (body.slice(0, start) + body.slice(end + 4)).trimEnd()
  return `${text}\n\n_Withdrawn: another worker claimed this issue first._`
}

export function formatReleaseComment(marker: ReleaseMarker, message: string): string {
  return `${message.trimEnd()}\n\n${encode(RELEASE_TAG, marker)}`
}

/**
 * Claims posted after the most recent release, oldest first
 */
export function liveClaims(comments: readonly TrackerComment[]): ClaimEntry[] {
  let live: ClaimEntry[] = []
  for (const comment of comments) {
    if (parseReleaseMarker(comment.body)) {
      live = []
      continue
    }
    const marker = parseClaimMarker(comment.body)
    if (marker) {
      live.push({ commentId: comment.id, createdAt: comment.createdAt, marker })
    }
  }
  return live
}
