/**
 * Completion marker
 *
 * The session writes TASK_DONE.json into the workspace root when it is
 * finished. Only a present, schema-valid marker for this task counts as
 * completion; everything else is reported with the reason.
 */

import { z } from 'zod'

export const TASK_FILE = 'TASK.md'
export const MARKER_FILE = 'TASK_DONE.json'
export const ANSWERS_FILE = 'TASK_ANSWERS.md'

export const CompletionMarkerSchema = z
  .object({
    task_id: z.string().min(1),
    summary: z.string(),
    files_changed: z.array(z.string()),
    commands_run: z.array(z.string()),
    status: z.enum(['done', 'blocked']).optional(),
    blocked: z.boolean().optional(),
    blocked_questions: z.array(z.string()).optional(),
  })
  .passthrough()

export type CompletionMarker = z.infer<typeof CompletionMarkerSchema>

export type MarkerRead =
  | { kind: 'absent' }
  | { kind: 'invalid'; reason: string }
  | { kind: 'valid'; marker: CompletionMarker }

/**
 * Validate raw marker file contents for the given task
 */
export function parseCompletionMarker(raw: string, taskId: string): MarkerRead {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    return { kind: 'invalid', reason: `not JSON: ${error instanceof Error ? error.message : String(error)}` }
  }

  const result = CompletionMarkerSchema.safeParse(data)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    return { kind: 'invalid', reason: problems.join('; ') }
  }
  if (result.data.task_id !== taskId) {
    return { kind: 'invalid', reason: `task_id "${result.data.task_id}" does not match ${taskId}` }
  }
  return { kind: 'valid', marker: result.data }
}

/** Summaries containing any of these mean the backend declined the task */
export const REFUSAL_PHRASES = [
  'no actionable instructions',
  'refusal',
  'refused',
  "can't help",
  'cannot help',
  "i'm sorry",
  'i am sorry',
] as const

export type MarkerOutcome = 'done' | 'blocked' | 'refused'

export function isRefusal(summary: string): boolean {
  const normalized = summary.toLowerCase().split(/\s+/).filter(Boolean).join(' ')
  return REFUSAL_PHRASES.some((phrase) => normalized.includes(phrase))
}

/**
 * A blocked marker is blocked even when its summary reads as a refusal
 */
export function markerOutcome(marker: CompletionMarker): MarkerOutcome {
  const questions = marker.blocked_questions ?? []
  if (marker.status === 'blocked' || marker.blocked === true || questions.length > 0) return 'blocked'
  return isRefusal(marker.summary) ? 'refused' : 'done'
}
