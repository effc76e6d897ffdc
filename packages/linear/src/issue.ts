/**
 * Issue ingestion
 *
 * Label and state strings are interpreted here, once, so nothing downstream
 * string-matches tracker vocabulary.
 */

import type {
  Difficulty,
  ExecutionTarget,
  Issue,
  IssueStatus,
  StatusNameMap,
} from './types.js'
import { ISSUE_STATUSES } from './types.js'

export const TARGET_LABEL_PREFIX = 'agent:'
export const DIFFICULTY_LABEL_PREFIX = 'difficulty:'
export const REPO_LABEL_PREFIX = 'repo:'

const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard']

/**
 * `agent:local` / `agent:remote`. Both or neither means the issue can run
 * anywhere.
 */
export function parseTarget(labels: Iterable<string>): ExecutionTarget | null {
  let local = false
  let remote = false
  for (const label of labels) {
    const normalized = label.trim().toLowerCase()
    if (normalized === `${TARGET_LABEL_PREFIX}local`) local = true
    if (normalized === `${TARGET_LABEL_PREFIX}remote`) remote = true
  }
  if (local === remote) return null
  return local ? 'local' : 'remote'
}

/**
 * Highest difficulty label wins when several are present
 */
export function parseDifficulty(labels: Iterable<string>): Difficulty | null {
  let found = -1
  for (const label of labels) {
    const normalized = label.trim().toLowerCase()
    if (!normalized.startsWith(DIFFICULTY_LABEL_PREFIX)) continue
    const index = DIFFICULTIES.findIndex(
      (d) => d === normalized.slice(DIFFICULTY_LABEL_PREFIX.length)
    )
    found = Math.max(found, index)
  }
  return found >= 0 ? DIFFICULTIES[found] : null
}

export function parseRepo(labels: Iterable<string>, defaultRepo: string): string {
  for (const label of labels) {
    const trimmed = label.trim()
    if (trimmed.toLowerCase().startsWith(REPO_LABEL_PREFIX)) {
      const name = trimmed.slice(REPO_LABEL_PREFIX.length).trim()
      if (name) return name
    }
  }
  return defaultRepo
}

/**
 * Map a tracker state name onto the closed status set; null when unmapped
 */
export function statusFromStateName(name: string, names: StatusNameMap): IssueStatus | null {
  const wanted = name.trim().toLowerCase()
  return ISSUE_STATUSES.find((status) => names[status].toLowerCase() === wanted) ?? null
}

export function isIssueStatus(value: string): value is IssueStatus {
  return ISSUE_STATUSES.some((status) => status === value)
}

/**
 * An untagged issue runs on either kind of pool
 */
export function matchesTarget(issue: Issue, target: ExecutionTarget | 'any'): boolean {
  if (target === 'any' || issue.target === null) return true
  return issue.target === target
}

export interface IssueInit {
  id: string
  identifier?: string
  repo?: string
  title: string
  body?: string
  status: IssueStatus
  labels?: Iterable<string>
  assignee?: string | null
  blockingIds?: Iterable<string>
  url?: string
}

/**
 * Build an Issue with its derived label views
 */
export function createIssue(init: IssueInit, defaultRepo = 'default'): Issue {
  const labels = new Set(init.labels ?? [])
  return {
    id: init.id,
    identifier: init.identifier ?? init.id,
    repo: init.repo ?? parseRepo(labels, defaultRepo),
    title: init.title,
    body: init.body ?? '',
    status: init.status,
    labels,
    assignee: init.assignee ?? null,
    blockingIds: new Set(init.blockingIds ?? []),
    url: init.url ?? '',
    target: parseTarget(labels),
    difficulty: parseDifficulty(labels),
  }
}
