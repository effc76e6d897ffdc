/**
 * Status Runner -- Programmatic API for the status CLI.
 *
 * Lists local workspaces with their terminal state and session, and, when a
 * tracker is available, how many agent issues sit in each status.
 */

import {
  createLoggerForConfig,
  createSessionHost,
  loadDroverConfig,
  sessionNameFor,
  WorkspaceManager,
  type GitRunner,
  type Logger,
  type SessionHost,
  type TerminalState,
} from '@drover/core'
import type { IssueStatus, TrackerClient } from '@drover/linear'
import { resolveTracker } from './tracker.js'

const TRACKED_STATUSES = ['Ready', 'InProgress', 'Blocked', 'InReview'] as const satisfies readonly IssueStatus[]

type TrackedStatus = (typeof TRACKED_STATUSES)[number]

export interface StatusRunnerConfig {
  root?: string
  /** Without a key or tracker only local workspaces are reported */
  linearApiKey?: string
  env?: NodeJS.ProcessEnv
  tracker?: TrackerClient
  host?: SessionHost
  git?: GitRunner
  logger?: Logger
}

export interface WorkspaceStatus {
  identifier: string
  repo: string
  path: string
  branch: string
  state: TerminalState | 'active'
  sessionAlive: boolean
}

export interface StatusReport {
  workspaces: WorkspaceStatus[]
  /** Null when no tracker was available */
  issues: Record<TrackedStatus, number> | null
}

export async function runStatus(config: StatusRunnerConfig): Promise<StatusReport> {
  const env = config.env ?? process.env
  const droverConfig = loadDroverConfig(config.root ?? process.cwd(), env)
  const logger = config.logger ?? createLoggerForConfig(droverConfig)
  const host = config.host ?? createSessionHost(droverConfig.backends.host)
  const workspaces = new WorkspaceManager({
    root: droverConfig.workspace.root,
    branchPrefix: droverConfig.workspace.branchPrefix,
    repositories: droverConfig.repositories,
    git: config.git,
    logger,
  })

  const report: StatusReport = { workspaces: [], issues: null }
  for (const workspace of await workspaces.list()) {
    report.workspaces.push({
      identifier: workspace.identifier,
      repo: workspace.repo,
      path: workspace.rootPath,
      branch: workspace.branchName,
      state: workspace.terminal?.state ?? 'active',
      sessionAlive: (await host.status(sessionNameFor(workspace))) === 'alive',
    })
  }

  if (config.tracker || config.linearApiKey) {
    const tracker = resolveTracker(config, droverConfig, logger)
    const { agentLabel } = droverConfig.tracker
    const issues = await tracker.listIssues({
      statuses: TRACKED_STATUSES,
      ...(agentLabel && { labels: [agentLabel] }),
    })
    const counts: Record<TrackedStatus, number> = { Ready: 0, InProgress: 0, Blocked: 0, InReview: 0 }
    for (const issue of issues) {
      if (issue.status === 'Ready' || issue.status === 'InProgress' || issue.status === 'Blocked' || issue.status === 'InReview') {
        counts[issue.status]++
      }
    }
    report.issues = counts
  }

  return report
}

export function formatStatusReport(report: StatusReport): string {
  const lines: string[] = []

  if (report.workspaces.length === 0) {
    lines.push('No workspaces.')
  } else {
    lines.push(`Workspaces (${report.workspaces.length}):`)
    for (const workspace of report.workspaces) {
      const session = workspace.sessionAlive ? 'session running' : 'no session'
      lines.push(`  ${workspace.identifier.padEnd(12)} ${workspace.state.padEnd(10)} ${session.padEnd(16)} ${workspace.branch}`)
    }
  }

  if (report.issues) {
    lines.push('')
    lines.push('Issues:')
    for (const status of TRACKED_STATUSES) {
      lines.push(`  ${status.padEnd(12)} ${report.issues[status]}`)
    }
  }

  return lines.join('\n')
}
