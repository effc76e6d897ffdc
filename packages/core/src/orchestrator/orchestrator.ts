/**
 * Orchestrator factory
 *
 * Builds the claim manager, resolver, workspace manager, session controller,
 * lifecycle and pool from a validated config. Callers supply the tracker so
 * the same wiring runs against Linear or the in-memory tracker.
 */

import { join } from 'path'
import { LinearTrackerClient, type TrackerClient } from '@drover/linear'
import { ClaimManager, defaultOwnerId } from '../claims/claim-manager.js'
import type { DroverConfig } from '../config/drover-config.js'
import { DependencyResolver } from '../dependencies/dependency-resolver.js'
import { errorMessage } from '../errors.js'
import { ArtifactLog } from '../lifecycle/artifact-log.js'
import { IssueLifecycle, type LifecycleSettings } from '../lifecycle/issue-lifecycle.js'
import type { LifecycleEvents } from '../lifecycle/types.js'
import { createLogger, isLogLevel, type Logger } from '../logger.js'
import { AgentPool } from '../pool/agent-pool.js'
import { ProcessSessionHost } from '../session/process-session-host.js'
import { SessionController, sessionNameFor } from '../session/session-controller.js'
import type { SessionHost, SessionHostKind } from '../session/session-host.js'
import { TmuxSessionHost } from '../session/tmux-session-host.js'
import type { GitRunner } from '../workspace/git.js'
import { WorkspaceManager, type CleanupReport, type Workspace } from '../workspace/workspace-manager.js'

const SECOND = 1000
const HOUR = 60 * 60 * SECOND

export interface OrchestratorDeps {
  tracker: TrackerClient
  /** Defaults to the host named in `backends.host` */
  host?: SessionHost
  git?: GitRunner
  logger?: Logger
  events?: LifecycleEvents
  ownerId?: string
  /** Extra environment for every session */
  env?: Record<string, string>
}

export interface CleanupOptions {
  dryRun?: boolean
  /** Overrides `cleanup.retentionHours` */
  retentionHours?: number
  /** Also remove Blocked, Failed and InReview workspaces whose issue is now Done */
  allTerminal?: boolean
}

export interface Orchestrator {
  config: DroverConfig
  tracker: TrackerClient
  claims: ClaimManager
  resolver: DependencyResolver
  workspaces: WorkspaceManager
  sessions: SessionController
  lifecycle: IssueLifecycle
  pool: AgentPool
  /** Per-issue history under `<workspace.root>/logs` */
  artifacts: ArtifactLog
  cleanup(options?: CleanupOptions): Promise<CleanupReport>
}

export function lifecycleSettings(config: DroverConfig): LifecycleSettings {
  const { liveness, completion } = config
  return {
    pollIntervalMs: liveness.pollIntervalSeconds * SECOND,
    liveness: {
      nudgeAfterMs: liveness.nudgeAfterSeconds * SECOND,
      nudgeIntervalMs: liveness.nudgeIntervalSeconds * SECOND,
      maxNudges: liveness.maxNudges,
      maxRestarts: liveness.maxRestarts,
    },
    nudgeMessage: liveness.nudgeMessage,
    completeStatus: completion.status,
    openMergeRequest: completion.openMergeRequest,
  }
}

export function createSessionHost(kind: SessionHostKind): SessionHost {
  return kind === 'tmux' ? new TmuxSessionHost() : new ProcessSessionHost()
}

export function createLoggerForConfig(config: DroverConfig): Logger {
  const minLevel = config.logLevel && isLogLevel(config.logLevel) ? config.logLevel : undefined
  return createLogger({}, { ...(minLevel && { minLevel }) })
}

export function createLinearTracker(config: DroverConfig, apiKey: string, logger?: Logger): LinearTrackerClient {
  return new LinearTrackerClient({
    apiKey,
    defaultRepo: config.tracker.defaultRepo,
    teamKey: config.tracker.teamKey,
    statusNames: config.tracker.statusNames,
    ...(logger && { logger }),
  })
}

export function createOrchestrator(config: DroverConfig, deps: OrchestratorDeps): Orchestrator {
  const logger = deps.logger ?? createLoggerForConfig(config)
  const ownerId = deps.ownerId ?? defaultOwnerId()
  const { tracker } = deps

  const claims = new ClaimManager(tracker, {
    ownerId,
    agentLabel: config.tracker.agentLabel,
    reviewer: config.tracker.reviewer,
    heartbeatIntervalMs: config.liveness.heartbeatIntervalSeconds * SECOND,
    claimStaleAfterMs: config.liveness.claimStaleAfterSeconds * SECOND,
    logger: logger.child({ workerId: ownerId }),
  })
  const resolver = new DependencyResolver(tracker, logger)
  const workspaces = new WorkspaceManager({
    root: config.workspace.root,
    branchPrefix: config.workspace.branchPrefix,
    repositories: config.repositories,
    git: deps.git,
    logger,
  })
  const sessions = new SessionController({
    host: deps.host ?? createSessionHost(config.backends.host),
    workspaces,
    backends: config.backends,
    env: deps.env,
    logger,
  })
  const artifacts = new ArtifactLog(join(config.workspace.root, 'logs'), { logger })
  const lifecycle = new IssueLifecycle({
    tracker,
    claims,
    workspaces,
    sessions,
    settings: lifecycleSettings(config),
    events: deps.events,
    artifacts,
    logger: logger.child({ workerId: ownerId }),
  })
  const pool = new AgentPool({
    tracker,
    lifecycle,
    resolver,
    sessions,
    agentLabel: config.tracker.agentLabel,
    pollIntervalMs: config.liveness.pollIntervalSeconds * SECOND,
    logger,
  })

  // Until its issue is Done (or deleted) a workspace may still be resumed
  const keepReason = async (workspace: Workspace): Promise<string | null> => {
    if (await sessions.isAlive(sessionNameFor(workspace))) return 'live session'
    try {
      const issue = await tracker.getIssue(workspace.issueId)
      return issue && issue.status !== 'Done' ? `issue is ${issue.status}` : null
    } catch (error) {
      logger.warn('Could not read issue; keeping workspace', {
        issue: workspace.identifier,
        error: errorMessage(error),
      })
      return 'issue unreadable'
    }
  }

  return {
    config,
    tracker,
    claims,
    resolver,
    workspaces,
    sessions,
    lifecycle,
    pool,
    artifacts,
    cleanup: (options = {}) =>
      workspaces.cleanup({
        retentionMs: (options.retentionHours ?? config.cleanup.retentionHours) * HOUR,
        onlyDone: options.allTerminal ? false : config.cleanup.onlyDone,
        dryRun: options.dryRun,
        keepReason,
      }),
  }
}
