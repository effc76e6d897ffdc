/**
 * Session Controller
 *
 * Starts, observes, nudges, restarts and stops the backend session that
 * works on one issue. Polling never blocks: it reads the completion marker,
 * asks the host whether the session is alive, and compares an activity
 * signature built from the captured output and the workspace's git state.
 */

import { createHash } from 'crypto'
import type { Issue } from '@drover/linear'
import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../logger.js'
import type { CompletionMarker, MarkerRead } from '../workspace/completion-marker.js'
import type { Workspace } from '../workspace/workspace-manager.js'
import { commandFor, selectBackend, type BackendSettings } from './backend.js'
import type { SessionHost } from './session-host.js'

const DEFAULT_CAPTURE_LINES = 200

export interface Session {
  name: string
  workspace: Workspace
  workspacePath: string
  backend: string
  model: string
  argv: string[]
  startedAt: Date
  lastActivityAt: Date
  nudgeCount: number
  lastNudgeAt: Date | null
  restartCount: number
  activitySignature: string | null
  /**
   * Set after the controller itself typed into the session; the next
   * observation only re-baselines the signature
   */
  rebaseline: boolean
}

export type SessionPoll =
  | { kind: 'running'; session: Session }
  | { kind: 'completed'; session: Session; marker: CompletionMarker }
  | { kind: 'dead'; session: Session; markerProblem: string | null }

/** What the controller needs from the workspace manager */
export interface SessionWorkspaceAccess {
  readCompletionMarker(workspace: Workspace): Promise<MarkerRead>
  progressSignature(workspace: Workspace): Promise<string>
}

export interface SessionControllerOptions {
  host: SessionHost
  workspaces: SessionWorkspaceAccess
  backends: BackendSettings
  /** Extra environment for every session */
  env?: Record<string, string>
  captureLines?: number
  now?: () => Date
  logger?: Logger
}

export function sessionNameFor(workspace: Pick<Workspace, 'repo' | 'identifier'>): string {
  return `drover-${workspace.repo}-${workspace.identifier}`.replace(/[^A-Za-z0-9_-]/g, '-')
}

export class SessionController {
  private readonly host: SessionHost
  private readonly captureLines: number
  private readonly now: () => Date
  private readonly log: Logger

  constructor(private readonly options: SessionControllerOptions) {
    this.host = options.host
    this.captureLines = options.captureLines ?? DEFAULT_CAPTURE_LINES
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? createLogger()
  }

  get hostKind(): SessionHost['kind'] {
    return this.host.kind
  }

  /**
   * Start the session for a workspace. A session that is already alive
   * under the same name is attached to instead.
   */
  async start(workspace: Workspace, issue: Issue): Promise<Session> {
    const choice = selectBackend(issue, this.options.backends)
    const argv = commandFor(choice, this.options.backends)
    const name = sessionNameFor(workspace)

    const status = await this.host.status(name)
    if (status === 'alive') {
      this.log.info('Attaching to running session', { session: name })
    } else {
      if (status === 'exited') {
        await this.host.kill(name)
      }
      await this.host.start({ name, cwd: workspace.rootPath, argv, env: this.options.env })
      this.log.info('Started session', { session: name, backend: choice.backend, model: choice.model || 'default' })
    }

    const now = this.now()
    return {
      name,
      workspace,
      workspacePath: workspace.rootPath,
      backend: choice.backend,
      model: choice.model,
      argv,
      startedAt: now,
      lastActivityAt: now,
      nudgeCount: 0,
      lastNudgeAt: null,
      restartCount: 0,
      activitySignature: null,
      rebaseline: false,
    }
  }

  async isAlive(name: string): Promise<boolean> {
    return (await this.host.status(name)) === 'alive'
  }

  async poll(session: Session): Promise<SessionPoll> {
    const marker = await this.options.workspaces.readCompletionMarker(session.workspace)
    if (marker.kind === 'valid') {
      return { kind: 'completed', session, marker: marker.marker }
    }
    if (marker.kind === 'invalid') {
      this.log.debug('Completion marker not accepted', { session: session.name, reason: marker.reason })
    }

    if ((await this.host.status(session.name)) !== 'alive') {
      return { kind: 'dead', session, markerProblem: marker.kind === 'invalid' ? marker.reason : null }
    }

    const signature = await this.activitySignature(session)
    if (session.rebaseline || session.activitySignature === null) {
      return { kind: 'running', session: { ...session, activitySignature: signature, rebaseline: false } }
    }
    if (signature !== session.activitySignature) {
      return {
        kind: 'running',
        session: {
          ...session,
          activitySignature: signature,
          lastActivityAt: this.now(),
          nudgeCount: 0,
          lastNudgeAt: null,
        },
      }
    }
    return { kind: 'running', session }
  }

  async nudge(session: Session, message: string): Promise<Session> {
    await this.host.send(session.name, message)
    return { ...session, nudgeCount: session.nudgeCount + 1, lastNudgeAt: this.now(), rebaseline: true }
  }

  /**
   * Replace the session with a fresh one in the same workspace, running the
   * same command
   */
  async restart(session: Session): Promise<Session> {
    await this.host.kill(session.name)
    await this.host.start({ name: session.name, cwd: session.workspacePath, argv: session.argv, env: this.options.env })
    this.log.warn('Restarted session', { session: session.name, restart: session.restartCount + 1 })
    return {
      ...session,
      restartCount: session.restartCount + 1,
      nudgeCount: 0,
      lastNudgeAt: null,
      lastActivityAt: this.now(),
      activitySignature: null,
      rebaseline: false,
    }
  }

  async stop(session: Pick<Session, 'name'>): Promise<void> {
    await this.host.kill(session.name)
  }

  /**
   * Recent output for diagnostics. Never throws: a capture failure is
   * reported in the returned text.
   */
  async capture(session: Pick<Session, 'name'>): Promise<string> {
    try {
      return await this.host.capture(session.name, this.captureLines)
    } catch (error) {
      return `(output unavailable: ${errorMessage(error)})`
    }
  }

  private async activitySignature(session: Session): Promise<string> {
    const hash = createHash('sha1')
    hash.update(await this.capture(session))
    try {
      hash.update(await this.options.workspaces.progressSignature(session.workspace))
    } catch (error) {
      this.log.debug('Progress signature unavailable', { session: session.name, error: errorMessage(error) })
    }
    return hash.digest('hex')
  }
}
