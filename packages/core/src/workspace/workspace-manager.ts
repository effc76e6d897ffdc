/**
 * Workspace Manager
 *
 * One isolated working copy per issue. Each repository is cloned once as a
 * bare store under `<root>/repos/<repo>.git`; every issue gets a git worktree
 * of that store under `<root>/worktrees/<repo>/<identifier>` on its own
 * branch. The workspace record lives inside the worktree at
 * `.drover/workspace.json`, so re-entry after a restart finds the same branch.
 */

import { existsSync } from 'fs'
import { appendFile, mkdir, open, readdir, readFile, rename, rm, stat } from 'fs/promises'
import { dirname, join, resolve } from 'path'
import { z } from 'zod'
import type { Issue } from '@drover/linear'
import { WorkspaceError, errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../logger.js'
import type { Answer } from '../protocol/comments.js'
import { CliGitRunner, type GitRunner } from './git.js'
import {
  ANSWERS_FILE,
  MARKER_FILE,
  TASK_FILE,
  parseCompletionMarker,
  type MarkerRead,
} from './completion-marker.js'

export const WORKSPACE_META_DIR = '.drover'
export const WORKSPACE_META_FILE = 'workspace.json'

/** Never committed from a workspace */
const EXCLUDE_PATTERNS = [`${WORKSPACE_META_DIR}/`, TASK_FILE, MARKER_FILE, ANSWERS_FILE]

const SLUG_MAX_LENGTH = 40

export const TERMINAL_STATES = ['Done', 'InReview', 'Blocked', 'Failed'] as const
export type TerminalState = (typeof TERMINAL_STATES)[number]

const WorkspaceRecordSchema = z.object({
  issueId: z.string(),
  identifier: z.string(),
  repo: z.string(),
  rootPath: z.string(),
  branchName: z.string(),
  baseBranch: z.string(),
  createdAt: z.string().datetime(),
  terminal: z
    .object({
      state: z.enum(TERMINAL_STATES),
      at: z.string().datetime(),
    })
    .optional(),
})

type WorkspaceRecord = z.infer<typeof WorkspaceRecordSchema>

export interface Workspace {
  issueId: string
  identifier: string
  repo: string
  rootPath: string
  branchName: string
  baseBranch: string
  createdAt: Date
  terminal?: { state: TerminalState; at: Date }
}

export interface RepositorySource {
  url: string
  baseBranch: string
}

export interface WorkspaceManagerOptions {
  /** Absolute workspace root */
  root: string
  branchPrefix?: string
  repositories: Record<string, RepositorySource>
  git?: GitRunner
  now?: () => Date
  logger?: Logger
}

export interface CleanupPolicy {
  retentionMs: number
  /** Remove only workspaces whose issue finished Done */
  onlyDone: boolean
  dryRun?: boolean
  /** Why the workspace must stay (a live session, an unfinished issue), or null */
  keepReason: (workspace: Workspace) => Promise<string | null>
}

export interface CleanupReport {
  scanned: number
  removed: string[]
  kept: Array<{ path: string; reason: string }>
  errors: Array<{ path: string; error: string }>
  /** Worktree directories without a workspace record, e.g. from a crashed materialize */
  orphaned: string[]
}

export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/-+$/, '')
  return slug || 'task'
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '-')
}

function toWorkspace(record: WorkspaceRecord): Workspace {
  return {
    issueId: record.issueId,
    identifier: record.identifier,
    repo: record.repo,
    rootPath: record.rootPath,
    branchName: record.branchName,
    baseBranch: record.baseBranch,
    createdAt: new Date(record.createdAt),
    ...(record.terminal && {
      terminal: { state: record.terminal.state, at: new Date(record.terminal.at) },
    }),
  }
}

function toRecord(workspace: Workspace): WorkspaceRecord {
  return {
    issueId: workspace.issueId,
    identifier: workspace.identifier,
    repo: workspace.repo,
    rootPath: workspace.rootPath,
    branchName: workspace.branchName,
    baseBranch: workspace.baseBranch,
    createdAt: workspace.createdAt.toISOString(),
    ...(workspace.terminal && {
      terminal: { state: workspace.terminal.state, at: workspace.terminal.at.toISOString() },
    }),
  }
}

/**
 * Write a file so readers see either the old or the new contents
 */
async function writeFileAtomic(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tmpPath = `${path}.${process.pid}.tmp`
  const handle = await open(tmpPath, 'w')
  try {
    await handle.writeFile(contents, 'utf-8')
    await handle.sync()
  } finally {
    await handle.close()
  }
  await rename(tmpPath, path)
}

export class WorkspaceManager {
  private readonly root: string
  private readonly branchPrefix: string
  private readonly git: GitRunner
  private readonly now: () => Date
  private readonly log: Logger
  private readonly storeLocks = new Map<string, Promise<void>>()

  constructor(private readonly options: WorkspaceManagerOptions) {
    this.root = resolve(options.root)
    this.branchPrefix = options.branchPrefix ?? 'agent'
    this.git = options.git ?? new CliGitRunner()
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? createLogger()
  }

  // -------------------------------------------------------------------------
  // Naming
  // -------------------------------------------------------------------------

  storePath(repo: string): string {
    return join(this.root, 'repos', `${safeSegment(repo)}.git`)
  }

  pathFor(issue: Issue): string {
    return join(this.root, 'worktrees', safeSegment(issue.repo), safeSegment(issue.identifier))
  }

  branchFor(issue: Issue): string {
    return `${this.branchPrefix}/${safeSegment(issue.identifier)}-${slugify(issue.title)}`
  }

  /**
   * Where an issue's workspace is (or will be), and its branch. An existing
   * record wins over the computed branch, since titles can change.
   */
  async placement(issue: Issue): Promise<{ workspacePath: string; branch: string }> {
    const workspacePath = this.pathFor(issue)
    const existing = await this.readRecord(workspacePath)
    return { workspacePath, branch: existing?.branchName ?? this.branchFor(issue) }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Create the issue's workspace, or bring an existing one up to date.
   * Calling this twice yields the same path and branch.
   */
  async materialize(issue: Issue): Promise<Workspace> {
    const source = this.options.repositories[issue.repo]
    const workspacePath = this.pathFor(issue)
    if (!source) {
      throw new WorkspaceError(`No repository configured for "${issue.repo}"`, workspacePath)
    }
    const store = this.storePath(issue.repo)

    const existing = await this.readRecord(workspacePath)
    if (existing) {
      await this.refresh(existing, store)
      const reopened: Workspace = { ...existing }
      delete reopened.terminal
      await this.writeRecord(reopened)
      this.log.debug('Reusing workspace', { path: workspacePath, branch: existing.branchName })
      return reopened
    }

    if (existsSync(join(workspacePath, '.git'))) {
      const branchName = await this.git.run(['rev-parse', '--abbrev-ref', 'HEAD'], workspacePath)
      const adopted = this.newWorkspace(issue, source, branchName)
      await this.writeRecord(adopted)
      this.log.info('Adopted existing worktree', { path: workspacePath, branch: branchName })
      return adopted
    }

    const branchName = this.branchFor(issue)
    await this.serialized(issue.repo, async () => {
      await this.ensureStore(issue.repo, source, store)
      await mkdir(dirname(workspacePath), { recursive: true })

      if (await this.git.succeeds(['show-ref', '--verify', '--quiet', `refs/heads/${branchName}`], store)) {
        await this.git.run(['worktree', 'add', workspacePath, branchName], store)
      } else {
        const remote = await this.remoteBranchExists(store, branchName)
        const startPoint = remote ? `origin/${branchName}` : `origin/${source.baseBranch}`
        await this.git.run(['worktree', 'add', '-b', branchName, workspacePath, startPoint], store)
      }
    })

    const workspace = this.newWorkspace(issue, source, branchName)
    await this.writeRecord(workspace)
    this.log.info('Created workspace', { path: workspacePath, branch: branchName })
    return workspace
  }

  /**
   * Write TASK.md once. Returns false when an instruction already exists;
   * an existing instruction is never overwritten.
   */
  async writeInstructions(workspace: Workspace, instruction: string): Promise<boolean> {
    const path = join(workspace.rootPath, TASK_FILE)
    if (existsSync(path)) return false
    await writeFileAtomic(path, instruction)
    return true
  }

  async appendAnswer(workspace: Workspace, answer: Answer): Promise<void> {
    const path = join(workspace.rootPath, ANSWERS_FILE)
    const author = answer.author ?? 'reviewer'
    const entry = `## Answer from ${author} (${answer.createdAt.toISOString()})\n\n${answer.text.trim()}\n\n`
    await appendFile(path, entry, 'utf-8')
  }

  async readCompletionMarker(workspace: Workspace): Promise<MarkerRead> {
    const path = join(workspace.rootPath, MARKER_FILE)
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return { kind: 'absent' }
      throw error
    }
    return parseCompletionMarker(raw, workspace.identifier)
  }

  /**
   * Move a marker out of the way so a resumed session starts clean.
   * Returns the archived path, or null when there was no marker.
   */
  async archiveCompletionMarker(workspace: Workspace): Promise<string | null> {
    const path = join(workspace.rootPath, MARKER_FILE)
    if (!existsSync(path)) return null
    const stamp = this.now().toISOString().replace(/[:.]/g, '-')
    const archived = join(workspace.rootPath, WORKSPACE_META_DIR, `TASK_DONE.${stamp}.json`)
    await mkdir(dirname(archived), { recursive: true })
    await rename(path, archived)
    return archived
  }

  /**
   * Changes whenever the session commits or touches tracked files
   */
  async progressSignature(workspace: Workspace): Promise<string> {
    const head = await this.git.run(['rev-parse', 'HEAD'], workspace.rootPath)
    const status = await this.git.run(['status', '--porcelain'], workspace.rootPath)
    return `${head}\n${status}`
  }

  /**
   * Push the workspace branch so a merge request can be opened from it
   */
  async publish(workspace: Workspace): Promise<void> {
    await this.git.run(['push', '-u', 'origin', workspace.branchName], workspace.rootPath)
  }

  async markTerminal(workspace: Workspace, state: TerminalState): Promise<Workspace> {
    const next: Workspace = { ...workspace, terminal: { state, at: this.now() } }
    await this.writeRecord(next)
    return next
  }

  /**
   * Every workspace with a readable record
   */
  async list(): Promise<Workspace[]> {
    return (await this.scan()).workspaces
  }

  /**
   * Remove terminal workspaces past retention, and orphaned worktree
   * directories older than the retention window. Run out of band; never
   * touches a workspace that `keepReason` holds on to.
   */
  async cleanup(policy: CleanupPolicy): Promise<CleanupReport> {
    const report: CleanupReport = { scanned: 0, removed: [], kept: [], errors: [], orphaned: [] }
    const cutoff = this.now().getTime() - policy.retentionMs
    const { workspaces, orphans } = await this.scan()

    for (const workspace of workspaces) {
      report.scanned++
      const path = workspace.rootPath

      if (!workspace.terminal) {
        report.kept.push({ path, reason: 'not terminal' })
        continue
      }
      if (policy.onlyDone && workspace.terminal.state !== 'Done') {
        report.kept.push({ path, reason: `terminal state ${workspace.terminal.state}` })
        continue
      }
      if (workspace.terminal.at.getTime() > cutoff) {
        report.kept.push({ path, reason: 'within retention' })
        continue
      }

      try {
        const reason = await policy.keepReason(workspace)
        if (reason) {
          report.kept.push({ path, reason })
          continue
        }
        if (!policy.dryRun) {
          await this.removeWorktree(workspace)
        }
        report.removed.push(path)
      } catch (error) {
        report.errors.push({ path, error: errorMessage(error) })
      }
    }

    for (const orphan of orphans) {
      report.scanned++
      report.orphaned.push(orphan.path)
      try {
        if ((await stat(orphan.path)).mtime.getTime() > cutoff) {
          report.kept.push({ path: orphan.path, reason: 'no workspace record; within retention' })
          continue
        }
        if (!policy.dryRun) {
          await rm(orphan.path, { recursive: true, force: true })
          const store = this.storePath(orphan.repo)
          if (existsSync(store)) {
            await this.git.run(['worktree', 'prune'], store)
          }
        }
        report.removed.push(orphan.path)
      } catch (error) {
        report.errors.push({ path: orphan.path, error: errorMessage(error) })
      }
    }

    return report
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private newWorkspace(issue: Issue, source: RepositorySource, branchName: string): Workspace {
    return {
      issueId: issue.id,
      identifier: issue.identifier,
      repo: issue.repo,
      rootPath: this.pathFor(issue),
      branchName,
      baseBranch: source.baseBranch,
      createdAt: this.now(),
    }
  }

  private async scan(): Promise<{ workspaces: Workspace[]; orphans: Array<{ repo: string; path: string }> }> {
    const base = join(this.root, 'worktrees')
    const workspaces: Workspace[] = []
    const orphans: Array<{ repo: string; path: string }> = []
    for (const repoDir of await listDirectories(base)) {
      for (const issueDir of await listDirectories(join(base, repoDir))) {
        const path = join(base, repoDir, issueDir)
        try {
          const record = await this.readRecord(path)
          if (record) {
            workspaces.push(record)
          } else {
            orphans.push({ repo: repoDir, path })
          }
        } catch (error) {
          if (!(error instanceof WorkspaceError)) throw error
          this.log.warn('Skipping unreadable workspace', { path, error: error.message })
        }
      }
    }
    return { workspaces, orphans }
  }

  private async refresh(workspace: Workspace, store: string): Promise<void> {
    await this.serialized(workspace.repo, () => this.git.run(['fetch', 'origin', '--prune'], store).then(() => undefined))
    if (!(await this.remoteBranchExists(store, workspace.branchName))) return
    try {
      await this.git.run(['merge', '--ff-only', `origin/${workspace.branchName}`], workspace.rootPath)
    } catch (error) {
      this.log.warn('Workspace branch diverged from origin; keeping local history', {
        path: workspace.rootPath,
        error: errorMessage(error),
      })
    }
  }

  private async ensureStore(repo: string, source: RepositorySource, store: string): Promise<void> {
    if (!existsSync(store)) {
      await mkdir(dirname(store), { recursive: true })
      this.log.info('Cloning repository', { repo, url: source.url })
      await this.git.run(['clone', '--bare', source.url, store], dirname(store))
      await this.git.run(['config', 'remote.origin.fetch', '+refs/heads/*:refs/remotes/origin/*'], store)
      await mkdir(join(store, 'info'), { recursive: true })
      await appendFile(join(store, 'info', 'exclude'), `${EXCLUDE_PATTERNS.join('\n')}\n`, 'utf-8')
    }
    await this.git.run(['fetch', 'origin', '--prune'], store)
  }

  private remoteBranchExists(store: string, branch: string): Promise<boolean> {
    return this.git.succeeds(['show-ref', '--verify', '--quiet', `refs/remotes/origin/${branch}`], store)
  }

  private async removeWorktree(workspace: Workspace): Promise<void> {
    const store = this.storePath(workspace.repo)
    try {
      await this.git.run(['worktree', 'remove', '--force', workspace.rootPath], store)
    } catch (error) {
      this.log.warn('git worktree remove failed; deleting directory', {
        path: workspace.rootPath,
        error: errorMessage(error),
      })
      await rm(workspace.rootPath, { recursive: true, force: true })
      if (existsSync(store)) {
        await this.git.run(['worktree', 'prune'], store)
      }
    }
  }

  /**
   * Run git operations on one store one at a time
   */
  private serialized<T>(repo: string, task: () => Promise<T>): Promise<T> {
    const previous = this.storeLocks.get(repo) ?? Promise.resolve()
    const run = previous.then(task)
    // The chain only orders tasks; callers see failures through `run`
    this.storeLocks.set(
      repo,
      run.then(
        () => undefined,
        () => undefined
      )
    )
    return run
  }

  private async readRecord(workspacePath: string): Promise<Workspace | null> {
    const path = join(workspacePath, WORKSPACE_META_DIR, WORKSPACE_META_FILE)
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      throw new WorkspaceError(`Corrupt workspace record: ${errorMessage(error)}`, workspacePath)
    }
    const parsed = WorkspaceRecordSchema.safeParse(data)
    if (!parsed.success) {
      throw new WorkspaceError(`Invalid workspace record: ${parsed.error.issues[0]?.message ?? 'unknown'}`, workspacePath)
    }
    return toWorkspace(parsed.data)
  }

  private writeRecord(workspace: Workspace): Promise<void> {
    const path = join(workspace.rootPath, WORKSPACE_META_DIR, WORKSPACE_META_FILE)
    return writeFileAtomic(path, `${JSON.stringify(toRecord(workspace), null, 2)}\n`)
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'ENOENT'
}

async function listDirectories(path: string): Promise<string[]> {
  let entries: string[]
  try {
    entries = await readdir(path)
  } catch (error) {
    if (isMissingFile(error)) return []
    throw error
  }
  const dirs: string[] = []
  for (const entry of entries.sort()) {
    if ((await stat(join(path, entry))).isDirectory()) dirs.push(entry)
  }
  return dirs
}
