import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'fs'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { InMemoryTrackerClient } from '@drover/linear'
import { parseDroverConfig, type DroverConfig } from '../config/drover-config.js'
import { createLogger } from '../logger.js'
import { FakeGitRunner } from '../testing/fake-git-runner.js'
import { FakeSessionHost } from '../testing/fake-session-host.js'
import { MARKER_FILE } from '../workspace/completion-marker.js'
import { createOrchestrator, lifecycleSettings } from './orchestrator.js'

let root: string
let config: DroverConfig
let tracker: InMemoryTrackerClient
let host: FakeSessionHost

function orchestrator() {
  return createOrchestrator(config, {
    tracker,
    host,
    git: new FakeGitRunner(),
    ownerId: 'worker-test',
    logger: createLogger({}, { minLevel: 'error' }),
  })
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'drover-orch-'))
  config = parseDroverConfig({
    apiVersion: 'v1',
    kind: 'DroverConfig',
    tracker: { defaultRepo: 'web', agentLabel: 'agent' },
    repositories: { web: { url: 'https://git.example.test/web.git' } },
    workspace: { root },
  })
  tracker = new InMemoryTrackerClient({ defaultRepo: 'web' })
  host = new FakeSessionHost()
})

afterEach(async () => {
  await rm(root, { recursive: true, force: true })
})

describe('lifecycleSettings', () => {
  it('converts configured seconds to milliseconds', () => {
    expect(lifecycleSettings(config)).toEqual({
      pollIntervalMs: 30_000,
      liveness: { nudgeAfterMs: 900_000, nudgeIntervalMs: 300_000, maxNudges: 3, maxRestarts: 1 },
      nudgeMessage:
        'HEALTH_CHECK: please continue work on {identifier} ({title}). If blocked, post a BLOCKED comment and exit.',
      completeStatus: 'Done',
      openMergeRequest: true,
    })
  })
})

describe('createOrchestrator', () => {
  it('drains a Ready issue to Done', async () => {
    tracker.seed({ id: 'i-1', identifier: 'ENG-1', title: 'Add health endpoint', status: 'Ready', labels: ['agent'] })
    host.onStart = (launch) =>
      writeFile(
        join(launch.cwd, MARKER_FILE),
        JSON.stringify({ task_id: 'ENG-1', summary: 'Added /healthz', files_changed: ['src/server.ts'], commands_run: [] })
      )

    const summary = await orchestrator().pool.run({ maxConcurrency: 2, target: 'any', mode: 'drain' })

    expect(summary.outcomes.done).toBe(1)
    expect(tracker.peek('i-1').status).toBe('Done')
    expect(host.started[0].cwd).toBe(join(root, 'worktrees', 'web', 'ENG-1'))
    expect(tracker.mergeRequests.map((request) => request.branch)).toEqual(['agent/ENG-1-add-health-endpoint'])
    expect(existsSync(join(root, 'logs', 'ENG-1.jsonl'))).toBe(true)
  })

  it('cleans up finished workspaces but keeps claimed ones', async () => {
    tracker.seed(
      { id: 'i-1', identifier: 'ENG-1', title: 'finished', status: 'Done' },
      { id: 'i-2', identifier: 'ENG-2', title: 'reclaimed', status: 'InProgress' }
    )
    const drover = orchestrator()
    for (const id of ['i-1', 'i-2']) {
      const workspace = await drover.workspaces.materialize(tracker.peek(id))
      await drover.workspaces.markTerminal(workspace, 'Done')
    }

    const preview = await drover.cleanup({ dryRun: true, retentionHours: 0 })
    expect(preview.removed).toEqual([join(root, 'worktrees', 'web', 'ENG-1')])
    expect(preview.kept).toEqual([{ path: join(root, 'worktrees', 'web', 'ENG-2'), reason: 'issue is InProgress' }])
    expect(await drover.workspaces.list()).toHaveLength(2)

    const report = await drover.cleanup({ retentionHours: 0 })
    expect(report.removed).toEqual([join(root, 'worktrees', 'web', 'ENG-1')])
    expect((await drover.workspaces.list()).map((workspace) => workspace.identifier)).toEqual(['ENG-2'])
  })

  it('keeps a Blocked workspace for resumption even with allTerminal', async () => {
    tracker.seed(
      { id: 'i-1', identifier: 'ENG-1', title: 'waiting on an answer', status: 'Blocked' },
      { id: 'i-2', identifier: 'ENG-2', title: 'failed then closed', status: 'Done' }
    )
    const drover = orchestrator()
    await drover.workspaces.markTerminal(await drover.workspaces.materialize(tracker.peek('i-1')), 'Blocked')
    await drover.workspaces.markTerminal(await drover.workspaces.materialize(tracker.peek('i-2')), 'Failed')

    const report = await drover.cleanup({ retentionHours: 0, allTerminal: true })

    expect(report.kept).toEqual([{ path: join(root, 'worktrees', 'web', 'ENG-1'), reason: 'issue is Blocked' }])
    expect(report.removed).toEqual([join(root, 'worktrees', 'web', 'ENG-2')])
  })

  it('keeps recent workspaces within the retention window', async () => {
    tracker.seed({ id: 'i-1', identifier: 'ENG-1', title: 'finished', status: 'Done' })
    const drover = orchestrator()
    await drover.workspaces.markTerminal(await drover.workspaces.materialize(tracker.peek('i-1')), 'Done')

    const report = await drover.cleanup()
    expect(report.kept).toEqual([{ path: join(root, 'worktrees', 'web', 'ENG-1'), reason: 'within retention' }])
  })
})
