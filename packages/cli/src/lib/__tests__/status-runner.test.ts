import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { FakeGitRunner, FakeSessionHost, createLogger } from '@drover/core'
import { InMemoryTrackerClient } from '@drover/linear'
import { formatStatusReport, runStatus, type StatusReport } from '../status-runner.js'

describe('formatStatusReport', () => {
  it('reports an empty workspace root', () => {
    expect(formatStatusReport({ workspaces: [], issues: null })).toBe('No workspaces.')
  })

  it('lists workspaces and issue counts', () => {
    const report: StatusReport = {
      workspaces: [
        {
          identifier: 'ENG-1',
          repo: 'web',
          path: '/tmp/ws/worktrees/web/ENG-1',
          branch: 'agent/ENG-1-fix-login',
          state: 'active',
          sessionAlive: true,
        },
        {
          identifier: 'ENG-2',
          repo: 'web',
          path: '/tmp/ws/worktrees/web/ENG-2',
          branch: 'agent/ENG-2-docs',
          state: 'Done',
          sessionAlive: false,
        },
      ],
      issues: { Ready: 3, InProgress: 1, Blocked: 0, InReview: 2 },
    }

    expect(formatStatusReport(report).split('\n')).toEqual([
      'Workspaces (2):',
      '  ENG-1        active     session running  agent/ENG-1-fix-login',
      '  ENG-2        Done       no session       agent/ENG-2-docs',
      '',
      'Issues:',
      '  Ready        3',
      '  InProgress   1',
      '  Blocked      0',
      '  InReview     2',
    ])
  })
})

describe('runStatus', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'drover-status-'))
    await mkdir(join(root, '.drover'))
    await writeFile(
      join(root, '.drover', 'config.yaml'),
      'apiVersion: v1\nkind: DroverConfig\ntracker:\n  defaultRepo: web\n  agentLabel: agent\n'
    )
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  const options = { env: {}, host: new FakeSessionHost(), git: new FakeGitRunner(), logger: createLogger({}, { minLevel: 'error' }) }

  it('works offline without a tracker', async () => {
    expect(await runStatus({ root, ...options })).toEqual({ workspaces: [], issues: null })
  })

  it('counts labelled issues per status', async () => {
    const tracker = new InMemoryTrackerClient({ defaultRepo: 'web' }).seed(
      { id: 'i-1', identifier: 'ENG-1', title: 'a', status: 'Ready', labels: ['agent'] },
      { id: 'i-2', identifier: 'ENG-2', title: 'b', status: 'Ready', labels: ['agent'] },
      { id: 'i-3', identifier: 'ENG-3', title: 'c', status: 'Blocked', labels: ['agent'] },
      { id: 'i-4', identifier: 'ENG-4', title: 'd', status: 'Ready' }
    )

    const report = await runStatus({ root, tracker, ...options })

    expect(report.issues).toEqual({ Ready: 2, InProgress: 0, Blocked: 1, InReview: 0 })
  })
})
