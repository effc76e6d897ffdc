import { describe, it, expect, vi, beforeEach } from 'vitest'
import { LinearTrackerClient } from './linear-tracker-client.js'
import { TrackerNotFoundError } from './errors.js'

const mocks = vi.hoisted(() => ({
  rawRequest: vi.fn(),
  updateIssue: vi.fn(),
  createComment: vi.fn(),
  updateComment: vi.fn(),
  createAttachment: vi.fn(),
}))

vi.mock('@linear/sdk', () => ({
  LinearClient: vi.fn().mockImplementation(() => ({
    client: { rawRequest: mocks.rawRequest },
    updateIssue: mocks.updateIssue,
    createComment: mocks.createComment,
    updateComment: mocks.updateComment,
    createAttachment: mocks.createAttachment,
  })),
}))

function issueNode(overrides: Record<string, unknown> = {}) {
  return {
    id: 'lin-1',
    identifier: 'ENG-7',
    title: 'Wire retries',
    description: 'Body text',
    url: 'https://linear.app/acme/issue/ENG-7',
    team: { id: 'team-1' },
    state: { name: 'Ready' },
    assignee: null,
    labels: { nodes: [{ id: 'lbl-agent', name: 'agent' }, { id: 'lbl-local', name: 'agent:local' }] },
    inverseRelations: {
      nodes: [
        { type: 'blocks', issue: { id: 'lin-0' } },
        { type: 'related', issue: { id: 'lin-9' } },
      ],
    },
    ...overrides,
  }
}

const teamStates = {
  team: {
    states: {
      nodes: [
        { id: 'st-ready', name: 'Ready' },
        { id: 'st-progress', name: 'In Progress' },
        { id: 'st-done', name: 'Done' },
      ],
    },
  },
}

function createClient(): LinearTrackerClient {
  return new LinearTrackerClient({
    apiKey: 'test-api-key',
    defaultRepo: 'web',
    retry: { maxRetries: 0 },
    rateLimiter: { acquire: async () => {}, penalize: () => {} },
    openMergeRequest: async () => ({ url: 'https://github.com/acme/web/pull/3' }),
    logger: { debug: () => {}, warn: () => {} },
  })
}

describe('LinearTrackerClient', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('maps an issue node onto the domain model', async () => {
    mocks.rawRequest.mockResolvedValueOnce({ data: { issue: issueNode() } })

    const issue = await createClient().getIssue('ENG-7')

    expect(issue).not.toBeNull()
    expect(issue?.status).toBe('Ready')
    expect(issue?.repo).toBe('web')
    expect(issue?.target).toBe('local')
    expect([...(issue?.blockingIds ?? [])]).toEqual(['lin-0'])
  })

  it('hides issues in unmapped states', async () => {
    mocks.rawRequest.mockResolvedValueOnce({ data: { issue: issueNode({ state: { name: 'Triage' } }) } })
    await expect(createClient().getIssue('ENG-7')).resolves.toBeNull()
  })

  it('returns null for a missing issue', async () => {
    mocks.rawRequest.mockRejectedValueOnce(new Error('Entity not found: Issue'))
    await expect(createClient().getIssue('ENG-404')).resolves.toBeNull()
  })

  it('pages through listings and filters labels locally', async () => {
    mocks.rawRequest
      .mockResolvedValueOnce({
        data: { issues: { nodes: [issueNode()], pageInfo: { hasNextPage: true, endCursor: 'c1' } } },
      })
      .mockResolvedValueOnce({
        data: {
          issues: {
            nodes: [issueNode({ id: 'lin-2', identifier: 'ENG-8', labels: { nodes: [] } })],
            pageInfo: { hasNextPage: false, endCursor: null },
          },
        },
      })

    const issues = await createClient().listIssues({ statuses: ['Ready'], labels: ['agent'] })

    expect(issues.map((i) => i.identifier)).toEqual(['ENG-7'])
    expect(mocks.rawRequest).toHaveBeenCalledTimes(2)
    expect(mocks.rawRequest.mock.calls[0][1]).toEqual({
      filter: { state: { name: { in: ['Ready'] } } },
      after: null,
    })
    expect(mocks.rawRequest.mock.calls[1][1]).toMatchObject({ after: 'c1' })
  })

  it('writes the new state only when the precondition holds', async () => {
    mocks.rawRequest
      .mockResolvedValueOnce({ data: { issue: issueNode() } })
      .mockResolvedValueOnce({ data: teamStates })
    mocks.updateIssue.mockResolvedValueOnce({ success: true })

    const result = await createClient().compareAndSetStatus('lin-1', ['Ready'], 'InProgress')

    expect(result).toEqual({ applied: true, current: 'InProgress' })
    expect(mocks.updateIssue).toHaveBeenCalledWith('lin-1', { stateId: 'st-progress' })
  })

  it('reports the observed state when the precondition fails', async () => {
    mocks.rawRequest.mockResolvedValueOnce({ data: { issue: issueNode({ state: { name: 'In Progress' } }) } })

    const result = await createClient().compareAndSetStatus('lin-1', ['Ready'], 'InProgress')

    expect(result).toEqual({ applied: false, current: 'InProgress' })
    expect(mocks.updateIssue).not.toHaveBeenCalled()
  })

  it('orders comments oldest first', async () => {
    mocks.rawRequest.mockResolvedValueOnce({
      data: {
        issue: {
          comments: {
            nodes: [
              { id: 'c2', body: 'ANSWER\nuse v2', createdAt: '2026-01-02T00:00:00.000Z', user: { name: 'Dana' } },
              { id: 'c1', body: 'BLOCKED\n1. which api?', createdAt: '2026-01-01T00:00:00.000Z', user: null },
            ],
            pageInfo: { hasNextPage: false },
          },
        },
      },
    })

    const comments = await createClient().listComments('lin-1')

    expect(comments.map((c) => [c.id, c.author])).toEqual([
      ['c1', null],
      ['c2', 'Dana'],
    ])
  })

  it('removes labels by the ids present on the issue', async () => {
    mocks.rawRequest.mockResolvedValueOnce({ data: { issue: issueNode() } })
    mocks.updateIssue.mockResolvedValueOnce({ success: true })

    await createClient().removeLabels('lin-1', ['agent'])

    expect(mocks.updateIssue).toHaveBeenCalledWith('lin-1', { removedLabelIds: ['lbl-agent'] })
  })

  it('resolves reviewers by email before assigning', async () => {
    mocks.rawRequest.mockResolvedValueOnce({ data: { users: { nodes: [{ id: 'user-5' }] } } })
    mocks.updateIssue.mockResolvedValueOnce({ success: true })

    await createClient().assign('lin-1', 'reviewer@example.com')

    expect(mocks.updateIssue).toHaveBeenCalledWith('lin-1', { assigneeId: 'user-5' })
  })

  it('fails when the reviewer email is unknown', async () => {
    mocks.rawRequest.mockResolvedValueOnce({ data: { users: { nodes: [] } } })
    await expect(createClient().assign('lin-1', 'nobody@example.com')).rejects.toBeInstanceOf(
      TrackerNotFoundError
    )
  })

  it('links opened merge requests on the issue', async () => {
    mocks.createAttachment.mockResolvedValueOnce({ success: true })

    const result = await createClient().openMergeRequest({
      issueId: 'lin-1',
      repo: 'web',
      branch: 'agent/ENG-7-wire-retries',
      baseBranch: 'main',
      title: 'ENG-7: Wire retries',
      body: 'Closes ENG-7',
      cwd: '/tmp/ws',
    })

    expect(result.url).toBe('https://github.com/acme/web/pull/3')
    expect(mocks.createAttachment).toHaveBeenCalledWith({
      issueId: 'lin-1',
      url: 'https://github.com/acme/web/pull/3',
      title: 'Pull request: agent/ENG-7-wire-retries',
    })
  })
})
