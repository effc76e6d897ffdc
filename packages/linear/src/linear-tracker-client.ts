import { LinearClient } from '@linear/sdk'
import { z } from 'zod'
import type {
  CompareAndSetResult,
  Issue,
  IssueStatus,
  ListIssuesFilter,
  MergeRequestInput,
  MergeRequestResult,
  RateLimiterStrategy,
  RetryConfig,
  StatusNameMap,
  TrackerClient,
  TrackerComment,
} from './types.js'
import { DEFAULT_STATUS_NAMES } from './types.js'
import {
  TrackerApiError,
  TrackerNotFoundError,
  TrackerResponseError,
} from './errors.js'
import { retryTrackerCall, DEFAULT_RETRY_CONFIG } from './retry.js'
import { TokenBucket, extractRetryAfterMs, type TokenBucketConfig } from './rate-limiter.js'
import { createIssue, statusFromStateName } from './issue.js'
import { createGhMergeRequestOpener, type MergeRequestOpener } from './merge-request.js'

/**
 * Structural logger accepted by the tracker client
 */
export interface TrackerLogger {
  debug(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
}

const consoleLogger: TrackerLogger = {
  debug: () => {},
  warn: (message, data) => console.warn(`[LinearTrackerClient] ${message}`, data ?? ''),
}

export interface LinearTrackerClientConfig {
  apiKey: string
  /** Override the API endpoint (self-hosted proxies, tests) */
  baseUrl?: string
  /** Restrict listings to one team, by key (e.g. "ENG") */
  teamKey?: string
  /** Repository used for issues without a `repo:` label */
  defaultRepo: string
  statusNames?: Partial<StatusNameMap>
  retry?: RetryConfig
  rateLimit?: Partial<TokenBucketConfig>
  rateLimiter?: RateLimiterStrategy
  openMergeRequest?: MergeRequestOpener
  logger?: TrackerLogger
  /** Pre-built SDK client; built from apiKey when omitted */
  linearClient?: LinearClient
}

// ---------------------------------------------------------------------------
// GraphQL documents and response schemas
// ---------------------------------------------------------------------------

const ISSUE_FIELDS = `
  id
  identifier
  title
  description
  url
  team { id }
  state { name }
  assignee { id }
  labels(first: 50) { nodes { id name } }
  inverseRelations(first: 100) { nodes { type issue { id } } }
`

const IssueNodeSchema = z.object({
  id: z.string(),
  identifier: z.string(),
  title: z.string(),
  description: z.string().nullish(),
  url: z.string(),
  team: z.object({ id: z.string() }).nullish(),
  state: z.object({ name: z.string() }).nullish(),
  assignee: z.object({ id: z.string() }).nullish(),
  labels: z.object({
    nodes: z.array(z.object({ id: z.string(), name: z.string() })),
  }),
  inverseRelations: z.object({
    nodes: z.array(
      z.object({
        type: z.string(),
        issue: z.object({ id: z.string() }).nullish(),
      })
    ),
  }),
})

type IssueNode = z.infer<typeof IssueNodeSchema>

const PageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullish(),
})

const IssuesResponseSchema = z.object({
  issues: z.object({
    nodes: z.array(IssueNodeSchema),
    pageInfo: PageInfoSchema,
  }),
})

const IssueResponseSchema = z.object({
  issue: IssueNodeSchema.nullish(),
})

const CommentsResponseSchema = z.object({
  issue: z
    .object({
      comments: z.object({
        nodes: z.array(
          z.object({
            id: z.string(),
            body: z.string(),
            createdAt: z.string(),
            user: z.object({ name: z.string().nullish(), email: z.string().nullish() }).nullish(),
          })
        ),
        pageInfo: PageInfoSchema,
      }),
    })
    .nullish(),
})

const TeamStatesResponseSchema = z.object({
  team: z
    .object({
      states: z.object({
        nodes: z.array(z.object({ id: z.string(), name: z.string() })),
      }),
    })
    .nullish(),
})

const LabelsResponseSchema = z.object({
  issueLabels: z.object({
    nodes: z.array(
      z.object({
        id: z.string(),
        name: z.string(),
        team: z.object({ id: z.string() }).nullish(),
      })
    ),
  }),
})

const UsersResponseSchema = z.object({
  users: z.object({
    nodes: z.array(z.object({ id: z.string() })),
  }),
})

const PAGE_SIZE = 50

/**
 * Linear implementation of the tracker contract.
 *
 * Reads go through the SDK's raw GraphQL channel and are validated with zod;
 * writes use the SDK mutations. Every request takes a rate-limit token and
 * runs under bounded exponential backoff.
 */
export class LinearTrackerClient implements TrackerClient {
  private readonly client: LinearClient
  private readonly retryConfig: Required<RetryConfig>
  private readonly rateLimiter: RateLimiterStrategy
  private readonly statusNames: StatusNameMap
  private readonly mergeRequestOpener: MergeRequestOpener
  private readonly logger: TrackerLogger
  private readonly stateCache = new Map<string, Map<IssueStatus, string>>()
  private readonly userCache = new Map<string, string>()

  constructor(private readonly config: LinearTrackerClientConfig) {
    this.client =
      config.linearClient ??
      new LinearClient({
        apiKey: config.apiKey,
        ...(config.baseUrl && { apiUrl: config.baseUrl }),
      })
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry }
    this.rateLimiter = config.rateLimiter ?? new TokenBucket(config.rateLimit)
    this.statusNames = { ...DEFAULT_STATUS_NAMES, ...config.statusNames }
    this.mergeRequestOpener = config.openMergeRequest ?? createGhMergeRequestOpener()
    this.logger = config.logger ?? consoleLogger
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retryTrackerCall(operation, fn, {
      config: this.retryConfig,
      retryAfterMs: extractRetryAfterMs,
      onBackoff: ({ attempt, maxRetries, delayMs, error, rateLimited }) => {
        if (rateLimited) {
          this.logger.warn('Rate limited by Linear API, backing off', { operation, seconds: delayMs / 1000 })
          this.rateLimiter.penalize(delayMs / 1000)
          return
        }
        this.logger.warn(`Retry attempt ${attempt + 1}/${maxRetries}`, { operation, delayMs, error: error.message })
      },
    })
  }

  /**
   * One rate-limited GraphQL read, validated against `schema`
   */
  private async query<T>(
    document: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T>
  ): Promise<T> {
    await this.rateLimiter.acquire()
    const response = await this.client.client.rawRequest<unknown, Record<string, unknown>>(document, variables)
    const parsed = schema.safeParse(response.data)
    if (!parsed.success) {
      throw new TrackerResponseError(
        'Unexpected response shape from Linear',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      )
    }
    return parsed.data
  }

  private toIssue(node: IssueNode): Issue | null {
    const stateName = node.state?.name
    const status = stateName ? statusFromStateName(stateName, this.statusNames) : null
    if (!status) {
      this.logger.debug('Skipping issue in unmapped state', { issue: node.identifier, state: stateName })
      return null
    }
    return createIssue(
      {
        id: node.id,
        identifier: node.identifier,
        title: node.title,
        body: node.description ?? '',
        status,
        labels: node.labels.nodes.map((label) => label.name),
        assignee: node.assignee?.id ?? null,
        blockingIds: node.inverseRelations.nodes
          .filter((relation) => relation.type === 'blocks')
          .flatMap((relation) => (relation.issue ? [relation.issue.id] : [])),
        url: node.url,
      },
      this.config.defaultRepo
    )
  }

  private async fetchIssueNode(id: string): Promise<IssueNode | null> {
    try {
      const data = await this.query(
        `query DroverIssue($id: String!) { issue(id: $id) { ${ISSUE_FIELDS} } }`,
        { id },
        IssueResponseSchema
      )
      return data.issue ?? null
    } catch (error) {
      if (error instanceof Error && /entity not found/i.test(error.message)) {
        return null
      }
      throw error
    }
  }

  private async requireIssueNode(id: string): Promise<IssueNode> {
    const node = await this.fetchIssueNode(id)
    if (!node) {
      throw new TrackerNotFoundError(`Issue not found: ${id}`, 'issue', id)
    }
    return node
  }

  private async stateIdFor(teamId: string, status: IssueStatus): Promise<string> {
    let states = this.stateCache.get(teamId)
    if (!states) {
      const data = await this.query(
        'query DroverTeamStates($id: String!) { team(id: $id) { states { nodes { id name } } } }',
        { id: teamId },
        TeamStatesResponseSchema
      )
      states = new Map()
      for (const state of data.team?.states.nodes ?? []) {
        const mapped = statusFromStateName(state.name, this.statusNames)
        if (mapped && !states.has(mapped)) states.set(mapped, state.id)
      }
      this.stateCache.set(teamId, states)
    }

    const stateId = states.get(status)
    if (!stateId) {
      throw new TrackerNotFoundError(
        `Workflow state "${this.statusNames[status]}" not found in team ${teamId}`,
        'state',
        this.statusNames[status]
      )
    }
    return stateId
  }

  private async updateIssue(
    id: string,
    input: Parameters<LinearClient['updateIssue']>[1]
  ): Promise<void> {
    await this.rateLimiter.acquire()
    const payload = await this.client.updateIssue(id, input)
    if (!payload.success) {
      throw new TrackerApiError(`Failed to update issue: ${id}`, 400)
    }
  }

  async listIssues(filter: ListIssuesFilter): Promise<Issue[]> {
    return this.withRetry('listIssues', async () => {
      const stateFilter = { name: { in: filter.statuses.map((status) => this.statusNames[status]) } }
      const issueFilter: Record<string, unknown> = { state: stateFilter }
      if (this.config.teamKey) {
        issueFilter.team = { key: { eq: this.config.teamKey } }
      }

      const nodes: IssueNode[] = []
      let after: string | null = null
      do {
        const data: z.infer<typeof IssuesResponseSchema> = await this.query(
          `query DroverIssues($filter: IssueFilter, $after: String) {
            issues(filter: $filter, first: ${PAGE_SIZE}, after: $after) {
              nodes { ${ISSUE_FIELDS} }
              pageInfo { hasNextPage endCursor }
            }
          }`,
          { filter: issueFilter, after },
          IssuesResponseSchema
        )
        nodes.push(...data.issues.nodes)
        after = data.issues.pageInfo.hasNextPage ? data.issues.pageInfo.endCursor ?? null : null
      } while (after)

      const required = filter.labels ?? []
      return nodes
        .map((node) => this.toIssue(node))
        .filter((issue): issue is Issue => issue !== null)
        .filter((issue) => required.every((label) => issue.labels.has(label)))
    })
  }

  async getIssue(id: string): Promise<Issue | null> {
    return this.withRetry('getIssue', async () => {
      const node = await this.fetchIssueNode(id)
      return node ? this.toIssue(node) : null
    })
  }

  async getBlockingIds(id: string): Promise<string[]> {
    return this.withRetry('getBlockingIds', async () => {
      const node = await this.requireIssueNode(id)
      return node.inverseRelations.nodes
        .filter((relation) => relation.type === 'blocks')
        .flatMap((relation) => (relation.issue ? [relation.issue.id] : []))
    })
  }

  async compareAndSetStatus(
    id: string,
    expected: readonly IssueStatus[],
    next: IssueStatus
  ): Promise<CompareAndSetResult> {
    // The read sits inside the retried closure so a retry re-checks the
    // precondition instead of replaying the write.
    return this.withRetry('compareAndSetStatus', async () => {
      const node = await this.requireIssueNode(id)
      const current = node.state ? statusFromStateName(node.state.name, this.statusNames) : null
      if (!current || !expected.includes(current)) {
        return { applied: false, current }
      }
      if (!node.team) {
        throw new TrackerNotFoundError(`Issue ${id} has no team`, 'state', next)
      }
      const stateId = await this.stateIdFor(node.team.id, next)
      await this.updateIssue(id, { stateId })
      return { applied: true, current: next }
    })
  }

  async setStatus(id: string, status: IssueStatus): Promise<void> {
    return this.withRetry('setStatus', async () => {
      const node = await this.requireIssueNode(id)
      if (!node.team) {
        throw new TrackerNotFoundError(`Issue ${id} has no team`, 'state', status)
      }
      const stateId = await this.stateIdFor(node.team.id, status)
      await this.updateIssue(id, { stateId })
    })
  }

  async listComments(id: string): Promise<TrackerComment[]> {
    return this.withRetry('listComments', async () => {
      const comments: TrackerComment[] = []
      let after: string | null = null
      do {
        const data: z.infer<typeof CommentsResponseSchema> = await this.query(
          `query DroverComments($id: String!, $after: String) {
            issue(id: $id) {
              comments(first: ${PAGE_SIZE}, after: $after) {
                nodes { id body createdAt user { name email } }
                pageInfo { hasNextPage endCursor }
              }
            }
          }`,
          { id, after },
          CommentsResponseSchema
        )
        if (!data.issue) {
          throw new TrackerNotFoundError(`Issue not found: ${id}`, 'issue', id)
        }
        for (const node of data.issue.comments.nodes) {
          comments.push({
            id: node.id,
            body: node.body,
            createdAt: new Date(node.createdAt),
            author: node.user?.name ?? node.user?.email ?? null,
          })
        }
        const pageInfo = data.issue.comments.pageInfo
        after = pageInfo.hasNextPage ? pageInfo.endCursor ?? null : null
      } while (after)

      return comments.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
    })
  }

  async postComment(id: string, body: string): Promise<TrackerComment> {
    return this.withRetry('postComment', async () => {
      await this.rateLimiter.acquire()
      const payload = await this.client.createComment({ issueId: id, body })
      if (!payload.success) {
        throw new TrackerApiError(`Failed to create comment on issue: ${id}`, 400)
      }
      const comment = await payload.comment
      if (!comment) {
        throw new TrackerApiError(`Comment created but not returned for issue: ${id}`, 500)
      }
      return { id: comment.id, body: comment.body, createdAt: comment.createdAt, author: null }
    })
  }

  async updateComment(commentId: string, body: string): Promise<void> {
    return this.withRetry('updateComment', async () => {
      await this.rateLimiter.acquire()
      const payload = await this.client.updateComment(commentId, { body })
      if (!payload.success) {
        throw new TrackerApiError(`Failed to update comment: ${commentId}`, 400)
      }
    })
  }

  private async resolveUserId(userRef: string): Promise<string> {
    if (!userRef.includes('@')) return userRef
    const cached = this.userCache.get(userRef)
    if (cached) return cached

    const data = await this.query(
      'query DroverUser($email: String!) { users(filter: { email: { eq: $email } }) { nodes { id } } }',
      { email: userRef },
      UsersResponseSchema
    )
    const user = data.users.nodes[0]
    if (!user) {
      throw new TrackerNotFoundError(`User not found: ${userRef}`, 'user', userRef)
    }
    this.userCache.set(userRef, user.id)
    return user.id
  }

  async assign(id: string, userRef: string): Promise<void> {
    return this.withRetry('assign', async () => {
      const assigneeId = await this.resolveUserId(userRef)
      await this.updateIssue(id, { assigneeId })
    })
  }

  async unassign(id: string): Promise<void> {
    return this.withRetry('unassign', async () => {
      await this.updateIssue(id, { assigneeId: null })
    })
  }

  async addLabels(id: string, names: readonly string[]): Promise<void> {
    if (names.length === 0) return
    return this.withRetry('addLabels', async () => {
      const node = await this.requireIssueNode(id)
      const present = new Set(node.labels.nodes.map((label) => label.name))
      const missing = names.filter((name) => !present.has(name))
      if (missing.length === 0) return

      const data = await this.query(
        'query DroverLabels($names: [String!]) { issueLabels(filter: { name: { in: $names } }, first: 100) { nodes { id name team { id } } } }',
        { names: missing },
        LabelsResponseSchema
      )
      const teamId = node.team?.id
      const addedLabelIds = missing.map((name) => {
        const candidates = data.issueLabels.nodes.filter((label) => label.name === name)
        const label =
          candidates.find((c) => c.team?.id === teamId) ?? candidates.find((c) => !c.team)
        if (!label) {
          throw new TrackerNotFoundError(`Label not found: ${name}`, 'label', name)
        }
        return label.id
      })
      await this.updateIssue(id, { addedLabelIds })
    })
  }

  async removeLabels(id: string, names: readonly string[]): Promise<void> {
    if (names.length === 0) return
    return this.withRetry('removeLabels', async () => {
      const node = await this.requireIssueNode(id)
      const removedLabelIds = node.labels.nodes
        .filter((label) => names.includes(label.name))
        .map((label) => label.id)
      if (removedLabelIds.length === 0) return
      await this.updateIssue(id, { removedLabelIds })
    })
  }

  /**
   * Open the request with the configured opener, then link it on the issue
   */
  async openMergeRequest(input: MergeRequestInput): Promise<MergeRequestResult> {
    const result = await this.mergeRequestOpener(input)
    await this.withRetry('linkMergeRequest', async () => {
      await this.rateLimiter.acquire()
      const payload = await this.client.createAttachment({
        issueId: input.issueId,
        url: result.url,
        title: `Pull request: ${input.branch}`,
      })
      if (!payload.success) {
        throw new TrackerApiError(`Failed to link pull request on issue: ${input.issueId}`, 400)
      }
    })
    return result
  }
}
