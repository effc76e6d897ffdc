/**
 * Dependency Resolver
 *
 * An issue is eligible only when every issue blocking it is Done. Blockers
 * that cannot be read count as not Done. Cycles are a configuration error:
 * they can never resolve, so they are reported instead of silently skipped.
 */

import type { Issue, TrackerClient } from '@drover/linear'
import { DependencyCycleError, errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'

export interface DependencyGraph {
  /** Every issue reachable through blocking edges, by id */
  readonly issues: ReadonlyMap<string, Issue>
  /** Ids that could not be read */
  readonly missing: ReadonlySet<string>
}

type Colour = 'white' | 'gray' | 'black'

/**
 * Find a cycle reachable from `rootId`, following blocker edges.
 * Returns the cycle as identifiers (first element repeated at the end), or
 * null. Diamonds are not cycles.
 */
export function findCycle(rootId: string, graph: DependencyGraph): string[] | null {
  const colour = new Map<string, Colour>()
  const stack: string[] = []

  const label = (id: string): string => graph.issues.get(id)?.identifier ?? id

  const visit = (id: string): string[] | null => {
    colour.set(id, 'gray')
    stack.push(id)
    for (const next of graph.issues.get(id)?.blockingIds ?? []) {
      const state = colour.get(next) ?? 'white'
      if (state === 'gray') {
        return [...stack.slice(stack.indexOf(next)), next].map(label)
      }
      if (state === 'white') {
        const found = visit(next)
        if (found) return found
      }
    }
    stack.pop()
    colour.set(id, 'black')
    return null
  }

  return visit(rootId)
}

/**
 * True iff every blocker of `issue` is present in the graph and Done.
 *
 * @throws {DependencyCycleError} when a cycle is reachable from the issue
 */
export function eligible(issue: Issue, graph: DependencyGraph): boolean {
  const withRoot: DependencyGraph = graph.issues.has(issue.id)
    ? graph
    : { issues: new Map([...graph.issues, [issue.id, issue]]), missing: graph.missing }
  const cycle = findCycle(issue.id, withRoot)
  if (cycle) {
    throw new DependencyCycleError(cycle)
  }

  for (const blockerId of issue.blockingIds) {
    const blocker = graph.issues.get(blockerId)
    if (!blocker || blocker.status !== 'Done') {
      return false
    }
  }
  return true
}

/**
 * Breadth-first load of every issue reachable from `roots` through blocking
 * edges. Each issue is fetched at most once; read failures are recorded as
 * missing nodes.
 */
export async function loadDependencyGraph(
  tracker: TrackerClient,
  roots: readonly Issue[],
  logger?: Logger
): Promise<DependencyGraph> {
  const issues = new Map<string, Issue>()
  const missing = new Set<string>()
  const queue: string[] = []

  for (const root of roots) {
    issues.set(root.id, root)
  }
  for (const root of roots) {
    queue.push(...root.blockingIds)
  }

  while (queue.length > 0) {
    const id = queue.shift()
    if (id === undefined || issues.has(id) || missing.has(id)) continue

    try {
      const issue = await tracker.getIssue(id)
      if (issue) {
        issues.set(id, issue)
        queue.push(...issue.blockingIds)
      } else {
        missing.add(id)
      }
    } catch (error) {
      logger?.warn('Could not read blocking issue; treating it as not done', {
        blockerId: id,
        error: errorMessage(error),
      })
      missing.add(id)
    }
  }

  return { issues, missing }
}

/**
 * Filters candidates down to those whose blockers are all Done
 */
export class DependencyResolver {
  constructor(
    private readonly tracker: TrackerClient,
    private readonly logger?: Logger
  ) {}

  /**
   * @throws {DependencyCycleError} when any candidate sits on a cycle
   */
  async selectEligible(candidates: readonly Issue[]): Promise<Issue[]> {
    const graph = await loadDependencyGraph(this.tracker, candidates, this.logger)
    return candidates.filter((issue) => {
      const ok = eligible(issue, graph)
      if (!ok) {
        this.logger?.debug('Skipping issue with unfinished blockers', {
          issue: issue.identifier,
          blockers: [...issue.blockingIds].join(','),
        })
      }
      return ok
    })
  }
}
