import { describe, it, expect } from 'vitest'
import { createIssue, InMemoryTrackerClient, TrackerApiError, type IssueInit } from '@drover/linear'
import { DependencyResolver, eligible, findCycle, loadDependencyGraph } from './dependency-resolver.js'
import { DependencyCycleError } from '../errors.js'

function issue(id: string, status: IssueInit['status'], blockingIds: string[] = []): IssueInit {
  return { id, identifier: id.toUpperCase(), title: id, status, blockingIds }
}

describe('eligible', () => {
  it('is true without blockers', async () => {
    const tracker = new InMemoryTrackerClient().seed(issue('a', 'Ready'))
    const root = tracker.peek('a')
    expect(eligible(root, await loadDependencyGraph(tracker, [root]))).toBe(true)
  })

  it('waits for every blocker to be Done', async () => {
    const tracker = new InMemoryTrackerClient().seed(
      issue('a', 'Ready', ['b', 'c']),
      issue('b', 'Done'),
      issue('c', 'InReview')
    )
    const root = tracker.peek('a')
    expect(eligible(root, await loadDependencyGraph(tracker, [root]))).toBe(false)

    await tracker.setStatus('c', 'Done')
    expect(eligible(root, await loadDependencyGraph(tracker, [root]))).toBe(true)
  })

  it('treats a missing blocker as not done', async () => {
    const tracker = new InMemoryTrackerClient().seed(issue('a', 'Ready', ['gone']))
    const root = tracker.peek('a')
    const graph = await loadDependencyGraph(tracker, [root])
    expect([...graph.missing]).toEqual(['gone'])
    expect(eligible(root, graph)).toBe(false)
  })

  it('treats an unreadable blocker as not done', async () => {
    const tracker = new InMemoryTrackerClient().seed(issue('a', 'Ready', ['b']), issue('b', 'Done'))
    tracker.failNext('getIssue', new TrackerApiError('unavailable', 503))
    const root = tracker.peek('a')
    expect(eligible(root, await loadDependencyGraph(tracker, [root]))).toBe(false)
  })

  it('accepts a diamond', async () => {
    const tracker = new InMemoryTrackerClient().seed(
      issue('a', 'Ready', ['b', 'c']),
      issue('b', 'Done', ['d']),
      issue('c', 'Done', ['d']),
      issue('d', 'Done')
    )
    const root = tracker.peek('a')
    const graph = await loadDependencyGraph(tracker, [root])
    expect(findCycle('a', graph)).toBeNull()
    expect(eligible(root, graph)).toBe(true)
  })

  it('reports a cycle with its path', async () => {
    const tracker = new InMemoryTrackerClient().seed(
      issue('a', 'Ready', ['b']),
      issue('b', 'Done', ['c']),
      issue('c', 'Done', ['b'])
    )
    const root = tracker.peek('a')
    const graph = await loadDependencyGraph(tracker, [root])

    expect(findCycle('a', graph)).toEqual(['B', 'C', 'B'])
    expect(() => eligible(root, graph)).toThrow(DependencyCycleError)
    expect(() => eligible(root, graph)).toThrow('Dependency cycle detected: B -> C -> B')
  })

  it('reports a self-block', () => {
    const root = createIssue(issue('a', 'Ready', ['a']))
    expect(() => eligible(root, { issues: new Map(), missing: new Set() })).toThrow('A -> A')
  })
})

describe('loadDependencyGraph', () => {
  it('fetches each blocker once', async () => {
    const tracker = new InMemoryTrackerClient().seed(
      issue('a', 'Ready', ['c']),
      issue('b', 'Ready', ['c']),
      issue('c', 'Done')
    )
    let reads = 0
    const original = tracker.getIssue.bind(tracker)
    tracker.getIssue = async (id: string) => {
      reads++
      return original(id)
    }

    await loadDependencyGraph(tracker, [tracker.peek('a'), tracker.peek('b')])
    expect(reads).toBe(1)
  })
})

describe('DependencyResolver', () => {
  it('keeps only eligible candidates', async () => {
    const tracker = new InMemoryTrackerClient().seed(
      issue('a', 'Ready'),
      issue('b', 'Ready', ['c']),
      issue('c', 'InProgress')
    )
    const selected = await new DependencyResolver(tracker).selectEligible([tracker.peek('a'), tracker.peek('b')])
    expect(selected.map((i) => i.id)).toEqual(['a'])
  })
})
