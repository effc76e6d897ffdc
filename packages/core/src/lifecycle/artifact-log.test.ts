import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { appendFileSync, readFileSync } from 'fs'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { ArtifactLog, MAX_OUTPUT_CHARS, sessionOutputEntry } from './artifact-log.js'
import { createLogger } from '../logger.js'

let dir: string

function artifactLog(): ArtifactLog {
  return new ArtifactLog(join(dir, 'logs'), {
    now: () => new Date('2026-03-02T09:00:00.000Z'),
    logger: createLogger({}, { minLevel: 'error' }),
  })
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'drover-artifacts-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('ArtifactLog', () => {
  it('appends one JSON line per entry and creates the directory', () => {
    const log = artifactLog()
    log.record('ENG-1', { type: 'transition', from: 'selecting', to: 'claiming' })
    log.record('ENG-1', { type: 'transition', from: 'claiming', to: 'preparing' })

    const lines = readFileSync(join(dir, 'logs', 'ENG-1.jsonl'), 'utf-8').split('\n')
    expect(lines).toEqual([
      '{"timestamp":"2026-03-02T09:00:00.000Z","type":"transition","from":"selecting","to":"claiming"}',
      '{"timestamp":"2026-03-02T09:00:00.000Z","type":"transition","from":"claiming","to":"preparing"}',
      '',
    ])
  })

  it('keeps separate files per issue', () => {
    const log = artifactLog()
    log.record('ENG-1', { type: 'outcome', outcome: { kind: 'cancelled' } })
    log.record('ENG-2', sessionOutputEntry('drover-eng-2', 'ok\n'))

    expect(log.read('ENG-1')).toEqual([{ timestamp: '2026-03-02T09:00:00.000Z', type: 'outcome', outcome: { kind: 'cancelled' } }])
    expect(log.read('ENG-2')).toEqual([
      { timestamp: '2026-03-02T09:00:00.000Z', type: 'session_output', session: 'drover-eng-2', output: 'ok\n', truncated: false },
    ])
  })

  it('returns nothing for an issue without a log', () => {
    expect(artifactLog().read('ENG-9')).toEqual([])
  })

  it('skips lines that do not parse', () => {
    const log = artifactLog()
    log.record('ENG-1', { type: 'transition', from: 'selecting', to: 'claiming' })
    appendFileSync(log.pathFor('ENG-1'), '{"timestamp":"2026-03\n{"type":"unknown","timestamp":"x"}\n')
    log.record('ENG-1', { type: 'outcome', outcome: { kind: 'cancelled' } })

    expect(log.read('ENG-1').map((record) => record.type)).toEqual(['transition', 'outcome'])
  })
})

describe('sessionOutputEntry', () => {
  it('keeps the tail of long output', () => {
    const output = 'a'.repeat(10) + 'b'.repeat(MAX_OUTPUT_CHARS)
    const entry = sessionOutputEntry('drover-eng-1', output)
    expect(entry).toEqual({ type: 'session_output', session: 'drover-eng-1', output: 'b'.repeat(MAX_OUTPUT_CHARS), truncated: true })
  })
})
