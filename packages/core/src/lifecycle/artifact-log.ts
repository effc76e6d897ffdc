/**
 * Artifact Log
 *
 * Per-issue history of every lifecycle run in JSON Lines format: phase
 * transitions, the session output captured before the session is killed,
 * and the final outcome. Runs for the same issue append to the same file.
 *
 * Stored at: <workspaceRoot>/logs/<identifier>.jsonl, beside the worktrees,
 * so the history survives workspace cleanup.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../logger.js'
import type { LifecycleOutcome, LifecyclePhase } from './types.js'

/** Session output beyond this many characters keeps only its tail */
export const MAX_OUTPUT_CHARS = 20_000

export type ArtifactEntry =
  | { type: 'transition'; from: LifecyclePhase; to: LifecyclePhase; detail?: string }
  | { type: 'session_output'; session: string; output: string; truncated: boolean }
  | { type: 'outcome'; outcome: LifecycleOutcome }

const ArtifactRecordSchema = z
  .object({
    timestamp: z.string(),
    type: z.enum(['transition', 'session_output', 'outcome']),
  })
  .passthrough()

export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>

export interface ArtifactLogOptions {
  logger?: Logger
  now?: () => Date
}

export function sessionOutputEntry(session: string, output: string): ArtifactEntry {
  const truncated = output.length > MAX_OUTPUT_CHARS
  return {
    type: 'session_output',
    session,
    output: truncated ? output.slice(-MAX_OUTPUT_CHARS) : output,
    truncated,
  }
}

export class ArtifactLog {
  private readonly log: Logger
  private readonly now: () => Date

  constructor(
    private readonly dir: string,
    options: ArtifactLogOptions = {}
  ) {
    this.log = options.logger ?? createLogger()
    this.now = options.now ?? (() => new Date())
  }

  pathFor(identifier: string): string {
    return join(this.dir, `${identifier}.jsonl`)
  }

  /**
   * Append one entry. A write failure is logged and does not interrupt the
   * lifecycle.
   */
  record(identifier: string, entry: ArtifactEntry): void {
    try {
      mkdirSync(this.dir, { recursive: true })
      appendFileSync(this.pathFor(identifier), JSON.stringify({ timestamp: this.now().toISOString(), ...entry }) + '\n')
    } catch (error) {
      this.log.warn('Could not write artifact log', { path: this.pathFor(identifier), error: errorMessage(error) })
    }
  }

  /**
   * Every entry recorded for the issue, oldest first. Lines that do not
   * parse (a write cut short by a crash) are skipped.
   */
  read(identifier: string): ArtifactRecord[] {
    const path = this.pathFor(identifier)
    if (!existsSync(path)) return []

    const records: ArtifactRecord[] = []
    for (const line of readFileSync(path, 'utf-8').split('\n')) {
      if (!line.trim()) continue
      let data: unknown
      try {
        data = JSON.parse(line)
      } catch {
        continue
      }
      const parsed = ArtifactRecordSchema.safeParse(data)
      if (parsed.success) records.push(parsed.data)
    }
    return records
  }
}
