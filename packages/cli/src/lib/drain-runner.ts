/**
 * Drain Runner -- Programmatic API for the drain CLI.
 *
 * Exports `runDrain()` so a drain can be started from code (tests, custom
 * scripts) without going through process.argv / process.env / process.exit.
 */

import {
  ConfigurationError,
  createLoggerForConfig,
  createOrchestrator,
  loadDroverConfig,
  type GitRunner,
  type LifecycleEvents,
  type Logger,
  type PoolCandidate,
  type PoolRunSummary,
  type SessionHost,
} from '@drover/core'
import type { ExecutionTarget, TrackerClient } from '@drover/linear'
import { resolveTracker } from './tracker.js'

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface DrainArgs {
  max?: number
  target?: ExecutionTarget | 'any'
  limit?: number
  continuous: boolean
  dryRun: boolean
  help: boolean
}

export interface DrainRunnerConfig extends Omit<DrainArgs, 'help'> {
  /** Directory holding .drover/config.yaml (default: cwd) */
  root?: string
  /** Required unless `tracker` is given */
  linearApiKey?: string
  env?: NodeJS.ProcessEnv
  tracker?: TrackerClient
  host?: SessionHost
  git?: GitRunner
  logger?: Logger
  events?: LifecycleEvents
}

export interface DrainRunnerResult {
  /** Null for a dry run */
  summary: PoolRunSummary | null
  /** What a dry run would pick up; empty otherwise */
  candidates: PoolCandidate[]
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function positiveInt(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${flag} expects a positive integer, got "${value ?? ''}"`)
  }
  return parsed
}

export function parseDrainArgs(args: readonly string[]): DrainArgs {
  const result: DrainArgs = { continuous: false, dryRun: false, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--max':
        result.max = positiveInt('--max', args[++i])
        break
      case '--limit':
        result.limit = positiveInt('--limit', args[++i])
        break
      case '--target': {
        const value = args[++i]
        if (value !== 'local' && value !== 'remote' && value !== 'any') {
          throw new ConfigurationError(`--target expects local, remote or any, got "${value ?? ''}"`)
        }
        result.target = value
        break
      }
      case '--continuous':
        result.continuous = true
        break
      case '--dry-run':
        result.dryRun = true
        break
      case '--help':
      case '-h':
        result.help = true
        break
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`)
    }
  }

  return result
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export async function runDrain(config: DrainRunnerConfig): Promise<DrainRunnerResult> {
  const env = config.env ?? process.env
  const droverConfig = loadDroverConfig(config.root ?? process.cwd(), env)
  const logger = config.logger ?? createLoggerForConfig(droverConfig)
  const tracker = resolveTracker(config, droverConfig, logger)

  const orchestrator = createOrchestrator(droverConfig, {
    tracker,
    host: config.host,
    git: config.git,
    logger,
    events: config.events,
  })
  const target = config.target ?? droverConfig.pool.target

  if (config.dryRun) {
    const candidates = await orchestrator.pool.candidates(target)
    return { summary: null, candidates }
  }

  // Ctrl-C stops sessions and gives claims back before exiting
  const sigintHandler = (): void => {
    orchestrator.pool.stop()
  }
  process.on('SIGINT', sigintHandler)

  try {
    const summary = await orchestrator.pool.run({
      maxConcurrency: config.max ?? droverConfig.pool.maxConcurrency,
      target,
      mode: config.continuous ? 'continuous' : 'drain',
      limit: config.limit,
    })
    return { summary, candidates: [] }
  } finally {
    process.removeListener('SIGINT', sigintHandler)
  }
}
