/**
 * Cleanup Runner -- Programmatic API for the workspace cleanup CLI.
 *
 * Exports `runCleanup()` so terminal workspaces can be removed from code
 * without going through process.argv / process.env / process.exit.
 */

import {
  ConfigurationError,
  createLoggerForConfig,
  createOrchestrator,
  loadDroverConfig,
  type CleanupReport,
  type GitRunner,
  type Logger,
  type SessionHost,
} from '@drover/core'
import type { TrackerClient } from '@drover/linear'
import { resolveTracker } from './tracker.js'

export interface CleanupArgs {
  dryRun: boolean
  retentionHours?: number
  /** Remove Blocked, Failed and InReview workspaces too */
  allTerminal: boolean
  help: boolean
}

export interface CleanupRunnerConfig extends Omit<CleanupArgs, 'help'> {
  /** Directory holding .drover/config.yaml (default: cwd) */
  root?: string
  /** Needed to check whether an issue is still claimed */
  linearApiKey?: string
  env?: NodeJS.ProcessEnv
  tracker?: TrackerClient
  host?: SessionHost
  git?: GitRunner
  logger?: Logger
}

export function parseCleanupArgs(args: readonly string[]): CleanupArgs {
  const result: CleanupArgs = { dryRun: false, allTerminal: false, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--dry-run':
        result.dryRun = true
        break
      case '--retention-hours': {
        const value = args[++i]
        const hours = value === undefined ? NaN : Number(value)
        if (!Number.isFinite(hours) || hours < 0) {
          throw new ConfigurationError(`--retention-hours expects a non-negative number, got "${value ?? ''}"`)
        }
        result.retentionHours = hours
        break
      }
      case '--all-terminal':
        result.allTerminal = true
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

export async function runCleanup(config: CleanupRunnerConfig): Promise<CleanupReport> {
  const env = config.env ?? process.env
  const droverConfig = loadDroverConfig(config.root ?? process.cwd(), env)
  const logger = config.logger ?? createLoggerForConfig(droverConfig)
  const tracker = resolveTracker(config, droverConfig, logger)

  const orchestrator = createOrchestrator(droverConfig, { tracker, host: config.host, git: config.git, logger })
  return orchestrator.cleanup({
    dryRun: config.dryRun,
    retentionHours: config.retentionHours,
    allTerminal: config.allTerminal,
  })
}
