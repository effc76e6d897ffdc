/**
 * Orchestrator Configuration
 *
 * Loads and validates the declarative .drover/config.yaml file, then layers
 * DROVER_* environment overrides on top. Everything the lifecycle needs
 * (liveness thresholds, backends, reviewer, repositories) lives here.
 */

import { z } from 'zod'
import { readFileSync, existsSync } from 'fs'
import { resolve, isAbsolute } from 'path'
import YAML from 'yaml'
import { ConfigurationError } from '../errors.js'
import { isLogLevel, type LogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Zod Schema
// ---------------------------------------------------------------------------

const StateName = z.string().min(1).optional()

const StatusNamesSchema = z
  .object({
    Backlog: StateName,
    Ready: StateName,
    InProgress: StateName,
    Blocked: StateName,
    InReview: StateName,
    Done: StateName,
  })
  .strict()

const RepositorySchema = z.object({
  /** Clone URL of the source repository */
  url: z.string().min(1),
  baseBranch: z.string().default('main'),
})

const BackendChoiceSchema = z.object({
  backend: z.string().min(1),
  model: z.string().optional(),
})

export const DroverConfigSchema = z.object({
  apiVersion: z.literal('v1'),
  kind: z.literal('DroverConfig'),

  tracker: z
    .object({
      /** Restrict to one Linear team, by key */
      teamKey: z.string().optional(),
      /** Repository for issues without a `repo:` label */
      defaultRepo: z.string().min(1),
      /** Tracker state names, keyed by orchestrator status */
      statusNames: StatusNamesSchema.optional(),
      /** When set, only issues carrying this label are picked up; removed on Blocked */
      agentLabel: z.string().min(1).optional(),
      /** User id or email that Blocked and Failed issues are handed to */
      reviewer: z.string().min(1).optional(),
    }),

  repositories: z.record(z.string(), RepositorySchema).default({}),

  workspace: z
    .object({
      /** Root for shared clones and per-issue worktrees (relative to the config root) */
      root: z.string().default('.drover/workspaces'),
      branchPrefix: z.string().min(1).default('agent'),
    })
    .default({}),

  liveness: z
    .object({
      pollIntervalSeconds: z.number().positive().default(30),
      nudgeAfterSeconds: z.number().positive().default(900),
      nudgeIntervalSeconds: z.number().positive().default(300),
      maxNudges: z.number().int().min(0).default(3),
      maxRestarts: z.number().int().min(0).default(1),
      nudgeMessage: z
        .string()
        .default(
          'HEALTH_CHECK: please continue work on {identifier} ({title}). If blocked, post a BLOCKED comment and exit.'
        ),
      heartbeatIntervalSeconds: z.number().positive().default(60),
      claimStaleAfterSeconds: z.number().positive().default(900),
    })
    .default({}),

  cleanup: z
    .object({
      retentionHours: z.number().min(0).default(72),
      onlyDone: z.boolean().default(true),
    })
    .default({}),

  backends: z
    .object({
      /** Backend for issues without a difficulty label */
      default: z.string().min(1).default('claude'),
      /** How sessions are supervised */
      host: z.enum(['tmux', 'process']).default('tmux'),
      /** argv templates; `{model}` and `{prompt}` are substituted */
      commands: z
        .record(z.string(), z.array(z.string()).min(1))
        .default({
          claude: ['claude', '--dangerously-skip-permissions', '--model', '{model}', '{prompt}'],
          codex: ['codex', '--full-auto', '--model', '{model}', '{prompt}'],
        }),
      defaultModels: z.record(z.string(), z.string()).default({ claude: 'sonnet', codex: 'gpt-5-codex' }),
      difficulty: z
        .object({
          easy: BackendChoiceSchema.optional(),
          medium: BackendChoiceSchema.optional(),
          hard: BackendChoiceSchema.optional(),
        })
        .default({}),
      prompt: z
        .string()
        .default('Read {taskFile} in this directory and complete the task. When finished, write {markerFile} as described there.'),
    })
    .default({}),

  completion: z
    .object({
      status: z.enum(['Done', 'InReview']).default('Done'),
      openMergeRequest: z.boolean().default(true),
    })
    .default({}),

  pool: z
    .object({
      maxConcurrency: z.number().int().positive().default(2),
      target: z.enum(['local', 'remote', 'any']).default('any'),
    })
    .default({}),

  logLevel: z.string().refine(isLogLevel, { message: 'must be one of debug, info, success, warn, error' }).optional(),
}).superRefine((config, ctx) => {
  const defaultBackend = config.backends.default
  if (!config.backends.commands[defaultBackend]) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['backends', 'default'],
      message: `no command configured for default backend "${defaultBackend}"`,
    })
  }
  for (const level of ['easy', 'medium', 'hard'] as const) {
    const choice = config.backends.difficulty[level]
    if (choice && !config.backends.commands[choice.backend]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backends', 'difficulty', level, 'backend'],
        message: `no command configured for backend "${choice.backend}"`,
      })
    }
  }
})

// ---------------------------------------------------------------------------
// TypeScript Types
// ---------------------------------------------------------------------------

export type DroverConfig = z.infer<typeof DroverConfigSchema>
export type DroverConfigInput = z.input<typeof DroverConfigSchema>

export const CONFIG_DIR = '.drover'
export const CONFIG_FILE = 'config.yaml'

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

function positiveIntFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const envValue = env[name]
  if (envValue) {
    const parsed = parseInt(envValue, 10)
    if (!isNaN(parsed) && parsed > 0) {
      return parsed
    }
  }
  return undefined
}

/**
 * Parse environment variable for pool concurrency
 */
export function getMaxConcurrencyFromEnv(env: NodeJS.ProcessEnv = process.env): number | undefined {
  return positiveIntFromEnv(env, 'DROVER_MAX_CONCURRENCY')
}

/**
 * Parse environment variable for the poll interval, in seconds
 */
export function getPollIntervalFromEnv(env: NodeJS.ProcessEnv = process.env): number | undefined {
  return positiveIntFromEnv(env, 'DROVER_POLL_INTERVAL_SECONDS')
}

/**
 * Parse environment variable for the execution target
 */
export function getTargetFromEnv(env: NodeJS.ProcessEnv = process.env): 'local' | 'remote' | 'any' | undefined {
  const value = env.DROVER_TARGET?.trim().toLowerCase()
  return value === 'local' || value === 'remote' || value === 'any' ? value : undefined
}

/**
 * Parse environment variable for the log level
 */
export function getLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const value = env.DROVER_LOG_LEVEL?.trim().toLowerCase()
  return value && isLogLevel(value) ? value : undefined
}

/**
 * Apply DROVER_* overrides to a validated config
 */
export function applyEnvOverrides(config: DroverConfig, env: NodeJS.ProcessEnv = process.env): DroverConfig {
  const maxConcurrency = getMaxConcurrencyFromEnv(env)
  const target = getTargetFromEnv(env)
  const pollIntervalSeconds = getPollIntervalFromEnv(env)
  const logLevel = getLogLevelFromEnv(env)

  return {
    ...config,
    tracker: {
      ...config.tracker,
      ...(env.DROVER_TEAM_KEY && { teamKey: env.DROVER_TEAM_KEY }),
      ...(env.DROVER_REVIEWER && { reviewer: env.DROVER_REVIEWER }),
    },
    workspace: {
      ...config.workspace,
      ...(env.DROVER_WORKSPACE_ROOT && { root: env.DROVER_WORKSPACE_ROOT }),
    },
    liveness: {
      ...config.liveness,
      ...(pollIntervalSeconds !== undefined && { pollIntervalSeconds }),
    },
    pool: {
      ...config.pool,
      ...(maxConcurrency !== undefined && { maxConcurrency }),
      ...(target !== undefined && { target }),
    },
    ...(logLevel !== undefined && { logLevel }),
  }
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Validate raw config data, reporting every problem at once
 */
export function parseDroverConfig(data: unknown, source = 'config'): DroverConfig {
  const result = DroverConfigSchema.safeParse(data)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid ${source}:\n  ${problems.join('\n  ')}`, { problems })
  }
  return result.data
}

/**
 * Load .drover/config.yaml from `root`, apply environment overrides and
 * resolve the workspace root to an absolute path.
 *
 * @throws {ConfigurationError} when the file is missing or invalid
 */
export function loadDroverConfig(root: string, env: NodeJS.ProcessEnv = process.env): DroverConfig {
  const configPath = resolve(root, CONFIG_DIR, CONFIG_FILE)
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`, { configPath })
  }

  let parsed: unknown
  try {
    parsed = YAML.parse(readFileSync(configPath, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Could not parse ${configPath}: ${message}`, { configPath })
  }

  const config = applyEnvOverrides(parseDroverConfig(parsed, configPath), env)
  const workspaceRoot = isAbsolute(config.workspace.root)
    ? config.workspace.root
    : resolve(root, config.workspace.root)
  return { ...config, workspace: { ...config.workspace, root: workspaceRoot } }
}
