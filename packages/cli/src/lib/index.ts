export { runDrain, parseDrainArgs } from './drain-runner.js'
export type { DrainArgs, DrainRunnerConfig, DrainRunnerResult } from './drain-runner.js'
export { runCleanup, parseCleanupArgs } from './cleanup-runner.js'
export type { CleanupArgs, CleanupRunnerConfig } from './cleanup-runner.js'
export { runStatus, formatStatusReport } from './status-runner.js'
export type { StatusRunnerConfig, StatusReport, WorkspaceStatus } from './status-runner.js'
export { resolveTracker } from './tracker.js'
export type { TrackerSource } from './tracker.js'
