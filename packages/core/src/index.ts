// Orchestrator
export {
  createOrchestrator,
  createLinearTracker,
  createLoggerForConfig,
  createSessionHost,
  lifecycleSettings,
} from './orchestrator/orchestrator.js'
export type { Orchestrator, OrchestratorDeps, CleanupOptions } from './orchestrator/orchestrator.js'

// Configuration
export {
  DroverConfigSchema,
  CONFIG_DIR,
  CONFIG_FILE,
  parseDroverConfig,
  loadDroverConfig,
  applyEnvOverrides,
  getMaxConcurrencyFromEnv,
  getPollIntervalFromEnv,
  getTargetFromEnv,
  getLogLevelFromEnv,
} from './config/drover-config.js'
export type { DroverConfig, DroverConfigInput } from './config/drover-config.js'

// Errors
export {
  DroverError,
  ConfigurationError,
  DependencyCycleError,
  WorkspaceError,
  SessionError,
  isDroverError,
  isConfigurationError,
  isDependencyCycleError,
  errorMessage,
} from './errors.js'

// Logging
export { Logger, createLogger, logger, isLogLevel, LOG_LEVELS } from './logger.js'
export type { LogLevel, LoggerContext, LoggerOptions, StatusName } from './logger.js'

// Claims
export { ClaimManager, RELEASE_STATUS, defaultOwnerId, isClaimed, pendingAnswer } from './claims/claim-manager.js'
export type {
  ClaimRecord,
  AlreadyClaimed,
  AlreadyClaimedReason,
  ClaimResult,
  ReleaseOutcome,
  ReleaseResult,
  ClaimPlacement,
  ClaimManagerOptions,
} from './claims/claim-manager.js'

// Dependencies
export { DependencyResolver, eligible, findCycle, loadDependencyGraph } from './dependencies/dependency-resolver.js'
export type { DependencyGraph } from './dependencies/dependency-resolver.js'

// Comment protocols
export {
  BLOCKED_PREFIX,
  ANSWER_PREFIX,
  parseBlockedComment,
  parseAnswerComment,
  latestExchange,
  blockedSince,
  formatBlockedComment,
} from './protocol/comments.js'
export type { BlockedQuestion, Answer, ProtocolExchange } from './protocol/comments.js'
export { parseClaimMarker, parseReleaseMarker, liveClaims } from './protocol/markers.js'
export type { ClaimMarker, ReleaseMarker, ClaimEntry } from './protocol/markers.js'

// Workspaces
export { WorkspaceManager, TERMINAL_STATES, slugify } from './workspace/workspace-manager.js'
export type {
  Workspace,
  TerminalState,
  RepositorySource,
  WorkspaceManagerOptions,
  CleanupPolicy,
  CleanupReport,
} from './workspace/workspace-manager.js'
export { CliGitRunner } from './workspace/git.js'
export type { GitRunner } from './workspace/git.js'
export {
  TASK_FILE,
  MARKER_FILE,
  ANSWERS_FILE,
  CompletionMarkerSchema,
  parseCompletionMarker,
  markerOutcome,
  isRefusal,
  REFUSAL_PHRASES,
} from './workspace/completion-marker.js'
export type { CompletionMarker, MarkerRead, MarkerOutcome } from './workspace/completion-marker.js'

// Sessions
export { SessionController, sessionNameFor } from './session/session-controller.js'
export type { Session, SessionPoll, SessionControllerOptions } from './session/session-controller.js'
export { TmuxSessionHost } from './session/tmux-session-host.js'
export { ProcessSessionHost } from './session/process-session-host.js'
export type { SessionHost, SessionHostKind, HostSessionStatus, SessionLaunch } from './session/session-host.js'
export { decideLiveness } from './session/liveness.js'
export type { LivenessPolicy, LivenessDecision } from './session/liveness.js'
export { selectBackend, commandFor } from './session/backend.js'

// Lifecycle
export { IssueLifecycle, sleepUnlessAborted } from './lifecycle/issue-lifecycle.js'
export type { LifecycleSettings, IssueLifecycleDeps } from './lifecycle/issue-lifecycle.js'
export { buildTaskInstruction } from './lifecycle/instructions.js'
export { ArtifactLog, sessionOutputEntry, MAX_OUTPUT_CHARS } from './lifecycle/artifact-log.js'
export type { ArtifactEntry, ArtifactRecord, ArtifactLogOptions } from './lifecycle/artifact-log.js'
export type {
  LifecyclePhase,
  LifecycleOutcome,
  LifecycleOutcomeKind,
  LifecycleTransition,
  LifecycleEvents,
  LifecycleRun,
  LifecycleResult,
} from './lifecycle/types.js'

// Pool
export { AgentPool } from './pool/agent-pool.js'
export type {
  PoolMode,
  PoolRunOptions,
  PoolCandidate,
  PoolRunSummary,
  PoolStatus,
  ActiveLifecycle,
  AgentPoolDeps,
} from './pool/agent-pool.js'

// Test doubles
export { FakeSessionHost } from './testing/fake-session-host.js'
export { FakeGitRunner } from './testing/fake-git-runner.js'
