import {
  ConfigurationError,
  createLinearTracker,
  type DroverConfig,
  type Logger,
} from '@drover/core'
import type { TrackerClient } from '@drover/linear'

export interface TrackerSource {
  tracker?: TrackerClient
  linearApiKey?: string
}

/**
 * The injected tracker, or a Linear client built from the API key
 *
 * @throws {ConfigurationError} when neither is available
 */
export function resolveTracker(source: TrackerSource, config: DroverConfig, logger: Logger): TrackerClient {
  if (source.tracker) return source.tracker
  if (!source.linearApiKey) {
    throw new ConfigurationError('LINEAR_API_KEY environment variable is required')
  }
  return createLinearTracker(config, source.linearApiKey, logger)
}
