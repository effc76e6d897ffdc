#!/usr/bin/env node
/**
 * drover status
 *
 * Shows local workspaces and, with LINEAR_API_KEY set, agent issue counts.
 */

import path from 'path'
import { config } from 'dotenv'

config({ path: path.resolve(process.cwd(), '.env.local') })

import { errorMessage, isConfigurationError } from '@drover/core'
import { formatStatusReport, runStatus } from './lib/status-runner.js'

async function main(): Promise<void> {
  const report = await runStatus({ linearApiKey: process.env.LINEAR_API_KEY })
  console.log(formatStatusReport(report))
}

main().catch((error: unknown) => {
  console.error(`${isConfigurationError(error) ? 'Configuration error' : 'Error'}: ${errorMessage(error)}`)
  process.exit(1)
})
