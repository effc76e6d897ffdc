#!/usr/bin/env node
/**
 * drover cleanup
 *
 * Removes workspaces whose issue reached a terminal state longer ago than
 * the retention window. Workspaces with a live session or a claimed issue
 * are kept, and so are workspaces of issues that are not yet Done.
 *
 * Usage:
 *   drover cleanup [options]
 *
 * Options:
 *   --dry-run               Show what would be removed without removing
 *   --retention-hours <n>   Override cleanup.retentionHours
 *   --all-terminal          Also remove Blocked, Failed and InReview workspaces
 */

import path from 'path'
import { config } from 'dotenv'

config({ path: path.resolve(process.cwd(), '.env.local') })

import { errorMessage, isConfigurationError } from '@drover/core'
import { parseCleanupArgs, runCleanup } from './lib/cleanup-runner.js'

function printHelp(): void {
  console.log(`
drover cleanup - Remove finished workspaces

Usage:
  drover cleanup [options]

Options:
  --dry-run               Show what would be removed without removing
  --retention-hours <n>   Override cleanup.retentionHours
  --all-terminal          Also remove Blocked, Failed and InReview workspaces
                          once their issue is Done
  --help, -h              Show this help message

Environment:
  LINEAR_API_KEY          Required to check whether issues are still claimed
`)
}

async function main(): Promise<void> {
  const args = parseCleanupArgs(process.argv.slice(3))
  if (args.help) {
    printHelp()
    return
  }

  console.log('\n=== drover workspace cleanup ===\n')
  if (args.dryRun) {
    console.log('[DRY RUN MODE - No changes will be made]\n')
  }

  const report = await runCleanup({ ...args, linearApiKey: process.env.LINEAR_API_KEY })

  for (const removed of report.removed) {
    console.log(`  ${args.dryRun ? 'would remove' : '     removed'}: ${path.basename(removed)}`)
  }
  for (const kept of report.kept) {
    console.log(`          kept: ${path.basename(kept.path)} (${kept.reason})`)
  }

  console.log('\n=== Summary ===\n')
  console.log(`  Scanned: ${report.scanned} workspace(s)`)
  console.log(`  Removed: ${report.removed.length}`)
  console.log(`  Kept:    ${report.kept.length}`)
  if (report.orphaned.length > 0) {
    console.log(`  Orphaned worktrees: ${report.orphaned.length}`)
  }
  if (report.errors.length > 0) {
    console.log(`  Errors:  ${report.errors.length}`)
    for (const err of report.errors) {
      console.log(`    - ${path.basename(err.path)}: ${err.error}`)
    }
    process.exitCode = 1
  }
  console.log('')
}

main().catch((error: unknown) => {
  console.error(`${isConfigurationError(error) ? 'Configuration error' : 'Error'}: ${errorMessage(error)}`)
  process.exit(1)
})
