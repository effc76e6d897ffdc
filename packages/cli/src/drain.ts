#!/usr/bin/env node
/**
 * drover drain
 *
 * Claims Ready issues, supervises their sessions and reconciles each
 * outcome back into Linear, up to --max at a time.
 *
 * Usage:
 *   drover drain [options]
 *
 * Options:
 *   --max <n>           Maximum concurrent issues (default: pool.maxConcurrency)
 *   --target <t>        local, remote or any (default: pool.target)
 *   --limit <n>         Stop after starting n issues
 *   --continuous        Keep polling for new issues until interrupted
 *   --dry-run           List the issues that would be picked up
 *
 * Environment:
 *   LINEAR_API_KEY      Required API key for Linear authentication
 */

import path from 'path'
import { config } from 'dotenv'

// Load environment variables from .env.local
config({ path: path.resolve(process.cwd(), '.env.local') })

import { errorMessage, isConfigurationError } from '@drover/core'
import { parseDrainArgs, runDrain } from './lib/drain-runner.js'

function printHelp(): void {
  console.log(`
drover drain - Work through Ready issues with unattended sessions

Usage:
  drover drain [options]

Options:
  --max <n>           Maximum concurrent issues (default: pool.maxConcurrency)
  --target <t>        local, remote or any (default: pool.target)
  --limit <n>         Stop after starting n issues
  --continuous        Keep polling for new issues until interrupted
  --dry-run           List the issues that would be picked up
  --help, -h          Show this help message

Environment:
  LINEAR_API_KEY      Required API key for Linear authentication

Examples:
  # Drain everything that is ready, two at a time
  drover drain --max 2

  # Preview what would be picked up on this machine
  drover drain --target local --dry-run
`)
}

async function main(): Promise<void> {
  const args = parseDrainArgs(process.argv.slice(3))
  if (args.help) {
    printHelp()
    return
  }

  const { summary, candidates } = await runDrain({ ...args, linearApiKey: process.env.LINEAR_API_KEY })

  if (!summary) {
    console.log(`\n[DRY RUN] ${candidates.length} issue(s) would be picked up:\n`)
    for (const { issue, resume } of candidates) {
      console.log(`  ${issue.identifier}${resume ? ' (resume)' : ''} - ${issue.title}`)
    }
    console.log('')
    return
  }

  const { outcomes } = summary
  console.log('\n=== Summary ===\n')
  console.log(`  Started:   ${summary.started}`)
  console.log(`  Done:      ${outcomes.done}`)
  console.log(`  Blocked:   ${outcomes.blocked}`)
  console.log(`  Failed:    ${outcomes.failed}`)
  console.log(`  Contended: ${outcomes.contended}`)
  console.log(`  Skipped:   ${outcomes.skipped}`)
  console.log(`  Cancelled: ${outcomes.cancelled}`)
  if (summary.errors.length > 0) {
    console.log(`  Errors:    ${summary.errors.length}`)
    for (const err of summary.errors) {
      console.log(`    - ${err.issueId}: ${err.error}`)
    }
    process.exitCode = 1
  }
  console.log('')
}

main().catch((error: unknown) => {
  console.error(`${isConfigurationError(error) ? 'Configuration error' : 'Error'}: ${errorMessage(error)}`)
  process.exit(1)
})
