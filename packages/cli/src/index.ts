#!/usr/bin/env node
/**
 * drover CLI
 *
 * Entry point for the drover command.
 * Dispatches to sub-commands based on first argument.
 */

const command = process.argv[2]

function printHelp(): void {
  console.log(`
drover - Issue lifecycle orchestrator for unattended coding sessions

Usage:
  drover <command> [options]

Commands:
  drain           Claim Ready issues and supervise them to a terminal state
  cleanup         Remove workspaces of finished issues
  status          Show local workspaces and agent issue counts
  help            Show this help message

Run 'drover <command> --help' for command-specific options.
`)
}

const commands: Record<string, () => Promise<unknown>> = {
  drain: () => import('./drain.js'),
  cleanup: () => import('./cleanup.js'),
  status: () => import('./status.js'),
}

const load = command === undefined ? undefined : commands[command]

if (load) {
  load().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error))
    process.exit(1)
  })
} else if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
  printHelp()
} else {
  console.error(`Unknown command: ${command}`)
  printHelp()
  process.exit(1)
}
