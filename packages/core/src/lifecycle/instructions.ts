import type { Issue } from '@drover/linear'
import { ANSWERS_FILE, MARKER_FILE } from '../workspace/completion-marker.js'
import type { Workspace } from '../workspace/workspace-manager.js'

/**
 * Build TASK.md: the working rules followed by the issue itself. Written
 * once per workspace and never rewritten, so it must not depend on anything
 * that changes between runs.
 */
export function buildTaskInstruction(issue: Issue, workspace: Workspace): string {
  const lines: string[] = []

  lines.push(`# ${issue.identifier}: ${issue.title}`)
  lines.push('')
  lines.push('## Working rules')
  lines.push('')
  lines.push(`- Work only on the branch \`${workspace.branchName}\`. Never commit to \`${workspace.baseBranch}\`.`)
  lines.push('- Do not push to the base branch; the orchestrator opens the pull request.')
  lines.push('- No destructive operations (force pushes, history rewrites, deleting data) without approval.')
  lines.push('- Run the repository tests if it has any.')
  lines.push('- Ask before large refactors (more than 5 files, or more than 100 lines in one file).')
  lines.push(`- Write descriptive commit messages that mention ${issue.identifier}.`)
  lines.push('')
  lines.push('## If you are blocked')
  lines.push('')
  lines.push(`Write \`${MARKER_FILE}\` with \`"status": "blocked"\` and your questions in`)
  lines.push('`blocked_questions`, then exit. If you can comment on the issue directly, a')
  lines.push('comment whose first line is `BLOCKED:` followed by numbered questions works too.')
  lines.push('When a human replies with `ANSWER:`, you are restarted in this directory and')
  lines.push(`the reply is in \`${ANSWERS_FILE}\`.`)
  lines.push('')
  lines.push('## When you are done')
  lines.push('')
  lines.push(`Commit your work, then write \`${MARKER_FILE}\` in this directory:`)
  lines.push('')
  lines.push('```json')
  lines.push('{')
  lines.push(`  "task_id": "${issue.identifier}",`)
  lines.push('  "summary": "what changed and why",')
  lines.push('  "files_changed": ["path/one.ts"],')
  lines.push('  "commands_run": ["npm test"]')
  lines.push('}')
  lines.push('```')
  lines.push('')
  lines.push('## Task')
  lines.push('')
  lines.push(issue.body.trim() || '(no description)')
  if (issue.url) {
    lines.push('')
    lines.push(`Issue: ${issue.url}`)
  }
  lines.push('')

  return lines.join('\n')
}
