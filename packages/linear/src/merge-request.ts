/**
 * Merge requests are opened with the GitHub CLI from inside the workspace,
 * so the branch's own remote and credentials are used.
 */

import { execFile } from 'child_process'
import { promisify } from 'util'
import type { MergeRequestInput, MergeRequestResult } from './types.js'
import { MergeRequestError } from './errors.js'

const execFileAsync = promisify(execFile)

export interface CommandOutput {
  stdout: string
  stderr: string
}

export type CommandExecutor = (
  file: string,
  args: readonly string[],
  options: { cwd: string }
) => Promise<CommandOutput>

export const execCommand: CommandExecutor = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    cwd: options.cwd,
    encoding: 'utf-8',
    maxBuffer: 10 * 1024 * 1024,
  })
  return { stdout, stderr }
}

export type MergeRequestOpener = (input: MergeRequestInput) => Promise<MergeRequestResult>

const URL_PATTERN = /https:\/\/\S+\/pull\/\d+/

/**
 * Pull the request URL out of gh output. gh reports an already-open request
 * on stderr with its URL.
 */
export function findMergeRequestUrl(output: string): string | null {
  const match = output.match(URL_PATTERN)
  return match ? match[0] : null
}

function readStream(error: unknown, key: 'stdout' | 'stderr'): string {
  if (typeof error !== 'object' || error === null) return ''
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'string' ? value : ''
}

export function createGhMergeRequestOpener(exec: CommandExecutor = execCommand): MergeRequestOpener {
  return async (input) => {
    const args = [
      'pr',
      'create',
      '--head',
      input.branch,
      '--base',
      input.baseBranch,
      '--title',
      input.title,
      '--body',
      input.body,
    ]

    try {
      const { stdout } = await exec('gh', args, { cwd: input.cwd })
      const url = findMergeRequestUrl(stdout)
      if (!url) {
        throw new MergeRequestError(`gh did not report a pull request URL for ${input.branch}`, input.branch, stdout)
      }
      return { url }
    } catch (error) {
      if (error instanceof MergeRequestError) throw error
      const stderr = readStream(error, 'stderr')
      if (stderr.includes('already exists')) {
        const url = findMergeRequestUrl(stderr)
        if (url) return { url }
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new MergeRequestError(`Failed to open pull request for ${input.branch}: ${message}`, input.branch, stderr)
    }
  }
}
