import { execCommand, type CommandExecutor } from '@drover/linear'
import { WorkspaceError } from '../errors.js'

/**
 * Thin git surface used by the workspace manager. Swapped for a fake in tests.
 */
export interface GitRunner {
  /**
   * Run git and return trimmed stdout
   * @throws {WorkspaceError} when git exits non-zero
   */
  run(args: readonly string[], cwd: string): Promise<string>
  /** Run git and report whether it exited zero */
  succeeds(args: readonly string[], cwd: string): Promise<boolean>
}

function stderrOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  const value: unknown = Reflect.get(error, 'stderr')
  return typeof value === 'string' && value.trim() ? value.trim() : undefined
}

export class CliGitRunner implements GitRunner {
  constructor(private readonly exec: CommandExecutor = execCommand) {}

  async run(args: readonly string[], cwd: string): Promise<string> {
    try {
      const { stdout } = await this.exec('git', args, { cwd })
      return stdout.trim()
    } catch (error) {
      const stderr = stderrOf(error)
      const detail = stderr ?? (error instanceof Error ? error.message : String(error))
      throw new WorkspaceError(`git ${args[0] ?? ''} failed: ${detail}`, cwd, stderr)
    }
  }

  async succeeds(args: readonly string[], cwd: string): Promise<boolean> {
    try {
      await this.run(args, cwd)
      return true
    } catch (error) {
      if (error instanceof WorkspaceError) return false
      throw error
    }
  }
}
