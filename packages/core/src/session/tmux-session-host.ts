import { execCommand, type CommandExecutor } from '@drover/linear'
import { SessionError } from '../errors.js'
import type { HostSessionStatus, SessionHost, SessionLaunch } from './session-host.js'

/**
 * Supervises sessions as detached tmux sessions. Panes stay open after the
 * command exits so an exit can be told apart from a session that was never
 * started. remain-on-exit is set in the same tmux invocation as new-session;
 * a command that exits at once would otherwise take its session with it.
 */
export class TmuxSessionHost implements SessionHost {
  readonly kind = 'tmux' as const

  constructor(
    private readonly exec: CommandExecutor = execCommand,
    private readonly tmuxBin = 'tmux'
  ) {}

  private async tmux(name: string, args: readonly string[]): Promise<string> {
    try {
      const { stdout } = await this.exec(this.tmuxBin, args, { cwd: process.cwd() })
      return stdout
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new SessionError(`tmux ${args[0] ?? ''} failed: ${message}`, name)
    }
  }

  async status(name: string): Promise<HostSessionStatus> {
    try {
      await this.tmux(name, ['has-session', '-t', `=${name}`])
    } catch (error) {
      if (error instanceof SessionError) return 'absent'
      throw error
    }
    const dead = await this.tmux(name, ['display-message', '-p', '-t', `=${name}`, '#{pane_dead}'])
    return dead.trim() === '1' ? 'exited' : 'alive'
  }

  async start(launch: SessionLaunch): Promise<void> {
    const envArgs = Object.entries(launch.env ?? {}).flatMap(([key, value]) => ['-e', `${key}=${value}`])
    await this.tmux(launch.name, [
      'new-session',
      '-d',
      '-s',
      launch.name,
      '-c',
      launch.cwd,
      ...envArgs,
      '--',
      ...launch.argv,
      ';',
      'set-option',
      '-t',
      `=${launch.name}`,
      'remain-on-exit',
      'on',
    ])
  }

  async send(name: string, text: string): Promise<void> {
    await this.tmux(name, ['send-keys', '-t', `=${name}`, '-l', text])
    await this.tmux(name, ['send-keys', '-t', `=${name}`, 'Enter'])
  }

  async capture(name: string, lines: number): Promise<string> {
    const output = await this.tmux(name, ['capture-pane', '-p', '-t', `=${name}`, '-S', `-${lines}`])
    return output.replace(/\s+$/, '')
  }

  async kill(name: string): Promise<void> {
    if ((await this.status(name)) === 'absent') return
    await this.tmux(name, ['kill-session', '-t', `=${name}`])
  }
}
