import { spawn, type ChildProcess } from 'child_process'
import { SessionError } from '../errors.js'
import type { HostSessionStatus, SessionHost, SessionLaunch } from './session-host.js'

const DEFAULT_BUFFER_BYTES = 64 * 1024

interface ProcessEntry {
  child: ChildProcess
  output: string
  exited: boolean
}

/**
 * Supervises sessions as child processes of the orchestrator. Output is kept
 * in a bounded buffer; nudges are written to stdin. Sessions do not survive
 * an orchestrator restart.
 */
export class ProcessSessionHost implements SessionHost {
  readonly kind = 'process' as const
  private readonly entries = new Map<string, ProcessEntry>()

  constructor(private readonly bufferBytes = DEFAULT_BUFFER_BYTES) {}

  async status(name: string): Promise<HostSessionStatus> {
    const entry = this.entries.get(name)
    if (!entry) return 'absent'
    return entry.exited ? 'exited' : 'alive'
  }

  async start(launch: SessionLaunch): Promise<void> {
    const current = this.entries.get(launch.name)
    if (current && !current.exited) {
      throw new SessionError(`Session already running: ${launch.name}`, launch.name)
    }
    const [command, ...args] = launch.argv
    if (!command) {
      throw new SessionError('Empty command', launch.name)
    }

    const child = spawn(command, args, {
      cwd: launch.cwd,
      env: { ...process.env, ...launch.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    })
    const entry: ProcessEntry = { child, output: '', exited: false }
    this.entries.set(launch.name, entry)

    const append = (chunk: Buffer): void => {
      entry.output += chunk.toString()
      if (entry.output.length > this.bufferBytes) {
        entry.output = entry.output.slice(entry.output.length - this.bufferBytes)
      }
    }
    child.stdout?.on('data', append)
    child.stderr?.on('data', append)
    child.once('exit', () => {
      entry.exited = true
    })
    child.on('error', (err) => {
      entry.exited = true
      entry.output += `\n[spawn error] ${err.message}\n`
    })
    // The session closing its end of stdin (EPIPE) leaves it unable to take nudges
    child.stdin?.on('error', (err) => {
      entry.exited = true
      entry.output += `\n[stdin error] ${err.message}\n`
    })
  }

  async send(name: string, text: string): Promise<void> {
    const entry = this.entries.get(name)
    if (!entry || entry.exited || !entry.child.stdin) {
      throw new SessionError(`Session not running: ${name}`, name)
    }
    const stdin = entry.child.stdin
    await new Promise<void>((resolve, reject) => {
      stdin.write(`${text}\n`, (err) =>
        err ? reject(new SessionError(`Could not write to ${name}: ${err.message}`, name)) : resolve()
      )
    })
  }

  async capture(name: string, lines: number): Promise<string> {
    const output = this.entries.get(name)?.output ?? ''
    return output.replace(/\s+$/, '').split('\n').slice(-lines).join('\n')
  }

  async kill(name: string): Promise<void> {
    const entry = this.entries.get(name)
    if (!entry) return
    if (entry.child.exitCode === null && entry.child.signalCode === null) {
      entry.child.kill('SIGTERM')
    }
    this.entries.delete(name)
  }
}
