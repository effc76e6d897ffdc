/**
 * Session Host Interface
 *
 * Abstracts how backend sessions are supervised (tmux, plain child
 * processes, ...) so the session controller is host-agnostic. Hosts address
 * sessions by name; starting a name that is already running is an error the
 * controller avoids by checking status first.
 */

export type SessionHostKind = 'tmux' | 'process'

/** `exited`: the session is still registered but its command has ended */
export type HostSessionStatus = 'alive' | 'exited' | 'absent'

export interface SessionLaunch {
  name: string
  cwd: string
  /** argv of the backend command; argv[0] is the executable */
  argv: readonly string[]
  env?: Record<string, string>
}

export interface SessionHost {
  readonly kind: SessionHostKind

  status(name: string): Promise<HostSessionStatus>

  start(launch: SessionLaunch): Promise<void>

  /** Type a line of text into the session, followed by Enter */
  send(name: string, text: string): Promise<void>

  /** Last `lines` lines of the session's output */
  capture(name: string, lines: number): Promise<string>

  /** Terminate the session; a no-op when it does not exist */
  kill(name: string): Promise<void>
}
