/**
 * Logger utility for pool and lifecycle output
 *
 * Colorized, structured logging with worker/issue/session context.
 * Uses ANSI escape codes directly to avoid external dependencies.
 */

import type { LifecyclePhase } from './lifecycle/types.js'

const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  brightBlack: '\x1b[90m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
  brightWhite: '\x1b[97m',
} as const

type ColorName = keyof typeof colors

// Rotating palette so concurrent issues are easy to tell apart
const CONTEXT_COLORS: ColorName[] = ['cyan', 'magenta', 'yellow', 'green', 'blue', 'brightCyan', 'brightMagenta', 'brightYellow']

export const LOG_LEVELS = ['debug', 'info', 'success', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_STYLES: Record<LogLevel, { color: ColorName; label: string }> = {
  debug: { color: 'brightBlack', label: 'DBG' },
  info: { color: 'brightBlue', label: 'INF' },
  success: { color: 'green', label: 'OK ' },
  warn: { color: 'yellow', label: 'WRN' },
  error: { color: 'red', label: 'ERR' },
}

/** Lifecycle phases plus the pool's own selection and restart events */
export type StatusName = LifecyclePhase | 'selected' | 'restarted'

const STATUS_COLORS: Record<StatusName, ColorName> = {
  selecting: 'white',
  selected: 'white',
  claiming: 'cyan',
  preparing: 'yellow',
  running: 'blue',
  nudging: 'yellow',
  restarted: 'magenta',
  evaluating: 'cyan',
  completing: 'green',
  blocked: 'yellow',
  failed: 'red',
  cancelled: 'yellow',
  contended: 'brightBlack',
  terminal: 'white',
}

export interface LoggerContext {
  workerId?: string
  issueIdentifier?: string
  sessionName?: string
}

export interface LoggerOptions {
  showTimestamp?: boolean
  showLevel?: boolean
  colorEnabled?: boolean
  minLevel?: LogLevel
}

const colorAssignments = new Map<string, ColorName>()

function getColorForId(id: string): ColorName {
  const assigned = colorAssignments.get(id)
  if (assigned) return assigned
  const color = CONTEXT_COLORS[colorAssignments.size % CONTEXT_COLORS.length]
  colorAssignments.set(id, color)
  return color
}

function colorize(text: string, ...colorNames: ColorName[]): string {
  const colorCodes = colorNames.map((c) => colors[c]).join('')
  return `${colorCodes}${text}${colors.reset}`
}

function formatTimestamp(): string {
  const now = new Date()
  const hours = now.getHours().toString().padStart(2, '0')
  const minutes = now.getMinutes().toString().padStart(2, '0')
  const seconds = now.getSeconds().toString().padStart(2, '0')
  return `${hours}:${minutes}:${seconds}`
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return text.substring(0, maxLength - 3) + '...'
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export class Logger {
  private readonly context: LoggerContext
  private readonly options: Required<LoggerOptions>

  constructor(context: LoggerContext = {}, options: LoggerOptions = {}) {
    this.context = context
    this.options = {
      showTimestamp: options.showTimestamp ?? true,
      showLevel: options.showLevel ?? true,
      colorEnabled: options.colorEnabled ?? (process.stdout.isTTY === true && !process.env.NO_COLOR),
      minLevel: options.minLevel ?? 'info',
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LoggerContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.options)
  }

  private paint(text: string, ...colorNames: ColorName[]): string {
    return this.options.colorEnabled ? colorize(text, ...colorNames) : text
  }

  private formatPrefix(): string {
    const parts: string[] = []
    const { workerId, issueIdentifier, sessionName } = this.context

    if (workerId) {
      parts.push(this.paint(`[${workerId.substring(0, 8)}]`, getColorForId(workerId), 'bold'))
    }
    if (issueIdentifier) {
      parts.push(this.paint(`[${issueIdentifier}]`, getColorForId(issueIdentifier), 'bold'))
    }
    if (sessionName) {
      parts.push(this.paint(`(${sessionName})`, 'dim'))
    }

    return parts.join(' ')
  }

  private formatData(data: Record<string, unknown>): string {
    const pairs: string[] = []
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue
      let valueStr: string
      if (typeof value === 'string') {
        valueStr = truncate(value, 80)
      } else if (typeof value === 'number' || typeof value === 'boolean') {
        valueStr = String(value)
      } else if (value instanceof Error) {
        valueStr = truncate(value.message, 80)
      } else {
        valueStr = truncate(JSON.stringify(value) ?? String(value), 80)
      }
      pairs.push(`${key}=${valueStr}`)
    }
    return pairs.length > 0 ? `{ ${pairs.join(', ')} }` : ''
  }

  private linePrefix(marker: string): string[] {
    const parts: string[] = []
    if (this.options.showTimestamp) {
      parts.push(this.paint(formatTimestamp(), 'dim'))
    }
    if (marker) parts.push(marker)
    const prefix = this.formatPrefix()
    if (prefix) parts.push(prefix)
    return parts
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.options.minLevel)
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return

    const style = LEVEL_STYLES[level]
    const parts = this.linePrefix(this.options.showLevel ? this.paint(style.label, style.color) : '')
    parts.push(message)
    if (data) {
      const dataStr = this.formatData(data)
      if (dataStr) parts.push(this.paint(dataStr, 'dim'))
    }

    const line = parts.join(' ')
    if (level === 'error') {
      console.error(line)
    } else if (level === 'warn') {
      console.warn(line)
    } else {
      console.log(line)
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data)
  }

  success(message: string, data?: Record<string, unknown>): void {
    this.log('success', message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data)
  }

  /**
   * Log a section header/divider
   */
  section(title: string): void {
    const divider = '─'.repeat(60)
    console.log(this.paint(`\n${divider}`, 'dim'))
    console.log(this.paint(`  ${title}`, 'bold', 'brightWhite'))
    console.log(this.paint(divider, 'dim'))
  }

  /**
   * Log a lifecycle status change with a visual indicator
   */
  status(status: StatusName, details?: string): void {
    if (!this.shouldLog('info')) return

    const color = STATUS_COLORS[status]
    const parts = this.linePrefix(this.paint(this.options.colorEnabled ? '●' : '*', color))
    parts.push(this.paint(status.toUpperCase(), color, 'bold'))
    if (details) parts.push(details)

    console.log(parts.join(' '))
  }
}

/**
 * Create a logger instance
 */
export function createLogger(context?: LoggerContext, options?: LoggerOptions): Logger {
  return new Logger(context, options)
}

/**
 * Default logger for quick use
 */
export const logger = createLogger()
