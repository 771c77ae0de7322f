/**
 * Logger Utility
 *
 * Leveled diagnostics for the CLI. Diagnostics go to stderr so that stdout
 * carries nothing but the report.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
  colors?: boolean
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
}

const labels: Record<LogLevel, string> = {
  debug: colors.gray + '[debug]' + colors.reset,
  info: colors.blue + '[info]' + colors.reset,
  warn: colors.yellow + '[warn]' + colors.reset,
  error: colors.red + '[error]' + colors.reset,
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export class Logger {
  private level: LogLevel
  private context: string
  private silent: boolean
  private useColors: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info')
    this.context = options.context ?? ''
    this.silent = options.silent ?? false
    this.useColors = options.colors ?? (process.stderr.isTTY ?? false)
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const label = this.useColors ? labels[level] : `[${level}]`
    const ctx = this.context ? (this.useColors ? `${colors.dim}(${this.context})${colors.reset} ` : `(${this.context}) `) : ''

    let output = `${label} ${ctx}${message}`
    if (data) {
      const dataStr = JSON.stringify(data)
      output += this.useColors ? ` ${colors.dim}${dataStr}${colors.reset}` : ` ${dataStr}`
    }
    return output
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) console.error(this.format('debug', message, data))
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) console.error(this.format('info', message, data))
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) console.error(this.format('warn', message, data))
  }

  // Errors are printed even when silent
  error(message: string, data?: Record<string, unknown>): void {
    if (levelPriority.error >= levelPriority[this.level]) console.error(this.format('error', message, data))
  }

  /**
   * Plain output on stdout, without level or context
   */
  log(message: string): void {
    console.log(message)
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
    })
  }
}

export function createLogger(context?: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return new Logger({ ...options, context })
}
