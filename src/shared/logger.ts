export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export type LogFn = (message: unknown, ...args: unknown[]) => void

export type Logger = Record<LogLevel, LogFn>

export type LoggerOptions = {
  /** Emit debug output. Debug calls are dropped otherwise. */
  verbose?: boolean
}

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  const prefix = process.stderr.isTTY
    ? `${style.ansi}[${style.label}]\x1b[0m`
    : `[${style.label}]`
  return [prefix, message, ...args]
}

// Everything goes to stderr so stdout stays clean for dry-run output.
function write(level: LogLevel, message: unknown, args: unknown[]): void {
  console.error(...format(level, message, args))
}

const noop: LogFn = () => {}

export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
    debug: options.verbose ? (message, ...args) => write('debug', message, args) : noop
  }
}
