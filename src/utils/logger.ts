import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface LoggerOptions {
  prefix?: string
  timestamp?: boolean
  silent?: boolean
  forceColor?: boolean | undefined | null
  debug?: boolean
}

export interface Logger {
  info: (message: string, ...args: unknown[]) => void
  success: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug: (message: string, ...args: unknown[]) => void
  setDebug: (enabled: boolean) => void
  isDebugEnabled: () => boolean
}

type Level = 'info' | 'success' | 'warn' | 'error' | 'debug'

interface LevelStyle {
  emoji: string
  stderr: boolean
  color: (palette: ChalkInstance) => (text: string) => string
}

// warn and error write to stderr
const LEVELS: Record<Level, LevelStyle> = {
  info: { emoji: '🖥️ ', stderr: false, color: palette => palette.blue },
  success: { emoji: '✅', stderr: false, color: palette => palette.green },
  warn: { emoji: '⚠️ ', stderr: true, color: palette => palette.yellow },
  error: { emoji: '❌', stderr: true, color: palette => palette.red },
  debug: { emoji: '🔍', stderr: false, color: palette => palette.gray },
}

const defaultPalette = new Chalk({ level: chalk.level })

function formatMessage(message: string, ...args: unknown[]): string {
  const formattedArgs = args.map(arg =>
    typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
  )
  return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

function formatWithEmoji(message: string, emoji: string, colorFn: (str: string) => string): string {
  if (message.trim()) {
    return colorFn(`${emoji} ${message}`)
  } else {
    return ''
  }
}

/* eslint-disable no-console */
function write(level: Level, palette: ChalkInstance, text: string): void {
  const style = LEVELS[level]
  const line = formatWithEmoji(text, style.emoji, style.color(palette))
  if (style.stderr) {
    console.error(line)
  } else {
    console.log(line)
  }
}
/* eslint-enable no-console */

interface Sink {
  palette: ChalkInstance
  decorate: (text: string) => string
  isDebugEnabled: () => boolean
  setDebug: (enabled: boolean) => void
}

function buildLogger(sink: Sink): Logger {
  const emit = (level: Level) => (message: string, ...args: unknown[]): void => {
    if (level === 'debug' && !sink.isDebugEnabled()) return
    write(level, sink.palette, sink.decorate(formatMessage(message, ...args)))
  }

  return {
    info: emit('info'),
    success: emit('success'),
    warn: emit('warn'),
    error: emit('error'),
    debug: emit('debug'),
    setDebug: sink.setDebug,
    isDebugEnabled: sink.isDebugEnabled,
  }
}

let globalDebugEnabled = false

export const logger: Logger = buildLogger({
  palette: defaultPalette,
  decorate: text => text,
  isDebugEnabled: () => globalDebugEnabled,
  setDebug: (enabled) => {
    globalDebugEnabled = enabled
  },
})

const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
  setDebug: () => {},
  isDebugEnabled: () => false,
}

/**
 * Build a logger with its own prefix, timestamping and debug flag.
 * Debug starts from the global setting unless `debug` is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { prefix = '', timestamp = false, silent = false, forceColor, debug = globalDebugEnabled } = options
  if (silent) {
    return silentLogger
  }

  let localDebugEnabled = debug
  const prefixStr = prefix ? `[${prefix}] ` : ''

  return buildLogger({
    palette: forceColor !== undefined && forceColor !== null
      ? new Chalk({ level: forceColor ? 3 : 0 })
      : defaultPalette,
    decorate: text => `${timestamp ? `[${new Date().toISOString()}] ` : ''}${prefixStr}${text}`,
    isDebugEnabled: () => localDebugEnabled,
    setDebug: (enabled) => {
      localDebugEnabled = enabled
    },
  })
}

export default logger
