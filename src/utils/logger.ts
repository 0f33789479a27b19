import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown> | undefined

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  /** Lines from the child carry `[scope]` after the level tag. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level: LogLevel
  summaryPath: string
  detailPath: string
}

interface LogRecord {
  time: string
  level: LogLevel
  scope?: string
  message: string
  meta?: Record<string, unknown>
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const DETAIL_INLINE_LIMIT = 200

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.log(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
}

let currentLevel: LogLevel = 'info'
const sinks: { summary: fs.WriteStream | null; detail: fs.WriteStream | null } = {
  summary: null,
  detail: null,
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  currentLevel = options.level

  await fs.promises.mkdir(path.dirname(options.summaryPath), { recursive: true })
  await fs.promises.mkdir(path.dirname(options.detailPath), { recursive: true })

  closeLogger()
  sinks.summary = fs.createWriteStream(options.summaryPath, { flags: 'a' })
  sinks.detail = fs.createWriteStream(options.detailPath, { flags: 'a' })
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function closeLogger(): void {
  sinks.summary?.end()
  sinks.detail?.end()
  sinks.summary = null
  sinks.detail = null
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/** Keeps the first and last few characters of a credential for log lines. */
export function maskSecret(value: string | undefined, visible = 4): string {
  const trimmed = value?.trim() ?? ''
  if (trimmed.length === 0) return '[unset]'
  if (trimmed.length <= visible * 2) return '***'
  return `${trimmed.slice(0, visible)}***${trimmed.slice(-visible)}`
}

function serializeError(error: Error): Record<string, unknown> {
  const cause = error.cause
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: cause instanceof Error ? serializeError(cause) : cause,
  }
}

function toJson(value: unknown, indent: number): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key: string, val: unknown) => {
    if (val instanceof Error) return serializeError(val)
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    if (val instanceof Map) return Object.fromEntries(val.entries())
    if (val instanceof Set) return Array.from(val.values())
    if (typeof val === 'bigint') return val.toString()
    return val
  }, indent)
}

function header(record: LogRecord): string {
  const scope = record.scope ? ` [${record.scope}]` : ''
  return `[${record.time}] [${record.level}]${scope} ${record.message}`
}

// Summary lines show error messages only; stacks go to the detail log.
function renderSummary(record: LogRecord): string {
  if (!record.meta) return header(record)
  const compact: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record.meta)) {
    compact[key] = value instanceof Error ? asErrorMessage(value) : value
  }
  return `${header(record)} | ${toJson(compact, 0)}`
}

function renderDetail(record: LogRecord): string {
  if (!record.meta) return header(record)
  const inline = toJson(record.meta, 0)
  if (inline.length <= DETAIL_INLINE_LIMIT && !inline.includes('\\n')) {
    return `${header(record)} | ${inline}`
  }
  const block = toJson(record.meta, 2)
    .split('\n')
    .map(line => `  ${line}`)
    .join('\n')
  return `${header(record)}\n${block}`
}

function emit(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return
  const record: LogRecord = { time: new Date().toISOString(), level, scope, message, meta }
  const summary = renderSummary(record)
  CONSOLE_WRITERS[level](summary)
  sinks.summary?.write(`${summary}\n`)
  sinks.detail?.write(`${renderDetail(record)}\n`)
}

function createLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => emit('debug', scope, message, meta),
    info: (message, meta) => emit('info', scope, message, meta),
    warn: (message, meta) => emit('warn', scope, message, meta),
    error: (message, meta) => emit('error', scope, message, meta),
    child: name => createLogger(scope ? `${scope}:${name}` : name),
  }
}

export const logger: Logger = createLogger()
