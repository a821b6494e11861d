import fs from "node:fs"
import path from "node:path"

import config from "./config.js"

type LogLevel = "debug" | "info" | "warn" | "error"

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const currentLevel = LOG_LEVELS[config.LOG_LEVEL] ?? LOG_LEVELS.info

function formatTimestamp(): string {
  return new Date().toISOString()
}

function serializeMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message })
  }
  return JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value,
  )
}

export function formatMessage(level: LogLevel, scope: string, message: string, meta?: unknown): string {
  const timestamp = formatTimestamp()
  const levelStr = level.toUpperCase().padEnd(5)
  let formatted = `[${timestamp}] ${levelStr} [${scope}] ${message}`
  if (meta !== undefined) {
    formatted += ` ${serializeMeta(meta)}`
  }
  return formatted
}

export class LogStream {
  private static instance: LogStream | null = null
  private stream: fs.WriteStream | null = null

  constructor(file: string) {
    if (file.trim().length === 0) {
      return
    }

    try {
      const target = path.resolve(process.cwd(), file)
      fs.mkdirSync(path.dirname(target), { recursive: true })
      const stream = fs.createWriteStream(target, { flags: "a" })
      // Open failures are emitted here, after the constructor has returned.
      stream.on("error", (error) => {
        console.error(`[Logger] Log file disabled: ${error.message}`)
        if (this.stream === stream) {
          this.stream = null
        }
      })
      this.stream = stream
    } catch (error) {
      console.error(`[Logger] Failed to initialize log stream: ${String(error)}`)
    }
  }

  static getInstance(): LogStream {
    if (!LogStream.instance) {
      LogStream.instance = new LogStream(config.LOG_FILE)
    }
    return LogStream.instance
  }

  isOpen(): boolean {
    return this.stream !== null
  }

  write(line: string): void {
    this.stream?.write(`${line}\n`)
  }

  close(): void {
    if (this.stream) {
      this.stream.end()
      this.stream = null
    }
  }
}

function log(level: LogLevel, scope: string, message: string, meta?: unknown): void {
  if (LOG_LEVELS[level] < currentLevel) {
    return
  }

  const formatted = formatMessage(level, scope, message, meta)

  switch (level) {
    case "debug":
    case "info":
      process.stdout.write(`${formatted}\n`)
      break
    case "warn":
    case "error":
      process.stderr.write(`${formatted}\n`)
      break
  }

  LogStream.getInstance().write(formatted)
}

export interface Logger {
  debug(message: string, meta?: unknown): void
  info(message: string, meta?: unknown): void
  warn(message: string, meta?: unknown): void
  error(message: string, meta?: unknown): void
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message: string, meta?: unknown) => log("debug", scope, message, meta),
    info: (message: string, meta?: unknown) => log("info", scope, message, meta),
    warn: (message: string, meta?: unknown) => log("warn", scope, message, meta),
    error: (message: string, meta?: unknown) => log("error", scope, message, meta),
  }
}

export function closeLogStream(): void {
  LogStream.getInstance().close()
}

export default createLogger
