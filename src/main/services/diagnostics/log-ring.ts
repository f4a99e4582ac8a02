import { join } from 'path'
import { writeFileSync, mkdirSync } from 'fs'

/** Severity levels for log entries. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Threshold for the stderr mirror; `silent` disables it. */
export type LogThreshold = LogLevel | 'silent'

/** A single structured log entry. */
export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: string
  data?: unknown
}

/** Runtime options applied through {@link LogRing.configure}. */
export interface LogRingOptions {
  /** Minimum level mirrored to stderr. */
  mirrorLevel?: LogThreshold
  /** Directory that {@link LogRing.flush} writes into. */
  logsDir?: string
}

const MAX_ENTRIES = 1000

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

/**
 * In-memory ring buffer logger that keeps the last {@link MAX_ENTRIES} log entries.
 *
 * Singleton for the process. Entries at or above the mirror level are also
 * written to stderr as one JSON line each, and the whole buffer can be
 * flushed to disk for post-mortem analysis.
 *
 * @example
 * ```ts
 * const logger = LogRing.getInstance()
 * logger.info('Job submitted', { jobId, remoteId })
 * logger.error('Poll failed', { jobId, code: 'UNAVAILABLE' })
 *
 * const recent = logger.getEntries(50) // last 50 entries
 * logger.flush()                       // persist to disk
 * ```
 */
export class LogRing {
  private static instance: LogRing | null = null

  private readonly entries: LogEntry[] = []
  private head = 0
  private count = 0
  private mirrorLevel: LogThreshold = 'info'
  private logsDir: string | null = null

  private constructor() {}

  /**
   * Returns the singleton LogRing instance, creating it on first access.
   */
  static getInstance(): LogRing {
    if (!LogRing.instance) {
      LogRing.instance = new LogRing()
    }
    return LogRing.instance
  }

  configure(options: LogRingOptions): void {
    if (options.mirrorLevel !== undefined) {
      this.mirrorLevel = options.mirrorLevel
    }
    if (options.logsDir !== undefined) {
      this.logsDir = options.logsDir
    }
  }

  debug(message: string, data?: unknown): void {
    this.append('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.append('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.append('warn', message, data)
  }

  /**
   * Logs an error-level message.
   *
   * @param data - Optional structured data (e.g. an Error, which is reduced to name/message/stack).
   */
  error(message: string, data?: unknown): void {
    this.append('error', message, data)
  }

  /**
   * Returns the most recent log entries, ordered oldest-first.
   *
   * @param count - Number of entries to return. Defaults to all stored entries.
   */
  getEntries(count?: number): LogEntry[] {
    const total = Math.min(count ?? this.count, this.count)
    const result: LogEntry[] = []

    const startIdx = (this.head - this.count + MAX_ENTRIES) % MAX_ENTRIES
    const skipCount = this.count - total

    for (let i = 0; i < total; i++) {
      const idx = (startIdx + skipCount + i) % MAX_ENTRIES
      result.push(this.entries[idx])
    }

    return result
  }

  /**
   * Persists all buffered log entries to a timestamped JSON file in the logs directory.
   *
   * @returns Absolute path to the written log file.
   * @throws If no logs directory is configured or writing to disk fails.
   */
  flush(): string {
    if (!this.logsDir) {
      throw new Error('Cannot flush log ring: no logs directory configured')
    }

    const entries = this.getEntries()
    mkdirSync(this.logsDir, { recursive: true, mode: 0o700 })

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const filePath = join(this.logsDir, `log-ring-${timestamp}.json`)

    try {
      writeFileSync(filePath, JSON.stringify(entries, null, 2), { encoding: 'utf-8', mode: 0o600 })
    } catch (err) {
      throw new Error(
        `Failed to flush log ring to "${filePath}": ${err instanceof Error ? err.message : String(err)}`
      )
    }

    return filePath
  }

  private append(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      data: data !== undefined ? this.serializeData(data) : undefined
    }

    if (this.count < MAX_ENTRIES) {
      this.entries.push(entry)
      this.count++
      this.head = this.count % MAX_ENTRIES
    } else {
      this.entries[this.head] = entry
      this.head = (this.head + 1) % MAX_ENTRIES
    }

    if (LEVEL_RANK[level] >= LEVEL_RANK[this.mirrorLevel]) {
      process.stderr.write(`${JSON.stringify(entry)}\n`)
    }
  }

  /**
   * Converts Error instances to plain objects so entries stay JSON-serializable.
   */
  private serializeData(data: unknown): unknown {
    if (data instanceof Error) {
      return {
        name: data.name,
        message: data.message,
        stack: data.stack
      }
    }
    return data
  }
}
