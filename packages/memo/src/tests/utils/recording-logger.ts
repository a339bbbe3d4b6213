import type { LogContextPatch, LogLevelName, LogMeta, Logger } from "@halyard/logger"

export type RecordedLine = {
  level: LogLevelName
  message: string
  meta: LogMeta | undefined
  context: LogContextPatch
}

/** Logger that keeps every line in memory, with the child context it was emitted under. */
export class RecordingLogger implements Logger {
  constructor(
    readonly lines: RecordedLine[] = [],
    private readonly context: LogContextPatch = {},
  ) {}

  trace(message: string, meta?: LogMeta): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): RecordingLogger {
    return new RecordingLogger(this.lines, { ...this.context, ...context })
  }

  messages(level: LogLevelName): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message)
  }

  private record(level: LogLevelName, message: string, meta: LogMeta | undefined): void {
    this.lines.push({ level, message, meta, context: this.context })
  }
}
