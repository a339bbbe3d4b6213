import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Options define policy (which levels are emitted, how lines are rendered);
 * adapters decide how to honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" suppresses the per-call "debug" lines rings emit.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development. Keep off in production,
   * where JSON lines are ingested by log processors.
   */
  prettify?: boolean
}
