/**
 * Fields a memoized call may attach to its log lines.
 *
 * @remarks
 * `ring` names the bound function, `op` the verb that ran (`get`,
 * `getOrUpdateMany`, ...). Counters are per call.
 */
export type LogContext = {
  service: string
  env: string

  ring: string
  op: string
  flavor: "sync" | "async"
  adapter: string

  key: string
  keys: number
  hits: number
  misses: number
  computed: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
