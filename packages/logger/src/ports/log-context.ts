/**
 * Fields the configuration engine attaches to its log entries.
 */
export type LogContext = {
  /** Emitting component, e.g. "config" or "merge". */
  module: string

  /** Name of the configuration tree (root node name). */
  config: string

  /** Source being merged, e.g. "experiment.yaml" or "command-line". */
  source: string

  /** Fully qualified parameter path. */
  path: string

  /** Processing phase ("pre" or "post"). */
  phase: string

  /** Overwriting regime in effect. */
  regime: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
