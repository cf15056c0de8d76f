import type { LogLevelName } from "./log-level"

/**
 * Options shared by Logger adapters.
 *
 * @remarks
 * `prettify` is meant for local runs; structured JSON stays the default so
 * saved experiment logs can be parsed later.
 */
export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /** Render human-readable lines instead of JSON. */
  prettify?: boolean
}
