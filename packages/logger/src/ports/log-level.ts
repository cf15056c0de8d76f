export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === "string" && (logLevelNames as readonly string[]).includes(value)
}
