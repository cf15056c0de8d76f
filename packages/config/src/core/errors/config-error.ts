export type ConfigErrorCode =
  | "structure"
  | "unknown_parameter"
  | "type_mismatch"
  | "path_not_found"
  | "immutable_config"
  | "processing"
  | "artifact"

/**
 * Structured data attached to an error (paths, kinds, source names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type ConfigErrorOptions<C extends ConfigErrorCode = ConfigErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
}>

/**
 * JSON-safe shape of a thrown value, used for logs and saved reports.
 */
export type SerializedConfigError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  cause?: SerializedConfigError
  stack?: string
}>

export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly timestamp: Date

  constructor(message: string, options: ConfigErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedConfigError {
    return serializeConfigError(this)
  }
}

export function serializeConfigError(
  err: unknown,
  options: { includeStack?: boolean } = {},
): SerializedConfigError {
  const includeStack = options.includeStack ?? false

  if (err instanceof ConfigError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeConfigError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeConfigError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    timestamp: new Date().toISOString(),
  }
}

export function isConfigError(e: unknown): e is ConfigError {
  return e instanceof ConfigError
}
