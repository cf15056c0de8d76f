import { ConfigError, type ErrorContext } from "./config-error"

/** Tag or shape conflict: a tag on a leaf, a leaf where a node is expected, a key set twice. */
export class StructureError extends ConfigError<"structure"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, { code: "structure", context, cause })
  }
}

/** A non-default source referenced a key the default source never declared. */
export class UnknownParameterError extends ConfigError<"unknown_parameter"> {
  readonly path: string

  constructor(path: string, source: string) {
    super(`Parameter '${path}' from '${source}' does not exist in the default config`, {
      code: "unknown_parameter",
      context: { path, source },
    })
    this.path = path
  }
}

export class TypeMismatchError extends ConfigError<"type_mismatch"> {
  readonly path: string

  constructor(path: string, expected: string, received: string, source: string) {
    super(
      `Parameter '${path}' holds a ${expected} value and cannot be set to a ${received} value (from '${source}')`,
      { code: "type_mismatch", context: { path, expected, received, source } },
    )
    this.path = path
  }
}

export class PathNotFoundError extends ConfigError<"path_not_found"> {
  readonly path: string

  constructor(path: string) {
    super(`No parameter or sub-config at '${path}'`, {
      code: "path_not_found",
      context: { path },
    })
    this.path = path
  }
}

export class ImmutableConfigError extends ConfigError<"immutable_config"> {
  constructor(path: string) {
    super(
      `Cannot set '${path}': this config is locked. Use merge() or rebuild it with another regime.`,
      { code: "immutable_config", context: { path } },
    )
  }
}

/** A processing hook threw, or returned something other than one plain value. */
export class ProcessingError extends ConfigError<"processing"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, { code: "processing", context, cause })
  }
}

/** A saved config or hierarchy file does not have the expected shape. */
export class ArtifactError extends ConfigError<"artifact"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, { code: "artifact", context, cause })
  }
}
