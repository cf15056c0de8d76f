export { FakeClock } from "./adapters/clock/fake-clock"
export { SystemClock } from "./adapters/clock/system-clock"
export { JsonSource } from "./adapters/json/json-source"
export type { JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export type { ObjectSourceOptions } from "./adapters/object/object-source"
export { findSourceFile, isConfigSource, resolveSource } from "./adapters/resolve-source"
export { YamlSource } from "./adapters/yaml/yaml-source"
export type { YamlSourceOptions } from "./adapters/yaml/yaml-source"
export {
  CLIOverrideParser,
  CONFIG_FLAG,
  decodeLiteral,
  gatherFlags,
  parseConfigPaths,
} from "./core/cli/cli-override-parser"
export type { CommandLineFlag, GatheredFlags, ParsedOverrides } from "./core/cli/cli-override-parser"
export { splitCommandLine } from "./core/cli/command-line"
export { Config } from "./core/config"
export { ConfigError, isConfigError, serializeConfigError } from "./core/errors/config-error"
export type { ConfigErrorCode, SerializedConfigError } from "./core/errors/config-error"
export {
  ArtifactError,
  ImmutableConfigError,
  PathNotFoundError,
  ProcessingError,
  StructureError,
  TypeMismatchError,
  UnknownParameterError,
} from "./core/errors/errors"
export {
  loadConfig,
  loadConfigFromArgv,
  loadConfigFromCommandLine,
  loadHierarchy,
  loadSavedConfig,
  replayHierarchy,
} from "./core/load"
export type { LoadConfigOptions } from "./core/load"
export { isPattern, matchesPattern, matchPaths, PathMatcher } from "./core/path/path-matcher"
export { hierarchyPathFor, HIERARCHY_KEY, readHierarchy } from "./core/persist/artifacts"
export { METADATA_KEY } from "./core/persist/metadata"
export type { ConfigMetadata } from "./core/persist/metadata"
export { builtin, ProcessingRegistry } from "./core/processing/processing-registry"
export {
  checkSchema,
  copyParam,
  folderInExperiment,
  inRange,
  oneOf,
  protectedParam,
  resolvePath,
} from "./core/processing/transforms"
export type { FolderCondition } from "./core/processing/transforms"
export { ConfigNode } from "./core/tree/config-node"
export type { ConfigEntry } from "./core/tree/config-node"
export { builtinHookNames, replace, Tagged, tagged } from "./core/tree/tags"
export type { BuiltinHookName, SourceMapping, SourceValue } from "./core/tree/tags"
export type { ParamMapping, ParamValue, ValueKind } from "./core/tree/values"
export { planVariations } from "./core/variations/variation-expander"
export type { Grid, Variation, VariationEntry, VariationPlan } from "./core/variations/variation-expander"
export type { Clock } from "./ports/clock"
export { overwritingRegimes } from "./ports/config"
export type {
  ConfigDifference,
  Diagnostic,
  IConfig,
  MergeReport,
  OverwritingRegime,
  WildcardExpansion,
} from "./ports/config"
export type {
  BuiltinRef,
  ContextualTransform,
  ProcessingContext,
  ProcessingHandler,
  ProcessingPhase,
  RuleInput,
  Transform,
} from "./ports/processing"
export type { ConfigSource, HierarchyEntry, ParsedSource, SourceDocument, SourceInput } from "./ports/source"
