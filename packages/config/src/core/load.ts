import { createPinoLogger, type Logger } from "@strata/logger"
import { ObjectSource } from "../adapters/object/object-source"
import { resolveSource } from "../adapters/resolve-source"
import { SystemClock } from "../adapters/clock/system-clock"
import type { Clock } from "../ports/clock"
import type { OverwritingRegime } from "../ports/config"
import type { RuleInput } from "../ports/processing"
import type { HierarchyEntry, SourceInput } from "../ports/source"
import { COMMAND_LINE_SOURCE, CLIOverrideParser, gatherFlags } from "./cli/cli-override-parser"
import { splitCommandLine } from "./cli/command-line"
import { Config, sourceLookup } from "./config"
import { ArtifactError } from "./errors/errors"
import { MergeEngine } from "./merge/merge-engine"
import { readHierarchy } from "./persist/artifacts"
import { ProcessingRegistry } from "./processing/processing-registry"
import { type ConfigServices, createState } from "./state"

export type LoadConfigOptions = {
  /** Root node name. @default "main" */
  name?: string

  /** The source that declares every parameter. */
  defaultSource: SourceInput

  /** Experiment sources, merged in order after the default. */
  sources?: readonly SourceInput[]

  /** Command-line tokens (`--lr=0.1`, `--verbose`), merged last. */
  overrides?: readonly string[]

  /** Skip unknown command-line flags with a warning instead of throwing. */
  ignoreUnknownFlags?: boolean

  preProcessing?: readonly RuleInput[]
  postProcessing?: readonly RuleInput[]

  /** @default "auto-save" (a loaded saved config keeps its own) */
  regime?: OverwritingRegime

  logger?: Logger
  clock?: Clock

  /** @default process.cwd() */
  cwd?: string
}

function createServices(options: LoadConfigOptions): ConfigServices {
  return {
    logger: options.logger ?? createPinoLogger({}, { level: "info" }),
    clock: options.clock ?? new SystemClock(),
    cwd: options.cwd ?? process.cwd(),
    resolveSource,
  }
}

/**
 * Builds a config: default source, then each experiment source, then
 * command-line overrides, then one post-processing pass over every leaf.
 *
 * @example
 * ```ts
 * const config = loadConfig({
 *   defaultSource: "configs/default.yaml",
 *   sources: ["configs/small-batch.yaml"],
 *   overrides: process.argv.slice(2),
 *   postProcessing: [["*.lr", inRange(0, 1)]],
 * })
 * ```
 */
export function loadConfig(options: LoadConfigOptions): Config {
  const services = createServices(options)
  const registry = new ProcessingRegistry({ pre: options.preProcessing, post: options.postProcessing })
  const state = createState(options.name ?? "main", options.regime ?? "auto-save", registry)
  const engine = new MergeEngine(state, services)
  const log = services.logger.child({ module: "config", config: state.root.name })

  const resolve = (input: SourceInput) => resolveSource(input, sourceLookup(state.hierarchy, services.cwd))

  engine.merge(resolve(options.defaultSource), { isDefault: true })

  for (const input of options.sources ?? []) {
    engine.merge(resolve(input), { isDefault: false })
  }

  if (options.overrides && options.overrides.length > 0) {
    const parser = new CLIOverrideParser({
      logger: services.logger,
      ignoreUnknown: options.ignoreUnknownFlags,
      report: (diagnostic) => state.diagnostics.push(diagnostic),
    })
    const { overrides } = parser.parse(options.overrides, state.root)

    if (Object.keys(overrides).length > 0) {
      engine.merge(new ObjectSource(overrides, { name: COMMAND_LINE_SOURCE }), { isDefault: false })
    }
  }

  const leafPaths = state.root.leafPaths()
  engine.postProcess(leafPaths)

  for (const { phase, pattern } of registry.unmatched(leafPaths)) {
    log.warn(`${phase === "pre" ? "Pre" : "Post"}-processing pattern '${pattern}' matches no parameter`, {
      path: pattern,
      phase,
    })
    state.diagnostics.push({ kind: "unmatched-pattern", pattern, phase })
  }

  log.debug("Config built", { sources: state.hierarchy.length, regime: state.regime })

  return new Config(state, services)
}

/**
 * Like `loadConfig`, with experiment sources taken from `--config` when the
 * flag is present (falling back to `options.sources`) and every other flag
 * applied as an override.
 */
export function loadConfigFromArgv(
  argv: readonly string[],
  options: Omit<LoadConfigOptions, "overrides">,
): Config {
  const { configPaths } = gatherFlags(argv)

  return loadConfig({ ...options, sources: configPaths ?? options.sources, overrides: argv })
}

export function loadConfigFromCommandLine(
  line: string,
  options: Omit<LoadConfigOptions, "overrides">,
): Config {
  return loadConfigFromArgv(splitCommandLine(line), options)
}

/** Loads a file written by `save()`; its regime comes from its metadata. */
export function loadSavedConfig(
  file: string,
  options: Omit<LoadConfigOptions, "defaultSource"> = {},
): Config {
  return loadConfig({ ...options, defaultSource: file })
}

/** Rebuilds a config by merging hierarchy entries in order from scratch. */
export function replayHierarchy(
  entries: readonly HierarchyEntry[],
  options: Omit<LoadConfigOptions, "defaultSource" | "sources"> = {},
): Config {
  const [first, ...rest] = entries

  if (first === undefined) throw new ArtifactError("Cannot replay an empty hierarchy")

  return loadConfig({ ...options, defaultSource: first, sources: rest })
}

export function loadHierarchy(
  file: string,
  options: Omit<LoadConfigOptions, "defaultSource" | "sources"> = {},
): Config {
  return replayHierarchy(readHierarchy(file, options.cwd), options)
}
