import type { Logger } from "@strata/logger"
import { parse as parseYaml } from "yaml"
import type { Diagnostic, WildcardExpansion } from "../../ports/config"
import type { SourceMapping } from "../tree/tags"
import { TypeMismatchError, UnknownParameterError } from "../errors/errors"
import { isPattern, matchPaths } from "../path/path-matcher"
import type { ConfigNode } from "../tree/config-node"
import { isParamValue, kindOf, type ParamValue } from "../tree/values"

/** Reserved flag selecting experiment source files. */
export const CONFIG_FLAG = "config"

export const COMMAND_LINE_SOURCE = "command-line"

export type CommandLineFlag = {
  name: string
  /** Undefined for a bare flag. */
  literal: string | undefined
}

export type GatheredFlags = {
  flags: CommandLineFlag[]
  /** Paths given with `--config`, when present. */
  configPaths: string[] | undefined
  /** Tokens before the first flag. */
  positional: string[]
}

export type ParsedOverrides = {
  /** Expanded leaf path → decoded value, ready to merge as one source. */
  overrides: SourceMapping
  expansions: WildcardExpansion[]
  configPaths: string[] | undefined
}

export type CLIOverrideParserOptions = {
  logger: Logger
  /** Log and skip unknown literal flags instead of throwing. */
  ignoreUnknown?: boolean
  report?: (diagnostic: Diagnostic) => void
}

/**
 * `--config a.yaml,b.yaml`, `--config [a.yaml, b.yaml]` or `--config=a.yaml`.
 */
export function parseConfigPaths(raw: string): string[] {
  return raw
    .trim()
    .replace(/^\[/, "")
    .replace(/\]$/, "")
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
}

/**
 * Groups tokens into flags. Words after a flag up to the next flag form its
 * literal, joined with spaces; `--name=` counts as bare.
 */
export function gatherFlags(tokens: readonly string[]): GatheredFlags {
  const flags: CommandLineFlag[] = []
  const positional: string[] = []
  let configPaths: string[] | undefined
  let current: { name: string; parts: string[] } | undefined

  const flush = () => {
    if (!current) return

    const literal = current.parts.length > 0 ? current.parts.join(" ") : undefined

    if (current.name === CONFIG_FLAG) configPaths = [...(configPaths ?? []), ...parseConfigPaths(literal ?? "")]
    else flags.push({ name: current.name, literal })
    current = undefined
  }

  for (const token of tokens) {
    if (token.startsWith("--") && token.length > 2) {
      flush()

      const body = token.slice(2)
      const eq = body.indexOf("=")
      const rest = eq >= 0 ? body.slice(eq + 1) : ""

      current = { name: eq >= 0 ? body.slice(0, eq) : body, parts: rest !== "" ? [rest] : [] }
    } else if (current) {
      current.parts.push(token)
    } else {
      positional.push(token)
    }
  }
  flush()

  return { flags, configPaths, positional }
}

/**
 * Decodes a command-line literal with YAML scalar/flow rules: `true`, `3`,
 * `0.01`, `[1, 2]`, `{a: 1}`. A bare flag is `true`; anything YAML rejects
 * stays a string.
 */
export function decodeLiteral(literal: string | undefined): ParamValue {
  if (literal === undefined) return true

  let decoded: unknown

  try {
    decoded = parseYaml(literal)
  } catch {
    return literal
  }

  return isParamValue(decoded) ? decoded : literal
}

export class CLIOverrideParser {
  private readonly log: Logger

  constructor(private readonly opts: CLIOverrideParserOptions) {
    this.log = opts.logger.child({ module: "cli", source: COMMAND_LINE_SOURCE })
  }

  /**
   * Turns tokens into type-checked overrides against `root`. The decoded kind
   * must equal the current kind exactly, so null-valued parameters cannot be
   * set from the command line.
   */
  parse(tokens: readonly string[], root: ConfigNode): ParsedOverrides {
    const { flags, configPaths } = gatherFlags(tokens)
    const leafPaths = root.leafPaths()
    const overrides: SourceMapping = {}
    const expansions: WildcardExpansion[] = []

    for (const flag of flags) {
      const value = decodeLiteral(flag.literal)
      const targets = this.resolveTargets(flag.name, leafPaths, expansions)

      for (const target of targets) {
        const entry = root.find(target)
        if (entry?.kind !== "leaf") continue

        const current = kindOf(entry.value)
        const incoming = kindOf(value)

        if (current === "null" || current !== incoming) {
          throw new TypeMismatchError(target, current, incoming, COMMAND_LINE_SOURCE)
        }
        overrides[target] = value
      }
    }

    return { overrides, expansions, configPaths }
  }

  private resolveTargets(name: string, leafPaths: string[], expansions: WildcardExpansion[]): string[] {
    if (isPattern(name)) {
      const matches = matchPaths(name, leafPaths)

      expansions.push({ pattern: name, matches })
      this.opts.report?.({ kind: "wildcard-match", pattern: name, source: COMMAND_LINE_SOURCE, matches })

      if (matches.length === 0) {
        this.log.warn(`Pattern parameter '${name}' will be ignored: it matches no existing parameter`, {
          path: name,
        })
      } else {
        this.log.info(`Pattern parameter '${name}' will be merged into: ${matches.join(", ")}`, {
          path: name,
          matches,
        })
      }

      return matches
    }

    if (leafPaths.includes(name)) return [name]

    if (!this.opts.ignoreUnknown) throw new UnknownParameterError(name, COMMAND_LINE_SOURCE)

    this.log.warn(`Command-line flag '--${name}' matches no parameter and is ignored`, { path: name })
    this.opts.report?.({ kind: "unknown-flag", name })

    return []
  }
}
