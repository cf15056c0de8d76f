import type { Logger } from "@strata/logger"
import type { Diagnostic, OverwritingRegime } from "../../ports/config"
import { ImmutableConfigError } from "../errors/errors"
import type { ParamValue } from "../tree/values"

/**
 * What a mutation policy may do to the config it guards.
 */
export type MutationTarget = {
  /** Writes the leaf directly, skipping kind checks and the hierarchy. */
  assign(path: string, value: ParamValue): void
  /** Sets the leaf through the merge pipeline, recorded as a "code" source. */
  mergeValue(path: string, value: ParamValue): void
  savedPath(): string | undefined
  save(file: string): string
  report(diagnostic: Diagnostic): void
}

export interface MutationPolicy {
  readonly regime: OverwritingRegime
  /** A direct `set()` after construction. */
  mutate(path: string, value: ParamValue): void
  /** Called after an explicit `merge()` on the built config. */
  afterMerge(): void
}

class LockedPolicy implements MutationPolicy {
  readonly regime = "locked"

  mutate(path: string): void {
    throw new ImmutableConfigError(path)
  }

  afterMerge(): void {}
}

class UnsafePolicy implements MutationPolicy {
  readonly regime = "unsafe"
  private noticed = false

  constructor(
    private readonly target: MutationTarget,
    private readonly log: Logger,
  ) {}

  mutate(path: string, value: ParamValue): void {
    if (!this.noticed) {
      this.noticed = true
      this.log.warn(
        "Config is in the unsafe regime: direct assignments are applied with no type check, no hierarchy entry and no auto-save",
        { path, regime: this.regime },
      )
      this.target.report({ kind: "unsafe-regime" })
    }

    this.target.assign(path, value)
  }

  afterMerge(): void {}
}

class AutoSavePolicy implements MutationPolicy {
  readonly regime = "auto-save"

  constructor(
    private readonly target: MutationTarget,
    private readonly log: Logger,
  ) {}

  mutate(path: string, value: ParamValue): void {
    this.target.mergeValue(path, value)
    this.afterMerge()
  }

  /** Re-saves to the recorded save path, if there is one. */
  afterMerge(): void {
    const file = this.target.savedPath()
    if (file === undefined) return

    this.target.save(file)
    this.log.warn(`Config was modified after being saved: overwrote '${file}'`, {
      path: file,
      regime: this.regime,
    })
    this.target.report({ kind: "auto-save", file })
  }
}

/**
 * Picks the on-mutate behaviour once, when the config is built. The regime
 * of a built config never changes; `withRegime()` builds a new one.
 */
export function createMutationPolicy(
  regime: OverwritingRegime,
  target: MutationTarget,
  logger: Logger,
): MutationPolicy {
  const log = logger.child({ module: "guard", regime })

  switch (regime) {
    case "locked":
      return new LockedPolicy()
    case "unsafe":
      return new UnsafePolicy(target, log)
    case "auto-save":
      return new AutoSavePolicy(target, log)
  }
}
