import path from "node:path";
import { fs } from "zx";

import type { Architecture } from "./architectures.ts";
import type { ReferenceTargets } from "./config.ts";
import type { ResolutionEngine } from "./engine.ts";
import type { FailureKind, TrialResult } from "./ledger.ts";
import type { ReferenceTool } from "./reference-tool.ts";
import { resolveAllNo, resolveAllYes } from "./resolver.ts";
import { hasErrors, runSanityChecks } from "./sanity.ts";
import type { Scenario } from "./scenarios.ts";
import { Snapshot, diffSnapshots, formatDiff } from "./snapshot.ts";

export interface TrialRunnerOptions {
  srctree: string;
  snapshots: { reference: string; candidate: string };
  targets: ReferenceTargets;
  reference: ReferenceTool;
}

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/**
 * Runs one (architecture, scenario) trial:
 * clear → reset → resolve → invoke reference → compare.
 */
export class TrialRunner {
  readonly referencePath: string;
  readonly candidatePath: string;
  #options: TrialRunnerOptions;

  constructor(options: TrialRunnerOptions) {
    this.#options = options;
    this.referencePath = path.join(options.srctree, options.snapshots.reference);
    this.candidatePath = path.join(options.srctree, options.snapshots.candidate);
  }

  /** Cleared before every trial rather than after, so a crashed run leaves no stale input. */
  async clear(): Promise<void> {
    await fs.remove(this.referencePath);
    await fs.remove(this.candidatePath);
  }

  async run(
    engine: ResolutionEngine,
    architecture: Architecture,
    scenario: Scenario,
  ): Promise<TrialResult> {
    const fail = (kind: FailureKind, message: string): TrialResult => ({
      architecture,
      scenario,
      verdict: "fail",
      failure: { kind, message },
    });

    await this.clear();

    if (scenario.kind === "sanity") {
      try {
        const report = runSanityChecks(engine);
        if (!hasErrors(report)) return { architecture, scenario, verdict: "pass" };
        const errors = report.issues.filter((issue) => issue.severity === "error");
        return fail(
          "sanity",
          errors
            .map((issue) =>
              issue.symbol ? `${issue.symbol}: ${issue.message}` : issue.message,
            )
            .join("; "),
        );
      } catch (error) {
        return fail("engine", errorMessage(error));
      }
    }

    try {
      await this.#writeCandidate(engine, scenario);
    } catch (error) {
      return fail("engine", errorMessage(error));
    }
    if (!(await fs.pathExists(this.candidatePath))) {
      return fail("engine", `engine did not write ${this.#options.snapshots.candidate}`);
    }

    try {
      if (scenario.kind === "defconfig") {
        await fs.copy(
          path.join(this.#options.srctree, scenario.snapshot),
          this.referencePath,
        );
      }
      await this.#options.reference.run({
        architecture,
        target: this.#options.targets[scenario.kind],
      });
    } catch (error) {
      return fail("reference-tool", errorMessage(error));
    }
    if (!(await fs.pathExists(this.referencePath))) {
      return fail(
        "reference-tool",
        `reference tool did not write ${this.#options.snapshots.reference}`,
      );
    }

    const diff = diffSnapshots(
      Snapshot.read(this.referencePath),
      Snapshot.read(this.candidatePath),
    );
    if (diff === null) return { architecture, scenario, verdict: "pass" };

    return {
      architecture,
      scenario,
      verdict: "fail",
      failure: { kind: "mismatch", message: formatDiff(diff), diff },
    };
  }

  async #writeCandidate(
    engine: ResolutionEngine,
    scenario: Exclude<Scenario, { kind: "sanity" }>,
  ): Promise<void> {
    engine.reset();

    switch (scenario.kind) {
      case "allno":
        resolveAllNo(engine);
        break;
      case "allyes":
        resolveAllYes(engine);
        break;
      case "alldef":
        break;
      case "defconfig":
        await engine.loadConfig(path.join(this.#options.srctree, scenario.snapshot));
        break;
    }

    await engine.writeConfig(this.candidatePath);
  }
}
