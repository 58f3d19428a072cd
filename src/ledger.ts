import type { Architecture } from "./architectures.ts";
import type { Scenario } from "./scenarios.ts";
import type { SnapshotDiff } from "./snapshot.ts";

export type FailureKind =
  | "mismatch"
  | "reference-tool"
  | "engine"
  | "sanity"
  | "crash";

export interface TrialFailure {
  kind: FailureKind;
  message: string;
  diff?: SnapshotDiff;
}

export interface TrialResult {
  architecture: Architecture;
  scenario: Scenario;
  verdict: "pass" | "fail";
  failure?: TrialFailure;
}

export interface LedgerSummary {
  total: number;
  passed: number;
  failed: number;
  /** Number of architecture/defconfig pairs replayed. */
  pairs: number;
  allPassed: boolean;
  failures: TrialResult[];
}

export class LedgerFinalizedError extends Error {
  constructor() {
    super("Cannot record a trial result after the ledger was finalized");
    this.name = "LedgerFinalizedError";
  }
}

/**
 * Results of one orchestration run. Created at run start, written once per
 * trial and finalized when every planned trial has been attempted.
 */
export class ResultLedger {
  #results: TrialResult[] = [];
  #state: "open" | "finalized" = "open";

  get state(): "open" | "finalized" {
    return this.#state;
  }

  get results(): readonly TrialResult[] {
    return this.#results;
  }

  get allPassed(): boolean {
    return this.#results.every((result) => result.verdict === "pass");
  }

  record(result: TrialResult): void {
    if (this.#state === "finalized") throw new LedgerFinalizedError();
    this.#results.push(result);
  }

  summary(): LedgerSummary {
    const failures = this.#results.filter((result) => result.verdict === "fail");
    return {
      total: this.#results.length,
      passed: this.#results.length - failures.length,
      failed: failures.length,
      pairs: this.#results.filter((result) => result.scenario.kind === "defconfig")
        .length,
      allPassed: failures.length === 0,
      failures,
    };
  }

  finalize(): LedgerSummary {
    this.#state = "finalized";
    return this.summary();
  }
}
