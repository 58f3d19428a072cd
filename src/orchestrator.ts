/**
 * Cross-validation run as a state machine.
 *
 *   idle ─START─▶ enumerating ─▶ dispatching ⇄ running
 *                     │               │
 *                     ▼               ▼
 *                   failed       summarizing ─▶ done
 *
 * Trials run strictly one after another: the engine and the reference tool
 * share the snapshot files in the source tree. A failing or crashing trial is
 * recorded and the run moves on; only enumeration errors end it early.
 */

import { assign, createActor, fromPromise, setup, waitFor } from "xstate";

import {
  discoverArchitectures,
  discoverDefconfigs,
  type Architecture,
  type DefconfigSnapshot,
} from "./architectures.ts";
import type { Config } from "./config.ts";
import type { EngineSource } from "./engine.ts";
import type { FailureLog } from "./failure-log.ts";
import type { Logger } from "./lib.ts";
import {
  ResultLedger,
  type LedgerSummary,
  type TrialResult,
} from "./ledger.ts";
import {
  describeScenario,
  type Scenario,
  type ScenarioKind,
} from "./scenarios.ts";
import type { TrialRunner } from "./trial.ts";

export interface TrialPlanItem {
  architecture: Architecture;
  scenario: Scenario;
}

export interface CrossCheckPlan {
  architectures: Architecture[];
  snapshots: DefconfigSnapshot[];
  trials: TrialPlanItem[];
}

export interface BuildTrialPlanOptions {
  /** Only pair an architecture with defconfigs from its own arch/ directory. */
  validPairsOnly?: boolean;
}

/**
 * Every scenario for every architecture, in scenario order. Replay covers the
 * full architecture × defconfig product unless `validPairsOnly` is set: pairing
 * an architecture with a foreign defconfig exercises unusual resolution paths.
 */
export function buildTrialPlan(
  architectures: Architecture[],
  snapshots: DefconfigSnapshot[],
  scenarios: ScenarioKind[],
  options: BuildTrialPlanOptions = {},
): TrialPlanItem[] {
  const trials: TrialPlanItem[] = [];

  for (const kind of scenarios) {
    for (const architecture of architectures) {
      if (kind !== "defconfig") {
        trials.push({ architecture, scenario: { kind } });
        continue;
      }
      for (const snapshot of snapshots) {
        if (options.validPairsOnly && snapshot.srcarch !== architecture.srcarch) {
          continue;
        }
        trials.push({
          architecture,
          scenario: { kind: "defconfig", snapshot: snapshot.path },
        });
      }
    }
  }

  return trials;
}

export function crashResult(item: TrialPlanItem, error: unknown): TrialResult {
  return {
    ...item,
    verdict: "fail",
    failure: {
      kind: "crash",
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

interface CrossCheckContext {
  ledger: ResultLedger;
  plan: TrialPlanItem[];
  cursor: number;
  error: unknown;
}

type CrossCheckEvent = { type: "START" };

interface CrossCheckInput {
  ledger: ResultLedger;
}

export const crossCheckMachine = setup({
  types: {
    context: {} as CrossCheckContext,
    events: {} as CrossCheckEvent,
    input: {} as CrossCheckInput,
  },
  actors: {
    enumerate: fromPromise<CrossCheckPlan>(async () => {
      throw new Error("enumerate actor not provided");
    }),
    runTrial: fromPromise<TrialResult, TrialPlanItem>(async () => {
      throw new Error("runTrial actor not provided");
    }),
  },
  guards: {
    hasPendingTrials: ({ context }) => context.cursor < context.plan.length,
  },
}).createMachine({
  id: "crosscheck",
  initial: "idle",
  context: ({ input }) => ({
    ledger: input.ledger,
    plan: [],
    cursor: 0,
    error: null,
  }),
  states: {
    idle: {
      on: { START: "enumerating" },
    },
    enumerating: {
      invoke: {
        src: "enumerate",
        onDone: {
          target: "dispatching",
          actions: assign({ plan: ({ event }) => event.output.trials }),
        },
        onError: {
          target: "failed",
          actions: assign({ error: ({ event }) => event.error }),
        },
      },
    },
    dispatching: {
      always: [
        { guard: "hasPendingTrials", target: "running" },
        { target: "summarizing" },
      ],
    },
    running: {
      invoke: {
        src: "runTrial",
        input: ({ context }) => context.plan[context.cursor],
        onDone: {
          target: "dispatching",
          actions: [
            ({ context, event }) => context.ledger.record(event.output),
            assign({ cursor: ({ context }) => context.cursor + 1 }),
          ],
        },
        onError: {
          target: "dispatching",
          actions: [
            ({ context, event }) =>
              context.ledger.record(
                crashResult(context.plan[context.cursor], event.error),
              ),
            assign({ cursor: ({ context }) => context.cursor + 1 }),
          ],
        },
      },
    },
    summarizing: {
      entry: ({ context }) => {
        context.ledger.finalize();
      },
      always: "done",
    },
    done: { type: "final" },
    failed: { type: "final" },
  },
});

export interface OrchestratorOptions {
  config: Pick<
    Config,
    "srctree" | "scenarios" | "validPairsOnly" | "architectures"
  >;
  engines: EngineSource;
  trials: TrialRunner;
  logger: Logger;
  failureLog?: FailureLog | null;
}

export function progressLine(result: TrialResult): string {
  const arch = `  ${result.architecture.arch.padEnd(14)}`;
  const subject =
    result.scenario.kind === "defconfig"
      ? `with ${result.scenario.snapshot.padEnd(60)} `
      : "";
  return `${arch}${subject}${result.verdict === "pass" ? "OK" : "FAIL"}`;
}

export class Orchestrator {
  #options: OrchestratorOptions;
  #currentKind: ScenarioKind | null = null;

  constructor(options: OrchestratorOptions) {
    this.#options = options;
  }

  enumerate(): CrossCheckPlan {
    const { config, logger } = this.#options;
    logger.log("Enumerating architectures...");

    const architectures = discoverArchitectures(config.srctree, {
      skip: config.architectures.skip,
      aliases: config.architectures.aliases,
      only: config.architectures.only,
    });
    const snapshots = config.scenarios.includes("defconfig")
      ? discoverDefconfigs(config.srctree, logger)
      : [];

    return {
      architectures,
      snapshots,
      trials: buildTrialPlan(architectures, snapshots, config.scenarios, {
        validPairsOnly: config.validPairsOnly,
      }),
    };
  }

  async runTrial(item: TrialPlanItem): Promise<TrialResult> {
    const { engines, trials, logger, failureLog } = this.#options;

    if (item.scenario.kind !== this.#currentKind) {
      if (this.#currentKind !== null) logger.log("");
      this.#currentKind = item.scenario.kind;
      logger.log(logger.chalk.bold(describeScenario(item.scenario.kind)));
    }

    let result: TrialResult;
    try {
      const engine = await engines.get(item.architecture);
      result = await trials.run(engine, item.architecture, item.scenario);
    } catch (error) {
      // engine construction failed; the trial runner converts its own errors
      result = {
        ...item,
        verdict: "fail",
        failure: {
          kind: "engine",
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }

    const { chalk } = logger;
    const line = progressLine(result);
    logger.log(result.verdict === "pass" ? line : chalk.red(line));
    if (result.failure) {
      logger.log(chalk.gray(`    ${result.failure.kind}: ${result.failure.message}`));
    }

    if (result.verdict === "fail" && failureLog) {
      try {
        await failureLog.append(result);
      } catch (error) {
        logger.error(
          chalk.yellow(
            `Could not append to ${failureLog.path}: ${error instanceof Error ? error.message : String(error)}`,
          ),
        );
      }
    }

    return result;
  }

  async run(): Promise<LedgerSummary> {
    const ledger = new ResultLedger();
    this.#currentKind = null;

    const machine = crossCheckMachine.provide({
      actors: {
        enumerate: fromPromise<CrossCheckPlan>(async () => this.enumerate()),
        runTrial: fromPromise<TrialResult, TrialPlanItem>(async ({ input }) =>
          this.runTrial(input),
        ),
      },
    });

    const actor = createActor(machine, { input: { ledger } });
    actor.start();
    actor.send({ type: "START" });

    const snapshot = await waitFor(actor, (state) => state.status === "done", {
      timeout: Infinity,
    });
    actor.stop();

    if (snapshot.matches("failed")) {
      const { error } = snapshot.context;
      throw error instanceof Error ? error : new Error(String(error));
    }
    return ledger.summary();
  }
}
