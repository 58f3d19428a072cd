import { ConfigError } from "../config.ts";
import { EngineRegistry, loadEngineFactory, type EngineSource } from "../engine.ts";
import { Environment } from "../environment.ts";
import { FailureLog } from "../failure-log.ts";
import { Script, type ScriptDependency } from "../lib.ts";
import type { LedgerSummary } from "../ledger.ts";
import { Orchestrator } from "../orchestrator.ts";
import { MakeReferenceTool, type ReferenceTool } from "../reference-tool.ts";
import { scenarioLabel } from "../scenarios.ts";
import { TrialRunner } from "../trial.ts";
import CleanScript from "./clean.ts";

export default class RunScript extends Script {
  static override command = "run";
  static override description =
    "Cross-check the engine against the reference tool for every architecture";
  static override dependencies: ScriptDependency[] = [
    {
      class: CleanScript,
      enabled: true,
    },
  ];

  async createEngineSource(): Promise<EngineSource> {
    const { engine, root, srctree, kernelVersion } = this.config;
    if (!engine) {
      throw new ConfigError(
        "No engine module configured: set `engine` in crosscheck.yml, CROSSCHECK_ENGINE or --engine",
        this.config.configPath,
      );
    }
    const factory = await loadEngineFactory(engine, root);
    return new EngineRegistry(factory, srctree, kernelVersion);
  }

  createReferenceTool(): ReferenceTool {
    const { srctree, make, timeoutMs } = this.config;
    return new MakeReferenceTool({
      srctree,
      make,
      timeoutMs,
      environment: new Environment(this.config),
    });
  }

  override async fn(): Promise<void> {
    const { config } = this;
    const orchestrator = new Orchestrator({
      config,
      engines: await this.createEngineSource(),
      trials: new TrialRunner({
        srctree: config.srctree,
        snapshots: config.snapshots,
        targets: config.targets,
        reference: this.createReferenceTool(),
      }),
      logger: this.runner.logger,
      failureLog: config.failureLog ? new FailureLog(config.failureLog) : null,
    });

    const summary = await orchestrator.run();
    this.report(summary);
    if (!summary.allPassed) this.runner.exitCode = 1;
  }

  report(summary: LedgerSummary): void {
    const { chalk } = this.runner.logger;
    this.log("");

    if (summary.allPassed) {
      this.log(chalk.green("All OK"));
    } else {
      this.log(chalk.red("Some tests failed"));
      for (const failure of summary.failures) {
        this.log(
          chalk.red(
            `  ${failure.architecture.arch} ${scenarioLabel(failure.scenario)}: ${failure.failure?.kind ?? "fail"}`,
          ),
        );
      }
      if (this.config.failureLog) {
        this.log(`Failures were appended to ${this.config.failureLog}`);
      }
    }

    this.log(`${summary.pairs} arch/defconfig pairs tested`);
    this.log(`${summary.passed}/${summary.total} trials passed`);
  }
}
