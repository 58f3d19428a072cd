import { minimist } from "zx";

import {
  discoverArchitectures,
  discoverDefconfigs,
} from "../architectures.ts";
import { Script, type Runner } from "../lib.ts";
import { buildTrialPlan } from "../orchestrator.ts";

interface ListScriptArgs {
  json: boolean;
}

export default class ListScript extends Script {
  static override command = "list";
  static override description =
    "List the architectures, defconfigs and trials a run would cover";

  static args(runner: Runner): ListScriptArgs {
    const { json = false } = minimist(runner.argv, { boolean: ["json"] });
    return { json };
  }

  override async fn(): Promise<void> {
    const { srctree, architectures: archConfig, scenarios } = this.config;
    const args = ListScript.args(this.runner);

    const architectures = discoverArchitectures(srctree, archConfig);
    const snapshots = discoverDefconfigs(srctree, this.runner.logger);
    const trials = buildTrialPlan(architectures, snapshots, scenarios, {
      validPairsOnly: this.config.validPairsOnly,
    });

    if (args.json) {
      // bypasses the silent flag: the JSON is the output
      console.log(
        JSON.stringify(
          {
            architectures,
            defconfigs: snapshots.map((snapshot) => snapshot.path),
            scenarios,
            trials: trials.length,
          },
          null,
          2,
        ),
      );
      return;
    }

    const { chalk } = this.runner.logger;
    this.log(chalk.bold(`Architectures (${architectures.length}):`));
    for (const { arch, srcarch } of architectures) {
      this.log(arch === srcarch ? `  ${arch}` : `  ${arch} (arch/${srcarch})`);
    }
    this.log(chalk.bold(`Defconfigs (${snapshots.length}):`));
    for (const snapshot of snapshots) {
      this.log(`  ${snapshot.path}`);
    }
    this.log(chalk.bold(`Scenarios: ${scenarios.join(", ")}`));
    this.log(chalk.bold(`Trials: ${trials.length}`));
  }
}
