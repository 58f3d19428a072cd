import path from "node:path";
import { minimist } from "zx";

import { Script, type Runner } from "../lib.ts";
import { Snapshot, diffSnapshots, formatDiff } from "../snapshot.ts";

interface CompareScriptArgs {
  reference: string | undefined;
  candidate: string | undefined;
}

export default class CompareScript extends Script {
  static override command = "compare";
  static override description =
    "Compare two configuration files, ignoring their headers";

  static args(runner: Runner): CompareScriptArgs {
    const {
      _: [, reference, candidate],
    } = minimist(runner.argv);
    return {
      reference: reference === undefined ? undefined : String(reference),
      candidate: candidate === undefined ? undefined : String(candidate),
    };
  }

  override async fn(): Promise<void> {
    const { reference, candidate } = CompareScript.args(this.runner);
    if (!reference || !candidate) {
      throw new Error("Usage: compare <reference> <candidate>");
    }

    const { chalk } = this.runner.logger;
    const diff = diffSnapshots(
      Snapshot.read(path.resolve(this.config.root, reference)),
      Snapshot.read(path.resolve(this.config.root, candidate)),
    );

    if (diff === null) {
      this.log(chalk.green("Configurations match"));
      return;
    }
    this.log(chalk.red(formatDiff(diff)));
    this.runner.exitCode = 1;
  }
}
