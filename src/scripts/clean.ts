import path from "node:path";
import { fs } from "zx";

import { Script } from "../lib.ts";

export default class CleanScript extends Script {
  static override command = "clean";
  static override description =
    "Remove snapshot files left in the source tree by an earlier run";

  override async fn(): Promise<void> {
    const { srctree, snapshots } = this.config;

    for (const file of [snapshots.reference, snapshots.candidate]) {
      const target = path.join(srctree, file);
      if (!(await fs.pathExists(target))) continue;
      await fs.remove(target);
      this.log(`Removed ${target}`);
    }
  }
}
