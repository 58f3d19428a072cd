import fs from "node:fs";
import path from "node:path";
import { tempdir } from "zx";

import { createConfig, type Config, type CreateConfigOptions } from "../../src/config.ts";
import { Logger, Runner, type Script } from "../../src/lib.ts";

export type TreeSpec = Record<string, string>;

/** Write a throwaway source tree; keys are paths relative to its root. */
export function createTree(files: TreeSpec, root: string = tempdir()): string {
  for (const [file, contents] of Object.entries(files)) {
    const target = path.join(root, file);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, contents);
  }
  return root;
}

export function createTestConfig(options: CreateConfigOptions = {}): Config {
  const { root = tempdir(), env = {}, overrides = {}, ...rest } = options;
  return createConfig({
    root,
    env,
    overrides: { silent: true, ...overrides },
    ...rest,
  });
}

export function createRunner(config: Config, argv: string[] = []): Runner {
  return new Runner(config, argv, new Logger(config));
}

export function runScript(
  script: typeof Script,
  config: Config,
  argv: string[] = [],
): Promise<number> {
  return createRunner(config, argv).run(script);
}
