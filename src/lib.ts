import { chalk } from "zx";

import type { Config } from "./config.ts";

export { chalk };

/**
 * Logger for script output.
 */
export class Logger {
  config: Pick<Config, "silent">;

  constructor(config: Pick<Config, "silent">) {
    this.config = config;
  }

  get chalk(): typeof chalk {
    return chalk;
  }

  log(...args: unknown[]): void {
    if (this.config.silent) return;
    console.log(...args);
  }

  error(...args: unknown[]): void {
    console.error(...args);
  }
}

export interface ScriptDependency {
  class: typeof Script;
  enabled: boolean | ((runner: Runner) => boolean | Promise<boolean>);
}

export class Script {
  static command = "";
  static description = "";
  static dependencies: ScriptDependency[] = [];

  runner: Runner;

  constructor(runner: Runner) {
    this.runner = runner;
  }

  async fn(): Promise<void> {
    throw new Error("Not implemented");
  }

  get config(): Config {
    return this.runner.config;
  }

  log(...message: unknown[]): void {
    this.runner.logger.log(...message);
  }
}

export class Runner {
  config: Config;
  logger: Logger;
  argv: string[];
  exitCode = 0;

  constructor(config: Config, argv: string[] = [], logger: Logger = new Logger(config)) {
    this.config = config;
    this.logger = logger;
    this.argv = argv;
  }

  async isDependencyEnabled(dependency: ScriptDependency): Promise<boolean> {
    return typeof dependency.enabled === "function"
      ? await dependency.enabled(this)
      : dependency.enabled;
  }

  async resolveDependencies(
    ScriptClass: typeof Script,
    dependenciesMap: Map<typeof Script, boolean[]> = new Map(),
  ): Promise<Map<typeof Script, boolean[]>> {
    for (const dependency of ScriptClass.dependencies) {
      const enabled = await this.isDependencyEnabled(dependency);

      const enabledArr = dependenciesMap.get(dependency.class) || [];
      enabledArr.push(enabled);
      dependenciesMap.set(dependency.class, enabledArr);

      if (enabled) {
        await this.resolveDependencies(dependency.class, dependenciesMap);
      }
    }
    return dependenciesMap;
  }

  async run(ScriptClass: typeof Script): Promise<number> {
    const scripts = await this.resolveDependencies(ScriptClass);
    scripts.set(ScriptClass, [true]);
    const line = (length: number) => "=".repeat(Math.round(length * 1.618));

    for (const [ScriptToRun, enabledArr] of scripts.entries()) {
      const enabled = enabledArr.some(Boolean);
      const skipped = enabled ? "" : chalk.bold("(skipped)");
      const color = enabled ? chalk.magenta : chalk.gray;
      const message = `${chalk.bold(ScriptToRun.command)}: ${ScriptToRun.description} ${skipped}`;
      const length = message.length + 2;
      this.logger.log(color([line(length), message, line(length)].join("\n")));
      if (!enabled) continue;

      const scriptInstance = new ScriptToRun(this);
      await scriptInstance.fn();
    }
    return this.exitCode;
  }
}
