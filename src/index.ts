import process from "node:process";
import { chalk, minimist } from "zx";
import { z } from "zod";

import { createConfig, type ConfigOverrides } from "./config.ts";
import { Logger, Runner, type Script } from "./lib.ts";
import { ScenarioKindSchema } from "./scenarios.ts";

import Clean from "./scripts/clean.ts";
import Compare from "./scripts/compare.ts";
import List from "./scripts/list.ts";
import Run from "./scripts/run.ts";

export const scripts: Record<string, typeof Script> = {
  run: Run,
  list: List,
  compare: Compare,
  clean: Clean,
};

const USAGE = `Usage: kconfig-crosscheck [command] [options]

Options:
  --config <file>        configuration file (default: ./crosscheck.yml)
  --srctree <dir>        kernel source tree
  --engine <module>      module exporting createEngine()
  --arch <name>          only test this architecture (repeatable)
  --scenario <kind>      only run this scenario (repeatable)
  --sanity               also run the accessor sanity scenario
  --valid-pairs-only     replay defconfigs on their own architecture only
  --no-failure-log       do not append failures to the failure log
  --timeout <ms>         reference tool timeout per trial
  --silent               suppress progress output
  --json                 machine-readable output (list)`;

function printHelp(message: string, exitCode = 1): number {
  const color = exitCode === 0 ? chalk.green : chalk.red;
  console.log(color(message));
  console.log(chalk.yellow("Available commands:"));
  console.log(
    chalk.yellow(
      Object.values(scripts)
        .map((script) => `  ${script.command.padEnd(10)}${script.description}`)
        .join("\n"),
    ),
  );
  return exitCode;
}

const toArray = (value: unknown): string[] =>
  (Array.isArray(value) ? value : value === undefined ? [] : [value]).map(String);

export function parseOverrides(argv: string[]): ConfigOverrides {
  const args = minimist(argv, {
    string: ["config", "srctree", "engine", "arch", "scenario", "timeout"],
    boolean: ["sanity", "valid-pairs-only", "failure-log", "silent"],
    default: { "failure-log": true },
  });

  return {
    srctree: args.srctree || undefined,
    engine: args.engine || undefined,
    timeoutMs: args.timeout
      ? z.coerce.number().int().positive().parse(args.timeout)
      : undefined,
    only: toArray(args.arch),
    scenarios: z.array(ScenarioKindSchema).parse(toArray(args.scenario)),
    sanity: args.sanity || undefined,
    validPairsOnly: args["valid-pairs-only"] || undefined,
    failureLog: args["failure-log"] === false ? false : undefined,
    silent: args.silent || undefined,
  };
}

export default async function main(
  _argv: string[] = process.argv,
  _env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const argv = _argv.slice(2);
  const args = minimist(argv, { string: ["config"] });

  if (args.help) {
    return printHelp(USAGE, 0);
  }

  const command = String(args._[0] ?? "run");
  const ScriptClass = scripts[command];
  if (!ScriptClass) {
    return printHelp(`Unknown command: ${command}\n\n${USAGE}`);
  }

  const config = createConfig({
    configPath: args.config || undefined,
    env: _env,
    overrides: parseOverrides(argv),
  });
  const logger = new Logger(config);
  const runner = new Runner(config, argv, logger);

  try {
    return await runner.run(ScriptClass);
  } catch (error) {
    if (error instanceof Error) {
      runner.logger.error(chalk.red(`\n${error.message}\n`));
    }
    throw error;
  }
}
