import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { parseEnv } from "znv";

import {
  DEFAULT_ARCH_ALIASES,
  DEFAULT_SKIPPED_ARCHITECTURES,
} from "./architectures.ts";
import {
  DEFAULT_SCENARIOS,
  ScenarioKindSchema,
  type ScenarioKind,
} from "./scenarios.ts";

export const DEFAULT_CONFIG_FILE = "crosscheck.yml";

const TargetsSchema = z.object({
  allno: z.string().min(1).default("allnoconfig"),
  allyes: z.string().min(1).default("allyesconfig"),
  alldef: z.string().min(1).default("alldefconfig"),
  defconfig: z.string().min(1).default("olddefconfig"),
});

const ConfigFileSchema = z
  .object({
    srctree: z.string().min(1).optional(),
    engine: z.string().min(1).optional(),
    kernel_version: z.string().min(1).default("2"),
    make: z.string().min(1).default("make"),
    timeout_ms: z.number().int().positive().default(600_000),
    allconfig: z.string().min(1).optional(),
    snapshots: z
      .object({
        reference: z.string().min(1).default(".config"),
        candidate: z.string().min(1).default("._config"),
      })
      .default({}),
    failure_log: z
      .union([z.string().min(1), z.literal(false)])
      .default("crosscheck_failures.log"),
    architectures: z
      .object({
        skip: z.array(z.string()).default(DEFAULT_SKIPPED_ARCHITECTURES),
        aliases: z
          .record(z.string(), z.array(z.string()))
          .default(DEFAULT_ARCH_ALIASES),
        only: z.array(z.string()).default([]),
      })
      .default({}),
    targets: TargetsSchema.default({}),
    scenarios: z.array(ScenarioKindSchema).min(1).default(DEFAULT_SCENARIOS),
    valid_pairs_only: z.boolean().default(false),
  })
  .refine(
    (data) => data.snapshots.reference !== data.snapshots.candidate,
    { message: "snapshots.reference and snapshots.candidate must differ" },
  );

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ReferenceTargets = z.infer<typeof TargetsSchema>;

export interface Config {
  root: string;
  configPath: string | null;
  srctree: string;
  engine: string | null;
  kernelVersion: string;
  make: string;
  timeoutMs: number;
  /** Explicit KCONFIG_ALLCONFIG; the variable is removed otherwise. */
  allconfig: string | null;
  snapshots: { reference: string; candidate: string };
  /** Absolute path of the failure log, or null when disabled. */
  failureLog: string | null;
  architectures: {
    skip: string[];
    aliases: Record<string, string[]>;
    only: string[];
  };
  targets: ReferenceTargets;
  scenarios: ScenarioKind[];
  validPairsOnly: boolean;
  silent: boolean;
}

export interface ConfigOverrides {
  srctree?: string;
  engine?: string;
  timeoutMs?: number;
  only?: string[];
  scenarios?: ScenarioKind[];
  validPairsOnly?: boolean;
  /** Add the accessor sanity scenario to whatever else runs. */
  sanity?: boolean;
  failureLog?: false;
  silent?: boolean;
}

export interface CreateConfigOptions {
  root?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export class ConfigError extends Error {
  readonly configPath: string | null;

  constructor(message: string, configPath: string | null = null) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

function readConfigFile(filePath: string): unknown {
  try {
    const contents = fs.readFileSync(filePath, "utf-8");
    return contents ? (parseYaml(contents) ?? {}) : {};
  } catch (error) {
    throw new ConfigError(
      `Failed to read: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
    );
  }
}

function parseConfigFile(filePath: string | null): ConfigFile {
  const document = filePath ? readConfigFile(filePath) : {};
  const parsed = ConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(issues, filePath);
  }
  return parsed.data;
}

function parseEnvironment(env: NodeJS.ProcessEnv) {
  return parseEnv(env, {
    CROSSCHECK_SRCTREE: z.string().min(1).optional(),
    CROSSCHECK_ENGINE: z.string().min(1).optional(),
    CROSSCHECK_TIMEOUT_MS: z.number().int().positive().optional(),
    CROSSCHECK_KERNELVERSION: z.string().min(1).optional(),
  });
}

function withSanity(scenarios: ScenarioKind[], sanity: boolean): ScenarioKind[] {
  if (!sanity || scenarios.includes("sanity")) return scenarios;
  const order = ScenarioKindSchema.options;
  return [...scenarios, "sanity" as const].sort(
    (a, b) => order.indexOf(a) - order.indexOf(b),
  );
}

/**
 * Resolve the run configuration: crosscheck.yml (optional), then
 * environment variables, then command-line overrides.
 */
export function createConfig(options: CreateConfigOptions = {}): Config {
  const { env = process.env, overrides = {} } = options;
  const root = path.resolve(options.root ?? process.cwd());

  let configPath: string | null = null;
  if (options.configPath) {
    configPath = path.resolve(root, options.configPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigError("Configuration file does not exist", configPath);
    }
  } else if (fs.existsSync(path.join(root, DEFAULT_CONFIG_FILE))) {
    configPath = path.join(root, DEFAULT_CONFIG_FILE);
  }

  const file = parseConfigFile(configPath);
  const vars = parseEnvironment(env);
  const baseDir = configPath ? path.dirname(configPath) : root;

  // srctree in crosscheck.yml is relative to the file itself
  const srctreeBase =
    overrides.srctree || vars.CROSSCHECK_SRCTREE ? root : baseDir;
  const srctree = path.resolve(
    srctreeBase,
    overrides.srctree ?? vars.CROSSCHECK_SRCTREE ?? file.srctree ?? ".",
  );
  const engine =
    overrides.engine ??
    vars.CROSSCHECK_ENGINE ??
    (file.engine?.startsWith(".")
      ? path.resolve(baseDir, file.engine)
      : file.engine) ??
    null;
  const failureLog =
    overrides.failureLog === false || file.failure_log === false
      ? null
      : path.resolve(srctree, file.failure_log);

  return {
    root,
    configPath,
    srctree,
    engine,
    kernelVersion: vars.CROSSCHECK_KERNELVERSION ?? file.kernel_version,
    make: file.make,
    timeoutMs: overrides.timeoutMs ?? vars.CROSSCHECK_TIMEOUT_MS ?? file.timeout_ms,
    allconfig: file.allconfig ?? null,
    snapshots: file.snapshots,
    failureLog,
    architectures: {
      skip: file.architectures.skip,
      aliases: file.architectures.aliases,
      only:
        overrides.only && overrides.only.length > 0
          ? overrides.only
          : file.architectures.only,
    },
    targets: file.targets,
    scenarios: withSanity(
      overrides.scenarios && overrides.scenarios.length > 0
        ? overrides.scenarios
        : file.scenarios,
      overrides.sanity ?? false,
    ),
    validPairsOnly: overrides.validPairsOnly ?? file.valid_pairs_only,
    silent: overrides.silent ?? false,
  };
}
