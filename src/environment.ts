import { z } from "zod";

import type { Architecture } from "./architectures.ts";
import type { Config } from "./config.ts";

/**
 * Process environment of the reference tool for one architecture.
 *
 * Built per trial from a copy of the base environment, so `process.env` is
 * never mutated and concurrent trials could not observe each other's ARCH.
 */
export class Environment {
  static schema = z.object({
    ARCH: z.string().min(1),
    SRCARCH: z.string().min(1),
    KERNELVERSION: z.string().min(1),
    KCONFIG_ALLCONFIG: z.string().min(1).optional(),
  });

  processEnv: Record<string, string>;
  kernelVersion: string;
  allconfig: string | null;

  constructor(
    { kernelVersion, allconfig }: Pick<Config, "kernelVersion" | "allconfig">,
    processEnv: NodeJS.ProcessEnv = process.env,
  ) {
    this.kernelVersion = kernelVersion;
    this.allconfig = allconfig;
    this.processEnv = Object.fromEntries(
      Object.entries(processEnv).filter(
        (entry): entry is [string, string] => entry[1] !== undefined,
      ),
    );
    // A stray KCONFIG_ALLCONFIG would make every *config target load it.
    delete this.processEnv.KCONFIG_ALLCONFIG;
  }

  vars(architecture: Architecture): z.infer<typeof Environment.schema> {
    return Environment.schema.parse({
      ARCH: architecture.arch,
      SRCARCH: architecture.srcarch,
      KERNELVERSION: this.kernelVersion,
      KCONFIG_ALLCONFIG: this.allconfig ?? undefined,
    });
  }

  forArchitecture(architecture: Architecture): Record<string, string> {
    const env: Record<string, string> = { ...this.processEnv };
    for (const [key, value] of Object.entries(this.vars(architecture))) {
      if (value !== undefined) env[key] = value;
    }
    return env;
  }
}
