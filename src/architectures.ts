import fs from "node:fs";
import path from "node:path";
import { glob } from "zx";

import type { Logger } from "./lib.ts";

export interface Architecture {
  /** Value of ARCH. */
  arch: string;
  /** Directory under arch/ holding the Kconfig tree. */
  srcarch: string;
}

export interface DefconfigSnapshot {
  /** Path relative to the source tree, e.g. arch/arm/configs/foo_defconfig. */
  path: string;
  /** arch/ directory the defconfig was found in. */
  srcarch: string;
}

/**
 * ARCH values that build from another directory's Kconfig tree
 * (the "Additional ARCH settings" of the top-level Makefile).
 */
export const DEFAULT_ARCH_ALIASES: Record<string, string[]> = {
  x86: ["i386", "x86_64"],
  sparc: ["sparc32", "sparc64"],
  sh: ["sh64"],
  tile: ["tilepro", "tilegx"],
};

/** Broken Kconfig as of Linux 2.6.38-rc3. */
export const DEFAULT_SKIPPED_ARCHITECTURES = ["h8300"];

export interface DiscoverArchitecturesOptions {
  skip?: string[];
  aliases?: Record<string, string[]>;
  /** Keep only these ARCH values (or arch/ directories); empty keeps all. */
  only?: string[];
}

function archDirectories(srctree: string): string[] {
  const archRoot = path.join(srctree, "arch");
  if (!fs.existsSync(archRoot)) {
    throw new Error(`No arch/ directory in source tree ${srctree}`);
  }
  return fs
    .readdirSync(archRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export function discoverArchitectures(
  srctree: string,
  options: DiscoverArchitecturesOptions = {},
): Architecture[] {
  const {
    skip = DEFAULT_SKIPPED_ARCHITECTURES,
    aliases = DEFAULT_ARCH_ALIASES,
    only = [],
  } = options;
  const result: Architecture[] = [];

  for (const srcarch of archDirectories(srctree)) {
    if (skip.includes(srcarch)) continue;
    if (!fs.existsSync(path.join(srctree, "arch", srcarch, "Kconfig"))) continue;

    result.push({ arch: srcarch, srcarch });
    for (const arch of aliases[srcarch] ?? []) {
      result.push({ arch, srcarch });
    }
  }

  if (only.length === 0) return result;
  return result.filter(
    ({ arch, srcarch }) => only.includes(arch) || only.includes(srcarch),
  );
}

/**
 * Every known defconfig: arch/<dir>/defconfig when present, then every file
 * below arch/<dir>/configs.
 */
export function discoverDefconfigs(
  srctree: string,
  logger?: Logger,
): DefconfigSnapshot[] {
  const result: DefconfigSnapshot[] = [];

  for (const srcarch of archDirectories(srctree)) {
    const archDir = path.join(srctree, "arch", srcarch);

    if (fs.existsSync(path.join(archDir, "defconfig"))) {
      result.push({ path: `arch/${srcarch}/defconfig`, srcarch });
    }

    const configsDir = path.join(archDir, "configs");
    if (!fs.existsSync(configsDir)) continue;
    if (!fs.statSync(configsDir).isDirectory()) {
      logger?.log(
        logger.chalk.yellow(
          `Warning: 'arch/${srcarch}/configs' is not a directory - skipping`,
        ),
      );
      continue;
    }

    const files = glob
      .sync("**/*", { cwd: configsDir, onlyFiles: true, dot: true })
      .sort();
    for (const file of files) {
      result.push({ path: `arch/${srcarch}/configs/${file}`, srcarch });
    }
  }

  return result;
}
