import { describe, expect, it, vi } from "vitest";

import { discoverArchitectures, discoverDefconfigs } from "../src/architectures.ts";
import { Logger } from "../src/lib.ts";
import { createTree } from "./helpers/utils.ts";

function kernelTree(): string {
  return createTree({
    "arch/x86/Kconfig": "",
    "arch/x86/configs/x86_64_defconfig": "",
    "arch/x86/configs/i386_defconfig": "",
    "arch/arm/Kconfig": "",
    "arch/arm/configs/mach/board_defconfig": "",
    "arch/arm/configs/.hidden_defconfig": "",
    "arch/sh/Kconfig": "",
    "arch/sh/defconfig": "",
    "arch/h8300/Kconfig": "",
    "arch/h8300/defconfig": "",
    "arch/um/README": "",
  });
}

describe("discoverArchitectures", () => {
  it("lists directories with a Kconfig, expands aliases and skips broken ones", () => {
    expect(discoverArchitectures(kernelTree())).toEqual([
      { arch: "arm", srcarch: "arm" },
      { arch: "sh", srcarch: "sh" },
      { arch: "sh64", srcarch: "sh" },
      { arch: "x86", srcarch: "x86" },
      { arch: "i386", srcarch: "x86" },
      { arch: "x86_64", srcarch: "x86" },
    ]);
  });

  it("filters by ARCH or by arch/ directory", () => {
    const root = kernelTree();
    expect(discoverArchitectures(root, { only: ["i386", "sh"] })).toEqual([
      { arch: "sh", srcarch: "sh" },
      { arch: "sh64", srcarch: "sh" },
      { arch: "i386", srcarch: "x86" },
    ]);
  });

  it("honours custom skip and alias tables", () => {
    expect(
      discoverArchitectures(kernelTree(), { skip: ["arm", "x86"], aliases: {} }),
    ).toEqual([
      { arch: "h8300", srcarch: "h8300" },
      { arch: "sh", srcarch: "sh" },
    ]);
  });

  it("fails without an arch/ directory", () => {
    const root = createTree({ Makefile: "" });
    expect(() => discoverArchitectures(root)).toThrow(
      `No arch/ directory in source tree ${root}`,
    );
  });
});

describe("discoverDefconfigs", () => {
  it("collects top-level defconfigs and everything under configs/", () => {
    expect(discoverDefconfigs(kernelTree())).toEqual([
      { path: "arch/arm/configs/.hidden_defconfig", srcarch: "arm" },
      { path: "arch/arm/configs/mach/board_defconfig", srcarch: "arm" },
      { path: "arch/h8300/defconfig", srcarch: "h8300" },
      { path: "arch/sh/defconfig", srcarch: "sh" },
      { path: "arch/x86/configs/i386_defconfig", srcarch: "x86" },
      { path: "arch/x86/configs/x86_64_defconfig", srcarch: "x86" },
    ]);
  });

  it("warns and skips a configs entry that is not a directory", () => {
    const root = createTree({ "arch/mips/Kconfig": "", "arch/mips/configs": "" });
    const logger = new Logger({ silent: false });
    const log = vi.spyOn(logger, "log").mockImplementation(() => undefined);

    expect(discoverDefconfigs(root, logger)).toEqual([]);
    expect(log).toHaveBeenCalledWith(
      logger.chalk.yellow("Warning: 'arch/mips/configs' is not a directory - skipping"),
    );
  });
});
