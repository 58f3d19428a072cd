import { $ } from "zx";

import type { Architecture } from "./architectures.ts";
import type { Environment } from "./environment.ts";

export interface CommandResult {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
}

export type CommandExecutor = (
  command: string[],
  options: CommandOptions,
) => Promise<CommandResult>;

export interface ReferenceRequest {
  architecture: Architecture;
  target: string;
}

/** The trusted implementation the engine is compared against. */
export interface ReferenceTool {
  run(request: ReferenceRequest): Promise<CommandResult>;
}

export class ReferenceToolError extends Error {
  readonly command: string[];
  readonly result: CommandResult;

  constructor(command: string[], result: CommandResult) {
    const reason = result.timedOut
      ? "timed out"
      : result.signal
        ? `was killed by ${result.signal}`
        : `exited with code ${result.exitCode}`;
    super(`'${command.join(" ")}' ${reason}`);
    this.name = "ReferenceToolError";
    this.command = command;
    this.result = result;
  }
}

export const zxExecutor: CommandExecutor = async (command, options) => {
  const started = Date.now();
  const output = await $({
    cwd: options.cwd,
    env: options.env,
    quiet: true,
    nothrow: true,
  })`${command}`.timeout(options.timeoutMs);

  return {
    exitCode: output.exitCode,
    signal: output.signal,
    stdout: output.stdout,
    stderr: output.stderr,
    timedOut:
      output.signal !== null && Date.now() - started >= options.timeoutMs,
  };
};

export interface MakeReferenceToolOptions {
  srctree: string;
  make: string;
  timeoutMs: number;
  environment: Environment;
  exec?: CommandExecutor;
}

/**
 * Runs `make <target>` at the top of the source tree, with ARCH and friends
 * passed through the child's environment only.
 */
export class MakeReferenceTool implements ReferenceTool {
  #options: MakeReferenceToolOptions;
  #exec: CommandExecutor;

  constructor(options: MakeReferenceToolOptions) {
    this.#options = options;
    this.#exec = options.exec ?? zxExecutor;
  }

  async run({ architecture, target }: ReferenceRequest): Promise<CommandResult> {
    // `make` may carry its own arguments, e.g. "make O=build"
    const command = [...this.#options.make.trim().split(/\s+/), target];
    const result = await this.#exec(command, {
      cwd: this.#options.srctree,
      env: this.#options.environment.forArchitecture(architecture),
      timeoutMs: this.#options.timeoutMs,
    });

    if (result.timedOut || result.signal !== null || result.exitCode !== 0) {
      throw new ReferenceToolError(command, result);
    }
    return result;
  }
}
