/**
 * Contract of the resolution engine under test.
 *
 * The engine parses the Kconfig tree, evaluates dependencies and persists
 * configurations. The harness only drives it through these views: bounds and
 * visibility must be recomputed synchronously after every `setValue`.
 */

import path from "node:path";
import { pathToFileURL } from "node:url";
import type { Tristate } from "./tristate.ts";
import type { Architecture } from "./architectures.ts";

export type SymbolType =
  | "bool"
  | "tristate"
  | "string"
  | "int"
  | "hex"
  | "unknown";

export interface SourceLocation {
  file: string;
  line: number;
}

export interface SymbolView {
  readonly name: string;
  readonly type: SymbolType;
  /** Current computed value; a tristate for bool and tristate symbols. */
  value(): string;
  userValue(): string | null;
  /** Lowest assignable value, or null when the value cannot be changed. */
  lowerBound(): Tristate | null;
  /** Highest assignable value, or null when the value cannot be changed. */
  upperBound(): Tristate | null;
  /** Non-owning back-reference to the choice this symbol belongs to. */
  choice(): ChoiceView | null;
  isChoiceItem(): boolean;
  isDefined(): boolean;
  isSpecial(): boolean;
  isFromEnvironment(): boolean;
  definitionLocations(): SourceLocation[];
  referenceLocations(): SourceLocation[];
  setValue(value: string): boolean;
}

export interface ChoiceView {
  readonly name: string | null;
  visibility(): Tristate;
  mode(): Tristate;
  items(): SymbolView[];
  selection(): SymbolView | null;
  selectionFromDefaults(): SymbolView | null;
  userSelection(): SymbolView | null;
  isOptional(): boolean;
}

export type EvaluationResult =
  | { ok: true; value: string }
  | { ok: false; kind: "syntax"; message: string };

export interface ResolutionEngine {
  readonly arch: string;
  readonly srcarch: string;
  symbols(): SymbolView[];
  choices(): ChoiceView[];
  /** Drop every user value and return to the initial computed state. */
  reset(): void;
  /** Load a persisted configuration, replacing user values. */
  loadConfig(filename: string): void | Promise<void>;
  writeConfig(filename: string, header?: string): void | Promise<void>;
  evaluate(expression: string): EvaluationResult;
}

export interface EngineOptions {
  srctree: string;
  arch: string;
  srcarch: string;
  kernelVersion: string;
}

export type EngineFactory = (
  options: EngineOptions,
) => ResolutionEngine | Promise<ResolutionEngine>;

interface EngineModule {
  createEngine: EngineFactory;
}

export class EngineLoadError extends Error {
  readonly specifier: string;

  constructor(specifier: string, message: string) {
    super(`Unable to load engine "${specifier}": ${message}`);
    this.name = "EngineLoadError";
    this.specifier = specifier;
  }
}

function isEngineModule(mod: unknown): mod is EngineModule {
  return (
    typeof mod === "object" &&
    mod !== null &&
    "createEngine" in mod &&
    typeof mod.createEngine === "function"
  );
}

function isResolutionEngine(value: unknown): value is ResolutionEngine {
  return (
    typeof value === "object" &&
    value !== null &&
    "symbols" in value &&
    typeof value.symbols === "function" &&
    "choices" in value &&
    typeof value.choices === "function" &&
    "writeConfig" in value &&
    typeof value.writeConfig === "function"
  );
}

/**
 * Import an engine module. Relative specifiers resolve against `cwd`;
 * anything else is handed to `import()` as a package name.
 */
export async function loadEngineFactory(
  specifier: string,
  cwd: string = process.cwd(),
): Promise<EngineFactory> {
  const target =
    specifier.startsWith(".") || path.isAbsolute(specifier)
      ? pathToFileURL(path.resolve(cwd, specifier)).href
      : specifier;

  let mod: unknown;
  try {
    mod = await import(target);
  } catch (error) {
    throw new EngineLoadError(
      specifier,
      error instanceof Error ? error.message : String(error),
    );
  }

  if (!isEngineModule(mod)) {
    throw new EngineLoadError(specifier, "module does not export createEngine()");
  }
  const { createEngine } = mod;

  return async (options) => {
    const engine: unknown = await createEngine(options);
    if (!isResolutionEngine(engine)) {
      throw new EngineLoadError(
        specifier,
        `createEngine() did not return an engine for ${options.arch}`,
      );
    }
    return engine;
  };
}

export interface EngineSource {
  get(architecture: Architecture): Promise<ResolutionEngine>;
}

/**
 * One engine instance per architecture, created on first use and kept for
 * the rest of the run. Trials reset it before use.
 */
export class EngineRegistry implements EngineSource {
  #factory: EngineFactory;
  #srctree: string;
  #kernelVersion: string;
  #engines = new Map<string, ResolutionEngine>();

  constructor(factory: EngineFactory, srctree: string, kernelVersion: string) {
    this.#factory = factory;
    this.#srctree = srctree;
    this.#kernelVersion = kernelVersion;
  }

  async get(architecture: Architecture): Promise<ResolutionEngine> {
    const cached = this.#engines.get(architecture.arch);
    if (cached) return cached;

    const engine = await this.#factory({
      srctree: this.#srctree,
      arch: architecture.arch,
      srcarch: architecture.srcarch,
      kernelVersion: this.#kernelVersion,
    });
    this.#engines.set(architecture.arch, engine);
    return engine;
  }

  get size(): number {
    return this.#engines.size;
  }
}
