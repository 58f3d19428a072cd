/**
 * Fixed-point simulations of `make allnoconfig` and `make allyesconfig`.
 *
 * Bounds are recomputed by the engine after every assignment, so no static
 * ordering of symbols is safe: both algorithms repeat full passes until a pass
 * assigns nothing. Every assignment moves a value toward the extremum on the
 * finite tristate lattice, which bounds the number of passes.
 */

import type { ResolutionEngine, SymbolView } from "./engine.ts";
import { isTristate, tristateLess, type Tristate } from "./tristate.ts";

export type ResolutionMode = "allno" | "allyes";

export interface SymbolMutation {
  pass: number;
  symbol: string;
  from: Tristate;
  to: Tristate;
  /** Set when the assignment was made on behalf of a choice. */
  choice?: string | null;
}

export interface ResolutionPass {
  pass: number;
  mutations: SymbolMutation[];
}

export interface ResolutionReport {
  mode: ResolutionMode;
  passes: number;
  mutations: SymbolMutation[];
}

export interface ResolveOptions {
  onPass?: (pass: ResolutionPass) => void;
  maxPasses?: number;
}

export class ConvergenceError extends Error {
  readonly mode: ResolutionMode;
  readonly passes: number;

  constructor(mode: ResolutionMode, passes: number) {
    super(`${mode} did not reach a fixed point after ${passes} passes`);
    this.name = "ConvergenceError";
    this.mode = mode;
    this.passes = passes;
  }
}

function currentValue(sym: SymbolView): Tristate | null {
  const value = sym.value();
  return isTristate(value) ? value : null;
}

function assign(
  sym: SymbolView,
  value: Tristate,
  pass: number,
  from: Tristate,
  choice?: string | null,
): SymbolMutation {
  sym.setValue(value);
  const to = currentValue(sym) ?? value;
  const mutation: SymbolMutation = { pass, symbol: sym.name, from, to };
  if (choice !== undefined) mutation.choice = choice;
  return mutation;
}

function iterate(
  mode: ResolutionMode,
  engine: ResolutionEngine,
  options: ResolveOptions,
  runPass: (pass: number) => SymbolMutation[],
): ResolutionReport {
  const maxPasses = options.maxPasses ?? engine.symbols().length * 2 + 2;
  const mutations: SymbolMutation[] = [];

  for (let pass = 1; pass <= maxPasses; pass++) {
    const passMutations = runPass(pass);
    mutations.push(...passMutations);
    options.onPass?.({ pass, mutations: passMutations });
    if (passMutations.length === 0) {
      return { mode, passes: pass, mutations };
    }
  }

  throw new ConvergenceError(mode, maxPasses);
}

/**
 * Lower every non-choice symbol to its lower bound until nothing moves.
 * Choices are left to the engine: member bounds already encode exclusivity.
 */
export function resolveAllNo(
  engine: ResolutionEngine,
  options: ResolveOptions = {},
): ResolutionReport {
  return iterate("allno", engine, options, (pass) => {
    const mutations: SymbolMutation[] = [];
    for (const sym of engine.symbols()) {
      if (sym.isChoiceItem()) continue;

      const lowerBound = sym.lowerBound();
      const value = currentValue(sym);
      if (lowerBound !== null && value !== null && tristateLess(lowerBound, value)) {
        mutations.push(assign(sym, lowerBound, pass, value));
      }
    }
    return mutations;
  });
}

/**
 * Raise every non-choice symbol to its upper bound, select the default of
 * every "y"-visible choice and put every member of an "m"-visible choice in
 * "m", until nothing moves.
 */
export function resolveAllYes(
  engine: ResolutionEngine,
  options: ResolveOptions = {},
): ResolutionReport {
  const nonChoiceSymbols = engine.symbols().filter((sym) => !sym.isChoiceItem());

  return iterate("allyes", engine, options, (pass) => {
    const mutations: SymbolMutation[] = [];

    for (const sym of nonChoiceSymbols) {
      const upperBound = sym.upperBound();
      const value = currentValue(sym);
      if (upperBound !== null && value !== null && tristateLess(value, upperBound)) {
        mutations.push(assign(sym, upperBound, pass, value));
      }
    }

    for (const choice of engine.choices()) {
      const visibility = choice.visibility();

      if (visibility === "y") {
        const selection = choice.selectionFromDefaults();
        // views may be rebuilt on every call; symbols are identified by name
        if (selection !== null && selection.name !== choice.userSelection()?.name) {
          const from = currentValue(selection) ?? "n";
          mutations.push(assign(selection, "y", pass, from, choice.name));
        }
      } else if (visibility === "m") {
        for (const sym of choice.items()) {
          const value = currentValue(sym) ?? "n";
          if (value !== "m" && sym.upperBound() !== "n") {
            mutations.push(assign(sym, "m", pass, value, choice.name));
          }
        }
      }
    }

    return mutations;
  });
}
