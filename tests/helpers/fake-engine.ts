import fs from "node:fs";

import type {
  ChoiceView,
  EngineOptions,
  EvaluationResult,
  ResolutionEngine,
  SourceLocation,
  SymbolType,
  SymbolView,
} from "../../src/engine.ts";
import { isTristate, maxTristate, minTristate, type Tristate } from "../../src/tristate.ts";

/**
 * In-memory stand-in for a Kconfig engine: a handful of symbols with prompts,
 * `depends on`, `select` and choices. Values are recomputed on every read.
 */
export interface SymbolDef {
  name: string;
  type?: SymbolType;
  prompt?: boolean;
  default?: string;
  dependsOn?: string[];
  selectedBy?: string[];
  choice?: string;
  defined?: boolean;
  special?: boolean;
  fromEnvironment?: boolean;
  definitions?: SourceLocation[];
  references?: SourceLocation[];
}

export interface ChoiceDef {
  name: string;
  type?: "bool" | "tristate";
  dependsOn?: string[];
  default?: string;
  optional?: boolean;
}

export interface FakeEngineDefinition {
  symbols: SymbolDef[];
  choices?: ChoiceDef[];
}

export const CANDIDATE_HEADER = [
  "#",
  "# Automatically generated by the fake engine",
  "#",
];

const promote = (type: SymbolType, value: Tristate): Tristate =>
  type === "bool" && value === "m" ? "y" : value;

class FakeSymbol implements SymbolView {
  readonly name: string;
  readonly type: SymbolType;
  user: string | null = null;
  #def: SymbolDef;
  #engine: FakeEngine;

  constructor(def: SymbolDef, engine: FakeEngine) {
    this.#def = def;
    this.#engine = engine;
    this.name = def.name;
    this.type = def.type ?? "tristate";
  }

  get isTristateLike(): boolean {
    return this.type === "bool" || this.type === "tristate";
  }

  dependencyValue(): Tristate {
    return minTristate(
      "y",
      ...(this.#def.dependsOn ?? []).map((name) => this.#engine.tristateOf(name)),
    );
  }

  #reverseDependency(): Tristate {
    return maxTristate(
      "n",
      ...(this.#def.selectedBy ?? []).map((name) => this.#engine.tristateOf(name)),
    );
  }

  #promptVisibility(): Tristate {
    return this.#def.prompt ? this.dependencyValue() : "n";
  }

  #itemVisibility(choice: FakeChoice): Tristate {
    return promote(this.type, minTristate(choice.visibility(), this.dependencyValue()));
  }

  value(): string {
    if (!this.isTristateLike) return this.user ?? this.#def.default ?? "";

    const choice = this.choice();
    if (choice) {
      const mode = choice.mode();
      if (mode === "y") return choice.selection() === this ? "y" : "n";
      if (mode === "m" && this.user !== null && this.user !== "n") {
        return this.#itemVisibility(choice) === "n" ? "n" : "m";
      }
      return "n";
    }

    const visibility = this.#promptVisibility();
    const { user } = this;
    const defaultValue = this.#def.default;
    const fallback = isTristate(defaultValue) ? defaultValue : "n";
    const base =
      isTristate(user) && visibility !== "n"
        ? minTristate(user, visibility)
        : minTristate(fallback, this.dependencyValue());
    return promote(this.type, maxTristate(base, this.#reverseDependency()));
  }

  userValue(): string | null {
    return this.user;
  }

  #bounds(): [Tristate, Tristate] | null {
    if (!this.isTristateLike || this.choice()) return null;
    const visibility = promote(this.type, this.#promptVisibility());
    const reverse = promote(this.type, this.#reverseDependency());
    if (!this.#def.prompt || visibility === reverse || visibility === "n") return null;
    if (visibility === "m" && reverse === "y") return null;
    return [reverse, visibility];
  }

  lowerBound(): Tristate | null {
    return this.#bounds()?.[0] ?? null;
  }

  upperBound(): Tristate | null {
    const choice = this.choice();
    if (choice) return this.#itemVisibility(choice);
    return this.#bounds()?.[1] ?? null;
  }

  choice(): FakeChoice | null {
    return this.#def.choice ? this.#engine.choiceNamed(this.#def.choice) : null;
  }

  isChoiceItem(): boolean {
    return this.#def.choice !== undefined;
  }

  isDefined(): boolean {
    return this.#def.defined ?? true;
  }

  isSpecial(): boolean {
    return this.#def.special ?? false;
  }

  isFromEnvironment(): boolean {
    return this.#def.fromEnvironment ?? false;
  }

  definitionLocations(): SourceLocation[] {
    if (this.#def.definitions) return this.#def.definitions;
    return this.isDefined() && !this.isSpecial()
      ? [{ file: "Kconfig", line: this.#engine.indexOf(this) + 1 }]
      : [];
  }

  referenceLocations(): SourceLocation[] {
    return this.#def.references ?? [];
  }

  visibleInChoice(): boolean {
    const choice = this.choice();
    return choice !== null && this.#itemVisibility(choice) !== "n";
  }

  setValue(value: string): boolean {
    const choice = this.choice();
    if (!choice) {
      this.user = value;
      return true;
    }
    if (!isTristate(value)) return false;
    if (value === "n") {
      this.user = "n";
      if (choice.userSelection() === this) choice.selectedByUser = null;
      return true;
    }
    if (!this.visibleInChoice()) return false;
    if (value === "y") {
      choice.selectedByUser = this;
      choice.userMode = "y";
    } else {
      this.user = "m";
      choice.userMode = "m";
    }
    return true;
  }
}

class FakeChoice implements ChoiceView {
  readonly name: string;
  userMode: Tristate | null = null;
  selectedByUser: FakeSymbol | null = null;
  #def: ChoiceDef;
  #engine: FakeEngine;

  constructor(def: ChoiceDef, engine: FakeEngine) {
    this.#def = def;
    this.#engine = engine;
    this.name = def.name;
  }

  get type(): "bool" | "tristate" {
    return this.#def.type ?? "bool";
  }

  visibility(): Tristate {
    return promote(
      this.type,
      minTristate(
        "y",
        ...(this.#def.dependsOn ?? []).map((name) => this.#engine.tristateOf(name)),
      ),
    );
  }

  mode(): Tristate {
    const base: Tristate = this.isOptional() ? "n" : "m";
    const requested = this.userMode === null ? base : maxTristate(base, this.userMode);
    return promote(this.type, minTristate(requested, this.visibility()));
  }

  items(): FakeSymbol[] {
    return this.#engine.symbols().filter((sym) => sym.choice() === this);
  }

  selection(): FakeSymbol | null {
    if (this.mode() !== "y") return null;
    const user = this.userSelection();
    return user && user.visibleInChoice() ? user : this.selectionFromDefaults();
  }

  selectionFromDefaults(): FakeSymbol | null {
    const visible = this.items().filter((sym) => sym.visibleInChoice());
    return visible.find((sym) => sym.name === this.#def.default) ?? visible[0] ?? null;
  }

  userSelection(): FakeSymbol | null {
    return this.selectedByUser;
  }

  isOptional(): boolean {
    return this.#def.optional ?? false;
  }
}

type Token = string;

function tokenize(expression: string): Token[] {
  return expression.match(/&&|\|\||[!()]|[A-Za-z0-9_]+|\S/g) ?? [];
}

export class FakeEngine implements ResolutionEngine {
  readonly arch: string;
  readonly srcarch: string;
  readonly calls: string[] = [];
  #symbols: FakeSymbol[];
  #choices: FakeChoice[];

  constructor(
    definition: FakeEngineDefinition,
    options: Pick<EngineOptions, "arch" | "srcarch"> = { arch: "x86", srcarch: "x86" },
  ) {
    this.arch = options.arch;
    this.srcarch = options.srcarch;
    this.#symbols = definition.symbols.map((def) => new FakeSymbol(def, this));
    this.#choices = (definition.choices ?? []).map((def) => new FakeChoice(def, this));
  }

  symbols(): FakeSymbol[] {
    return this.#symbols;
  }

  choices(): FakeChoice[] {
    return this.#choices;
  }

  symbol(name: string): FakeSymbol {
    const sym = this.#symbols.find((candidate) => candidate.name === name);
    if (!sym) throw new Error(`Unknown symbol ${name}`);
    return sym;
  }

  choiceNamed(name: string): FakeChoice | null {
    return this.#choices.find((choice) => choice.name === name) ?? null;
  }

  indexOf(sym: FakeSymbol): number {
    return this.#symbols.indexOf(sym);
  }

  tristateOf(name: string): Tristate {
    if (isTristate(name)) return name;
    const value = this.#symbols.find((sym) => sym.name === name)?.value();
    return isTristate(value) ? value : "n";
  }

  reset(): void {
    this.calls.push("reset");
    for (const sym of this.#symbols) sym.user = null;
    for (const choice of this.#choices) {
      choice.userMode = null;
      choice.selectedByUser = null;
    }
  }

  loadConfig(filename: string): void {
    this.calls.push(`loadConfig ${filename}`);
    this.reset();
    for (const line of fs.readFileSync(filename, "utf-8").split("\n")) {
      const unset = /^# CONFIG_(\w+) is not set$/.exec(line);
      const assignment = /^CONFIG_(\w+)=(.*)$/.exec(line);
      const name = unset?.[1] ?? assignment?.[1];
      const sym = name ? this.#symbols.find((candidate) => candidate.name === name) : undefined;
      if (!sym) continue;
      sym.setValue(unset ? "n" : (assignment?.[2] ?? "").replace(/^"(.*)"$/, "$1"));
    }
  }

  render(): string[] {
    return this.#symbols.map((sym) => {
      const value = sym.value();
      if (!sym.isTristateLike) return `CONFIG_${sym.name}="${value}"`;
      return value === "n" ? `# CONFIG_${sym.name} is not set` : `CONFIG_${sym.name}=${value}`;
    });
  }

  writeConfig(filename: string, header?: string): void {
    this.calls.push(`writeConfig ${filename}`);
    const lines = [header ?? CANDIDATE_HEADER.join("\n"), ...this.render()];
    fs.writeFileSync(filename, `${lines.join("\n")}\n`);
  }

  evaluate(expression: string): EvaluationResult {
    const tokens = tokenize(expression);
    let position = 0;
    const syntax = (message: string): EvaluationResult => ({ ok: false, kind: "syntax", message });

    const parseOr = (): Tristate | null => {
      let left = parseAnd();
      while (left !== null && tokens[position] === "||") {
        position++;
        const right = parseAnd();
        left = right === null ? null : maxTristate(left, right);
      }
      return left;
    };
    const parseAnd = (): Tristate | null => {
      let left = parseUnary();
      while (left !== null && tokens[position] === "&&") {
        position++;
        const right = parseUnary();
        left = right === null ? null : minTristate(left, right);
      }
      return left;
    };
    const parseUnary = (): Tristate | null => {
      const token = tokens[position++];
      if (token === undefined) return null;
      if (token === "!") {
        const operand = parseUnary();
        if (operand === null) return null;
        return operand === "y" ? "n" : operand === "n" ? "y" : "m";
      }
      if (token === "(") {
        const inner = parseOr();
        if (tokens[position++] !== ")") return null;
        return inner;
      }
      return /^\w+$/.test(token) ? this.tristateOf(token) : null;
    };

    const value = parseOr();
    if (value === null) return syntax(`syntax error in '${expression}'`);
    if (position !== tokens.length) return syntax(`unexpected '${tokens[position]}'`);
    return { ok: true, value };
  }
}
