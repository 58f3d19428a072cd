/**
 * Diagnostic pass over the engine's read accessors.
 *
 * Not part of the differential comparison: it calls every accessor on every
 * symbol and choice to make sure none of them throws or hangs, checks that a
 * malformed expression is reported as a syntax error, and checks the
 * definition/reference location rules.
 */

import type { ResolutionEngine, SymbolView } from "./engine.ts";

export const VALID_EXPRESSION = "y && ARCH";
export const MALFORMED_EXPRESSION = "y && && y";

export interface SanityIssue {
  severity: "error" | "warning";
  symbol: string | null;
  message: string;
}

export interface SanityReport {
  arch: string;
  symbols: number;
  choices: number;
  issues: SanityIssue[];
}

export function hasErrors(report: SanityReport): boolean {
  return report.issues.some((issue) => issue.severity === "error");
}

export function checkSyntaxErrorDetection(
  engine: ResolutionEngine,
): SanityIssue[] {
  const issues: SanityIssue[] = [];

  const valid = engine.evaluate(VALID_EXPRESSION);
  if (!valid.ok) {
    issues.push({
      severity: "error",
      symbol: null,
      message: `'${VALID_EXPRESSION}' was rejected: ${valid.message}`,
    });
  }

  const malformed = engine.evaluate(MALFORMED_EXPRESSION);
  if (malformed.ok) {
    issues.push({
      severity: "error",
      symbol: null,
      message: `no syntax error reported for '${MALFORMED_EXPRESSION}'`,
    });
  }

  return issues;
}

function touchSymbol(sym: SymbolView): void {
  sym.value();
  sym.userValue();
  sym.lowerBound();
  sym.upperBound();
  sym.choice();
  sym.isChoiceItem();
  sym.isDefined();
  sym.isSpecial();
  sym.isFromEnvironment();
  sym.referenceLocations();
}

function checkLocations(sym: SymbolView): SanityIssue[] {
  const error = (message: string): SanityIssue => ({
    severity: "error",
    symbol: sym.name,
    message,
  });
  const defined = sym.isDefined();
  const hasDefinitions = sym.definitionLocations().length > 0;

  if (sym.isSpecial()) {
    if (sym.isFromEnvironment()) {
      return hasDefinitions
        ? []
        : [error("from the environment but lacks definition locations")];
    }
    const issues: SanityIssue[] = [];
    if (!defined) issues.push(error("special symbol is not defined"));
    if (hasDefinitions) issues.push(error("special symbol has definition locations"));
    return issues;
  }

  if (defined) {
    return hasDefinitions ? [] : [error("defined but lacks definition locations")];
  }
  if (hasDefinitions) {
    return [error("undefined but has definition locations")];
  }
  if (sym.referenceLocations().length === 0) {
    return [
      {
        severity: "warning",
        symbol: sym.name,
        message: "both undefined and unreferenced",
      },
    ];
  }
  return [];
}

export function runSanityChecks(engine: ResolutionEngine): SanityReport {
  const issues = checkSyntaxErrorDetection(engine);

  engine.reset();
  const symbols = engine.symbols();
  for (const sym of symbols) {
    touchSymbol(sym);
    issues.push(...checkLocations(sym));
  }

  const choices = engine.choices();
  for (const choice of choices) {
    choice.visibility();
    choice.mode();
    choice.items();
    choice.selection();
    choice.selectionFromDefaults();
    choice.userSelection();
    choice.isOptional();
  }

  return {
    arch: engine.arch,
    symbols: symbols.length,
    choices: choices.length,
    issues,
  };
}
