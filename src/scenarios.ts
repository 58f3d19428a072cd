import { z } from "zod";

export const ScenarioKindSchema = z.enum([
  "allno",
  "alldef",
  "allyes",
  "sanity",
  "defconfig",
]);

export type ScenarioKind = z.infer<typeof ScenarioKindSchema>;

export type Scenario =
  | { kind: "allno" }
  | { kind: "alldef" }
  | { kind: "allyes" }
  | { kind: "sanity" }
  | { kind: "defconfig"; snapshot: string };

/** Run order of the scenarios, cheapest first. */
export const DEFAULT_SCENARIOS: ScenarioKind[] = [
  "allno",
  "alldef",
  "allyes",
  "defconfig",
];

export const SCENARIO_DESCRIPTIONS: Record<ScenarioKind, string> = {
  allno:
    "Test if the engine's allnoconfig generates the same .config as 'make allnoconfig', for all architectures",
  alldef:
    "Test if the engine generates the same configuration as 'make alldefconfig' without a .config, for each architecture",
  allyes:
    "Test if the engine's allyesconfig generates the same .config as 'make allyesconfig', for all architectures",
  sanity:
    "Call the read accessors of every symbol and choice and check expression syntax errors and definition locations, for all architectures",
  defconfig:
    "Test if the engine generates the same .config as the reference tool for every architecture/defconfig pair, including pairs of an architecture with another architecture's defconfig",
};

export function describeScenario(kind: ScenarioKind): string {
  return SCENARIO_DESCRIPTIONS[kind];
}

/** Short label used in progress lines and the failure log. */
export function scenarioLabel(scenario: Scenario): string {
  return scenario.kind === "defconfig"
    ? `with ${scenario.snapshot}`
    : scenario.kind;
}
