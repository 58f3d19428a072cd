export type Tristate = "n" | "m" | "y";

const ORDER: Record<Tristate, number> = { n: 0, m: 1, y: 2 };

export function isTristate(value: unknown): value is Tristate {
  return value === "n" || value === "m" || value === "y";
}

export function tristateLess(a: Tristate, b: Tristate): boolean {
  return ORDER[a] < ORDER[b];
}

export function minTristate(...values: Tristate[]): Tristate {
  return values.reduce<Tristate>(
    (acc, value) => (tristateLess(value, acc) ? value : acc),
    "y",
  );
}

export function maxTristate(...values: Tristate[]): Tristate {
  return values.reduce<Tristate>(
    (acc, value) => (tristateLess(acc, value) ? value : acc),
    "n",
  );
}
