import { fs } from "zx";

import type { TrialResult } from "./ledger.ts";
import { scenarioLabel } from "./scenarios.ts";

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

const pad = (value: number) => String(value).padStart(2, "0");

/** Local time as "19 Oct 2026 14:03:07". */
export function formatTimestamp(date: Date): string {
  const day = pad(date.getDate());
  const month = MONTHS[date.getMonth()];
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(pad)
    .join(":");
  return `${day} ${month} ${date.getFullYear()} ${time}`;
}

export function formatFailure(result: TrialResult, date: Date): string {
  const line = `${formatTimestamp(date)}  ${result.architecture.arch} ${scenarioLabel(result.scenario)} did not match`;
  const kind = result.failure?.kind;
  return kind && kind !== "mismatch" ? `${line} (${kind})` : line;
}

/** Append-only record of failed trials, kept across runs. */
export class FailureLog {
  readonly path: string;
  #now: () => Date;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.path = filePath;
    this.#now = now;
  }

  async append(result: TrialResult): Promise<void> {
    await fs.appendFile(this.path, `${formatFailure(result, this.#now())}\n`);
  }
}
