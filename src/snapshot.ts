import fs from "node:fs";

/**
 * `# CONFIG_FOO is not set` carries meaning and is never part of a header.
 * Matched as a prefix, so a trailing "\r" does not hide it.
 */
export const UNSET_PATTERN = /^# CONFIG_(\w+) is not set/;

/**
 * Drop the leading comment block written by the reference tool. Skipping stops
 * at the first line that is not a comment or that is an unset marker.
 */
export function stripHeader(lines: readonly string[]): string[] {
  let start = 0;
  for (const line of lines) {
    if (!line.startsWith("#") || UNSET_PATTERN.test(line)) break;
    start++;
  }
  return lines.slice(start);
}

export class Snapshot {
  readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  /** Lines split on "\n"; a trailing newline yields a final empty line. */
  static parse(text: string): Snapshot {
    return new Snapshot(text.split("\n"));
  }

  static read(filePath: string): Snapshot {
    return Snapshot.parse(fs.readFileSync(filePath, "utf-8"));
  }

  body(): string[] {
    return stripHeader(this.lines);
  }
}

export interface SnapshotDiff {
  /** Index into the header-stripped bodies. */
  index: number;
  reference: string | null;
  candidate: string | null;
}

export function diffSnapshots(
  reference: Snapshot,
  candidate: Snapshot,
): SnapshotDiff | null {
  const a = reference.body();
  const b = candidate.body();
  const length = Math.max(a.length, b.length);

  for (let index = 0; index < length; index++) {
    const left = index < a.length ? a[index] : undefined;
    const right = index < b.length ? b[index] : undefined;
    if (left !== right) {
      return { index, reference: left ?? null, candidate: right ?? null };
    }
  }
  return null;
}

export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  return diffSnapshots(a, b) === null;
}

export function formatDiff(diff: SnapshotDiff): string {
  const show = (line: string | null) =>
    line === null ? "<end of file>" : JSON.stringify(line);
  return `line ${diff.index + 1}: reference ${show(diff.reference)}, candidate ${show(diff.candidate)}`;
}
