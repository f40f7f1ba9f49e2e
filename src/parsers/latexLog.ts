/**
 * Line filter for pdflatex console output.
 *
 * pdflatex prints hundreds of lines of font and package chatter per run. Only
 * four kinds of line matter to someone editing the document:
 * - `LaTeX Warning:` recoverable warnings, including the rerun request
 * - `Overfull \hbox` layout warnings
 * - `!` fatal errors
 * - `l.<n>` the source line context printed right after an error
 *
 * Output is handled as bytes throughout: pdflatex echoes input text in whatever
 * encoding the document uses, so lines are never decoded.
 */

const NEWLINE = 0x0a;

export const INTERESTING_PREFIXES: readonly Buffer[] = [
  "LaTeX Warning:",
  "Overfull \\hbox",
  "!",
  "l.",
].map(p => Buffer.from(p, "latin1"));

export const LABELS_CHANGED = Buffer.from(
  "LaTeX Warning: Label(s) may have changed. Rerun to get cross-references right.",
  "latin1",
);

export interface BuildOutcome {
  filteredLines: Buffer[];
  // No interesting line was printed; the exit status is deliberately not consulted
  succeeded: boolean;
  crossReferencesStale: boolean;
  // Exit status of the typesetting process, informational only
  exitCode: number | null;
}

// Split on every newline byte. A trailing newline leaves a final empty line.
export function splitLines(bytes: Buffer): Buffer[] {
  if (bytes.length === 0) return [];
  const lines: Buffer[] = [];
  let start = 0;
  let nl = bytes.indexOf(NEWLINE, start);
  while (nl !== -1) {
    lines.push(bytes.subarray(start, nl));
    start = nl + 1;
    nl = bytes.indexOf(NEWLINE, start);
  }
  lines.push(bytes.subarray(start));
  return lines;
}

function startsWith(line: Buffer, prefix: Buffer): boolean {
  return line.length >= prefix.length && line.compare(prefix, 0, prefix.length, 0, prefix.length) === 0;
}

export function isInteresting(line: Buffer): boolean {
  return INTERESTING_PREFIXES.some(p => startsWith(line, p));
}

export function filterInteresting(lines: readonly Buffer[]): Buffer[] {
  return lines.filter(isInteresting);
}

export function hasLabelsChanged(lines: readonly Buffer[]): boolean {
  return lines.some(l => l.equals(LABELS_CHANGED));
}

export function classifyOutput(lines: readonly Buffer[], exitCode: number | null = null): BuildOutcome {
  const filteredLines = filterInteresting(lines);
  return {
    filteredLines,
    succeeded: filteredLines.length === 0,
    crossReferencesStale: hasLabelsChanged(filteredLines),
    exitCode,
  };
}
