/**
 * Operator-facing output.
 *
 * Status lines carry the `make-latex:` prefix and a tone; diagnostic lines from
 * the TeX tools are written back as the exact bytes they were captured as.
 */
import chalk, { ChalkInstance } from "chalk";

export type Tone = "plain" | "success" | "failure";

export interface Reporter {
  // Prefixed status message, colored by tone
  say(tone: Tone, message: string): void;
  // Raw output line from an external tool
  line(bytes: Buffer): void;
  // Unprefixed, uncolored message
  text(message: string): void;
}

export const PREFIX = "make-latex: ";

const NEWLINE = Buffer.from("\n");

interface Writable {
  write(chunk: string | Uint8Array): unknown;
}

export function consoleReporter(out: Writable = process.stdout, colors: ChalkInstance = chalk): Reporter {
  const paint = (tone: Tone, s: string): string => {
    if (tone === "success") return colors.green(s);
    if (tone === "failure") return colors.red(s);
    return s;
  };
  return {
    say(tone, message) {
      out.write(paint(tone, PREFIX + message) + "\n");
    },
    line(bytes) {
      out.write(Buffer.concat([bytes, NEWLINE]));
    },
    text(message) {
      out.write(message + "\n");
    },
  };
}

export type ReportEntry =
  | { kind: "say"; tone: Tone; message: string }
  | { kind: "line"; bytes: Buffer }
  | { kind: "text"; message: string };

export interface CollectingReporter extends Reporter {
  readonly entries: ReportEntry[];
}

// Keeps everything in memory; used where stdout is not ours to write to
export function collectingReporter(): CollectingReporter {
  const entries: ReportEntry[] = [];
  return {
    entries,
    say(tone, message) { entries.push({ kind: "say", tone, message }); },
    line(bytes) { entries.push({ kind: "line", bytes }); },
    text(message) { entries.push({ kind: "text", message }); },
  };
}
