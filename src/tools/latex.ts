/**
 * pdflatex and bibtex runners.
 *
 * A build prints only the interesting lines of pdflatex's output followed by a
 * status banner. When pdflatex asks for a rerun because labels moved, the build
 * runs once more; the second pass never triggers a third.
 */
import { runCommand, CommandRunner } from "../utils/process.js";
import { Reporter } from "../utils/reporter.js";
import { SessionConfig, Toolchain } from "../config/schema.js";
import { BuildOutcome, classifyOutput, splitLines } from "../parsers/latexLog.js";

export interface BuildContext {
  toolchain: Pick<Toolchain, "latex" | "bibtex">;
  reporter: Reporter;
  run?: CommandRunner;
}

export const BANNER = "latex run complete -------------------------";

export function latexArgs(file: string): string[] {
  return ["--halt-on-error", "-interaction=nonstopmode", "-synctex=1", file];
}

// Resolves with the outcome of every pass, in order (one, or two after a rerun).
// stderr lines are appended after all stdout lines, so the printed order is not chronological.
export async function build(file: string, isRerun: boolean, ctx: BuildContext): Promise<BuildOutcome[]> {
  const run = ctx.run ?? runCommand;
  const res = await run(ctx.toolchain.latex, latexArgs(file));
  const lines = [...splitLines(res.stdout), ...splitLines(res.stderr)];
  const outcome = classifyOutput(lines, res.code);

  for (const line of outcome.filteredLines) ctx.reporter.line(line);
  ctx.reporter.say(outcome.succeeded ? "success" : "failure", BANNER);

  if (isRerun || !outcome.crossReferencesStale) return [outcome];
  ctx.reporter.say("plain", "rerunning");
  // pdflatex removes the PDF after a halting error; nothing to do about it while SyncTeX is on
  const rerun = await build(file, true, ctx);
  return [outcome, ...rerun];
}

// bibtex output is shown as-is, then two full builds settle citations and numbering
export async function buildBibliography(session: SessionConfig, ctx: BuildContext): Promise<BuildOutcome[]> {
  const run = ctx.run ?? runCommand;
  if (session.bibliographyFile) {
    const res = await run(ctx.toolchain.bibtex, [session.bibliographyFile]);
    // all of stdout first, then stderr
    for (const line of [...splitLines(res.stdout), ...splitLines(res.stderr)]) ctx.reporter.line(line);
  }
  const first = await build(session.mainFile, false, ctx);
  const second = await build(session.mainFile, false, ctx);
  return [...first, ...second];
}
