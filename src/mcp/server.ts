/**
 * MCP server exposing the build loop's pieces as tools.
 *
 * Exposed tools:
 *  - latex.build         one build of a document, with the automatic rerun
 *  - latex.bibliography  bibtex followed by two builds
 *  - latex.filter_log    the interesting lines of an existing log file
 *
 * Runner output is collected in memory and returned with the result; stdout
 * belongs to the transport. Lines are decoded as UTF-8 for transport only.
 */
import fs from "node:fs/promises";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { loadSessionConfig } from "../config/load.js";
import { Toolchain } from "../config/schema.js";
import { build, buildBibliography } from "../tools/latex.js";
import { BuildOutcome, filterInteresting, splitLines } from "../parsers/latexLog.js";
import { CommandRunner } from "../utils/process.js";
import { collectingReporter, ReportEntry } from "../utils/reporter.js";
import { Sequencer } from "../utils/sequencer.js";

export interface ServerDeps {
  toolchain: Toolchain;
  run?: CommandRunner;
  readFile?: (p: string) => Promise<Buffer>;
}

const LatexBuildInput = {
  file: z.string().describe("Path of the .tex file to build, relative to the server's working directory"),
  rerun: z.boolean().optional().describe("Treat this as the rerun pass (no further automatic rerun)"),
} as const;

const LatexBibliographyInput = {
  mainFile: z.string().describe("Main .tex file"),
  bibliographyFile: z.string().optional().describe("Argument passed to bibtex; skipped when absent"),
} as const;

const FilterLogInput = {
  logFile: z.string().describe("Path to a pdflatex .log file"),
} as const;

function decode(lines: Buffer[]): string[] {
  return lines.map(l => l.toString("utf8"));
}

function passSummary(o: BuildOutcome) {
  return {
    succeeded: o.succeeded,
    crossReferencesStale: o.crossReferencesStale,
    exitCode: o.exitCode,
    filteredLines: decode(o.filteredLines),
  };
}

function transcript(entries: ReportEntry[]): string[] {
  return entries.map(e => (e.kind === "line" ? e.bytes.toString("utf8") : e.kind === "say" ? `make-latex: ${e.message}` : e.message));
}

function textResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

function errorResult(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  return { content: [{ type: "text" as const, text: `Error: ${message}` }], isError: true };
}

export function createServer(deps: ServerDeps): McpServer {
  const server = new McpServer({ name: "make-latex", version: "0.1.0" });
  const builds = new Sequencer();
  const readFile = deps.readFile ?? ((p: string) => fs.readFile(p));

  server.registerTool(
    "latex.build",
    {
      title: "Build LaTeX document",
      description: "Run pdflatex once (plus one rerun when labels changed) and return the interesting output lines",
      inputSchema: LatexBuildInput,
    },
    async (args) => {
      try {
        const reporter = collectingReporter();
        const passes = await builds.queue(() => build(args.file, args.rerun ?? false, { toolchain: deps.toolchain, reporter, run: deps.run }));
        return textResult({ passes: passes.map(passSummary), transcript: transcript(reporter.entries) });
      } catch (err: unknown) {
        return errorResult(err);
      }
    }
  );

  server.registerTool(
    "latex.bibliography",
    {
      title: "Build bibliography",
      description: "Run bibtex (when a file is given) and then two pdflatex builds",
      inputSchema: LatexBibliographyInput,
    },
    async (args) => {
      try {
        const session = loadSessionConfig({ mainFile: args.mainFile, bibliographyFile: args.bibliographyFile });
        const reporter = collectingReporter();
        const passes = await builds.queue(() => buildBibliography(session, { toolchain: deps.toolchain, reporter, run: deps.run }));
        return textResult({ passes: passes.map(passSummary), transcript: transcript(reporter.entries) });
      } catch (err: unknown) {
        return errorResult(err);
      }
    }
  );

  server.registerTool(
    "latex.filter_log",
    {
      title: "Filter LaTeX log",
      description: "Return the warning, error and overfull-box lines of a log file",
      inputSchema: FilterLogInput,
    },
    async (args) => {
      try {
        const bytes = await readFile(args.logFile);
        return textResult({ lines: decode(filterInteresting(splitLines(bytes))) });
      } catch (err: unknown) {
        return errorResult(err);
      }
    }
  );

  return server;
}
