import { Command } from "commander";
import { loadSessionConfig } from "./config/load.js";
import { SessionConfig } from "./config/schema.js";

interface CliOptions {
  bibtex?: string;
}

export type SessionRunner = (session: SessionConfig) => Promise<void>;

// Errors surface as thrown CommanderError / UsageError; the caller decides how to exit
export function createProgram(runSession: SessionRunner): Command {
  return new Command()
    .name("make-latex")
    .description("Rebuild a LaTeX document on every save and show only the lines that matter")
    .argument("<texFile>", "main .tex file to watch and build")
    .argument("[files...]", "additional files of the document")
    .option("-b, --bibtex <file>", "the bibtex file your tex file uses")
    .showHelpAfterError()
    .exitOverride()
    .action(async (texFile: string, files: string[], opts: CliOptions) => {
      await runSession(loadSessionConfig({ mainFile: texFile, bibliographyFile: opts.bibtex, extraFiles: files }));
    });
}
