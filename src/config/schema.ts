import path from "node:path";
import { z } from "zod";

export interface Toolchain {
  // Typesetting engine invoked for every build
  latex: string;
  // Bibliography processor
  bibtex: string;
  // Terminal emulator used for the shell and the editor
  terminal: string;
  // Text editor, run inside the terminal
  editor: string;
  // PDF viewer with SyncTeX support
  viewer: string;
  // Server name the editor listens on for inverse search
  synctexServer: string;
}

export const defaultToolchain: Toolchain = {
  latex: "pdflatex",
  bibtex: "bibtex",
  terminal: "urxvt",
  editor: "vim",
  viewer: "zathura",
  synctexServer: "SYNCTEX",
};

// Raw command-line input, before the output path is derived
export const SessionInput = z.object({
  mainFile: z.string().min(1, "missing main .tex file"),
  bibliographyFile: z.string().min(1, "empty bibtex file name").optional(),
  extraFiles: z.array(z.string()).default([]),
});

export type SessionInput = z.input<typeof SessionInput>;

export interface SessionConfig {
  readonly mainFile: string;
  readonly pdfFile: string;
  readonly bibliographyFile?: string;
  readonly extraFiles: readonly string[];
}

/** Replace the final extension of `mainFile` with `.pdf`, or append it when there is none. */
export function pdfFileFor(mainFile: string): string {
  const ext = path.extname(mainFile);
  return mainFile.slice(0, mainFile.length - ext.length) + ".pdf";
}
