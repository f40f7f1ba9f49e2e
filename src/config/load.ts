import { ZodError } from "zod";
import { which } from "../discovery/which.js";
import { SessionConfig, SessionInput, Toolchain, defaultToolchain, pdfFileFor } from "./schema.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function describeIssues(err: ZodError): string {
  return err.issues.map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

export function loadSessionConfig(input: SessionInput): SessionConfig {
  const parsed = SessionInput.safeParse(input);
  if (!parsed.success) throw new UsageError(describeIssues(parsed.error));
  const { mainFile, bibliographyFile, extraFiles } = parsed.data;
  return Object.freeze({
    mainFile,
    pdfFile: pdfFileFor(mainFile),
    bibliographyFile,
    extraFiles: Object.freeze([...extraFiles]),
  });
}

type Lookup = (command: string) => string | null;

// Resolve each executable to an absolute path when it can be found; keep the bare name otherwise
export function loadToolchain(lookup: Lookup = which, base: Toolchain = defaultToolchain): Toolchain {
  return {
    latex: lookup(base.latex) || base.latex,
    bibtex: lookup(base.bibtex) || base.bibtex,
    terminal: lookup(base.terminal) || base.terminal,
    editor: base.editor,
    viewer: lookup(base.viewer) || base.viewer,
    synctexServer: base.synctexServer,
  };
}
