/**
 * Companion programs: a shell next to the document, the editor, and a PDF viewer
 * wired for SyncTeX inverse search back into that editor.
 */
import fs from "node:fs";
import path from "node:path";
import { Toolchain } from "../config/schema.js";
import { LaunchSpec } from "../utils/process.js";

type Realpath = (p: string) => string;

// Opens in the directory of the file the main document really lives in (symlinks followed)
export function terminalLaunch(mainFile: string, toolchain: Toolchain, realpath: Realpath = fs.realpathSync): LaunchSpec {
  const dir = path.dirname(realpath(mainFile));
  return { command: toolchain.terminal, args: ["-cd", dir], cwd: dir };
}

export function editorLaunch(mainFile: string, toolchain: Toolchain): LaunchSpec {
  return {
    command: toolchain.terminal,
    args: ["-e", toolchain.editor, "--servername", toolchain.synctexServer, mainFile],
  };
}

// -s turns SyncTeX on for zathura releases that do not enable it by default.
// %{line} is substituted by the viewer with the source line of the clicked position
export function inverseSearchCommand(toolchain: Toolchain): string {
  return `${toolchain.editor} --servername ${toolchain.synctexServer} --remote-send %{line}gg`;
}

export function viewerLaunch(pdfFile: string, toolchain: Toolchain): LaunchSpec {
  return { command: toolchain.viewer, args: ["-s", "-x", inverseSearchCommand(toolchain), pdfFile] };
}
