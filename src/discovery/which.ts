import fs from "node:fs";
import path from "node:path";
import os from "node:os";

// TeX installations that are frequently missing from PATH
const TEX_FALLBACK_DIRS = [
  "/Library/TeX/texbin",
  "/usr/texbin",
  "/usr/local/texlive/bin",
  "/usr/local/bin",
  "/usr/bin",
];

function isExecutable(p: string): boolean {
  try {
    const st = fs.statSync(p);
    if (!st.isFile()) return false;
    if (os.platform() === "win32") return true;
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function candidates(dir: string, command: string): string[] {
  if (os.platform() !== "win32" || path.extname(command)) return [path.join(dir, command)];
  const exts = (process.env.PATHEXT || ".EXE;.CMD;.BAT").split(";");
  return exts.map(ext => path.join(dir, command + ext.toLowerCase()));
}

// Architecture subdirectories of a TeX Live tree, e.g. /usr/local/texlive/bin/x86_64-linux
function texLiveArchDirs(root: string): string[] {
  try {
    return fs.readdirSync(root, { withFileTypes: true })
      .filter(e => e.isDirectory())
      .map(e => path.join(root, e.name));
  } catch {
    return [];
  }
}

export function which(command: string, envPath: string = process.env.PATH || ""): string | null {
  if (command.includes("/") || command.includes(path.sep)) {
    return isExecutable(command) ? path.resolve(command) : null;
  }
  const dirs = envPath.split(path.delimiter).map(seg => seg || ".");
  if (os.platform() !== "win32") {
    dirs.push(...TEX_FALLBACK_DIRS, ...texLiveArchDirs("/usr/local/texlive/bin"));
  }
  for (const dir of dirs) {
    for (const p of candidates(dir, command)) {
      if (isExecutable(p)) return p;
    }
  }
  return null;
}
