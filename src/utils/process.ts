// Process utilities: child process spawning for external tools
// - No shell execution: arguments are passed as an array
// - Output is captured as raw bytes; TeX logs are not guaranteed to be valid UTF-8
// - Companion programs (terminal, editor, viewer) are launched detached
import { spawn, SpawnOptions } from "node:child_process";

export interface RunOptions {
  // Working directory for the process
  cwd?: string;
}

export interface RunResult {
  // Executable invoked
  command: string;
  // Argument list
  args: string[];
  // Exit code (null if terminated by a signal)
  code: number | null;
  // Captured stdout, undecoded
  stdout: Buffer;
  // Captured stderr, undecoded
  stderr: Buffer;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export interface LaunchSpec {
  command: string;
  args: string[];
  cwd?: string;
}

export type Launcher = (spec: LaunchSpec) => Promise<number | undefined>;

// Run a command to completion, returning captured output and exit status.
// Rejects only when the process cannot be started.
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise<RunResult>((resolve, reject) => {
    const spawnOpts: SpawnOptions = {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
      shell: false,
    };

    const child = spawn(command, args, spawnOpts);

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let finished = false;

    child.stdout?.on("data", (d: Buffer) => { stdout.push(d); });
    child.stderr?.on("data", (d: Buffer) => { stderr.push(d); });

    child.on("error", (err) => {
      if (finished) return;
      finished = true;
      reject(err);
    });

    child.on("close", (code) => {
      if (finished) return;
      finished = true;
      resolve({ command, args, code, stdout: Buffer.concat(stdout), stderr: Buffer.concat(stderr) });
    });
  });
};

// Start a program that outlives this one; resolves with its pid once spawned
export const launchDetached: Launcher = (spec) => {
  return new Promise<number | undefined>((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      stdio: "ignore",
      detached: true,
      shell: false,
    });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve(child.pid);
    });
  });
};
