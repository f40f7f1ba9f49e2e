import { describe, it, expect, vi } from "vitest";
import { runSession } from "../src/session.js";
import { loadSessionConfig } from "../src/config/load.js";
import { defaultToolchain } from "../src/config/schema.js";
import { BANNER, latexArgs } from "../src/tools/latex.js";
import { OneShotSubscriber } from "../src/tools/watch.js";
import { LaunchSpec } from "../src/utils/process.js";
import { collectingReporter } from "../src/utils/reporter.js";
import { flush, scriptedRunner, transcript } from "./fakes.js";

function subscriber() {
  const subs: { onReplace: () => void; onError: (err: Error) => void; closed: boolean }[] = [];
  const subscribe: OneShotSubscriber = (_file, onReplace, onError) => {
    const sub = { onReplace, onError, closed: false };
    subs.push(sub);
    return { close: async () => { sub.closed = true; } };
  };
  return { subscribe, subs };
}

// Yields the given chunks, waiting for `gate` before the last one
async function* keys(chunks: string[], gate: Promise<void> = Promise.resolve()): AsyncGenerator<string> {
  for (let i = 0; i < chunks.length; i++) {
    if (i === chunks.length - 1) await gate;
    yield chunks[i] ?? "";
  }
}

describe("runSession", () => {
  const session = loadSessionConfig({ mainFile: "doc.tex" });

  it("builds on start, serves commands, and closes the watch on quit", async () => {
    const { run, calls } = scriptedRunner([]);
    const { subscribe, subs } = subscriber();
    const launched: LaunchSpec[] = [];
    const launch = vi.fn(async (spec: LaunchSpec) => { launched.push(spec); return 4242; });
    const reporter = collectingReporter();

    await runSession(session, {
      toolchain: defaultToolchain,
      reporter,
      keys: keys(["m", "pz", "q"]),
      run,
      launch,
      subscribe,
    });

    expect(calls).toEqual([
      { command: "pdflatex", args: latexArgs("doc.tex") },
      { command: "pdflatex", args: latexArgs("doc.tex") },
    ]);
    expect(launched).toEqual([{ command: "zathura", args: ["-s", "-x", "vim --servername SYNCTEX --remote-send %{line}gg", "doc.pdf"] }]);
    expect(transcript(reporter.entries)).toEqual([
      "plain watching doc.tex; output is doc.pdf",
      `success ${BANNER}`,
      `success ${BANNER}`,
      "text unknown command z",
      "plain bye",
    ]);
    expect(subs).toHaveLength(1);
    expect(subs[0]?.closed).toBe(true);
  });

  it("rebuilds when the watched file is replaced", async () => {
    const { run, calls } = scriptedRunner([]);
    const { subscribe, subs } = subscriber();
    let release: () => void = () => undefined;
    const gate = new Promise<void>(r => { release = r; });

    const done = runSession(session, {
      toolchain: defaultToolchain,
      reporter: collectingReporter(),
      keys: keys(["q"], gate),
      run,
      subscribe,
    });
    await flush();
    subs[0]?.onReplace();
    await flush();
    release();
    await done;

    expect(calls).toHaveLength(2);
    expect(subs).toHaveLength(2);
    expect(subs[1]?.closed).toBe(true);
  });

  it("ends with the error when a watched rebuild cannot start pdflatex", async () => {
    const { subscribe, subs } = subscriber();
    let calls = 0;
    const run = async () => {
      calls++;
      if (calls > 1) throw new Error("spawn pdflatex ENOENT");
      return { command: "pdflatex", args: [], code: 0, stdout: Buffer.alloc(0), stderr: Buffer.alloc(0) };
    };
    const never = new Promise<void>(() => undefined);

    const done = runSession(session, {
      toolchain: defaultToolchain,
      reporter: collectingReporter(),
      keys: keys(["q"], never),
      run,
      subscribe,
    });
    await flush();
    subs[0]?.onReplace();

    await expect(done).rejects.toThrow("spawn pdflatex ENOENT");
  });
});
