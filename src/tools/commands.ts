/**
 * Single-keystroke command menu.
 *
 *   q  quit            m  build             b  bibtex + two builds
 *   t  terminal        e  editor            p  PDF viewer
 *
 * Each command finishes before the next key is read.
 */
import { Reporter } from "../utils/reporter.js";

export interface CommandHandlers {
  make(): Promise<unknown>;
  bibliography(): Promise<unknown>;
  terminal(): Promise<unknown>;
  editor(): Promise<unknown>;
  viewer(): Promise<unknown>;
}

// Raw mode turns off the terminal's own handling of Ctrl-C and Ctrl-D
const QUIT_KEYS = new Set(["q", "\u0003", "\u0004"]);

type Dispatch = Record<string, (h: CommandHandlers) => Promise<unknown>>;

const DISPATCH: Dispatch = {
  m: h => h.make(),
  b: h => h.bibliography(),
  t: h => h.terminal(),
  e: h => h.editor(),
  p: h => h.viewer(),
};

// Returns on a quit key or when input ends
export async function commandLoop(keys: AsyncIterable<string>, handlers: CommandHandlers, reporter: Reporter): Promise<void> {
  for await (const chunk of keys) {
    for (const c of chunk) {
      if (QUIT_KEYS.has(c)) return;
      const action = Object.hasOwn(DISPATCH, c) ? DISPATCH[c] : undefined;
      if (action) await action(handlers);
      else reporter.text(`unknown command ${c}`);
    }
  }
}

interface KeySource extends AsyncIterable<unknown> {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  setEncoding(encoding: BufferEncoding): unknown;
}

// Unbuffered, unechoed keystrokes from a TTY; falls back to plain reads otherwise
export async function* keystrokes(input: KeySource = process.stdin): AsyncGenerator<string> {
  const raw = Boolean(input.isTTY && input.setRawMode);
  if (raw) input.setRawMode?.(true);
  input.setEncoding("utf8");
  try {
    for await (const chunk of input) {
      if (typeof chunk === "string") yield chunk;
    }
  } finally {
    if (raw) input.setRawMode?.(false);
  }
}
