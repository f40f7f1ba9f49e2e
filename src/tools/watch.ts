/**
 * Rebuild-on-save loop for the main document.
 *
 * Editors commonly save by writing a temporary file and moving it over the
 * original, which invalidates any watch tied to the old file. Instead of one
 * long-lived subscription the loop registers a one-shot watch, and after the
 * resulting build finishes it registers a fresh one. Saves that land while a
 * build is running are not observed.
 */
import { watch } from "chokidar";

export type WatchState = "idle" | "building" | "stopped";

export interface OneShotWatch {
  close(): Promise<void>;
}

export type OneShotSubscriber = (
  file: string,
  onReplace: () => void,
  onError: (err: Error) => void,
) => OneShotWatch;

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// chokidar reports an atomic replace as "change", or as "add" when the file was briefly absent
export const chokidarOneShot: OneShotSubscriber = (file, onReplace, onError) => {
  const watcher = watch(file, { ignoreInitial: true, persistent: true });
  let fired = false;
  const fire = () => {
    if (fired) return;
    fired = true;
    watcher.close().then(onReplace, (err: unknown) => onError(asError(err)));
  };
  watcher.on("change", fire);
  watcher.on("add", fire);
  watcher.on("error", (err: unknown) => onError(asError(err)));
  return {
    close() {
      fired = true;
      return watcher.close();
    },
  };
};

export interface WatchLoopOptions {
  file: string;
  build: () => Promise<unknown>;
  // Receives failures of builds triggered by file events
  onError: (err: Error) => void;
  subscribe?: OneShotSubscriber;
}

export class WatchLoop {
  private _state: WatchState = "idle";
  private current: OneShotWatch | undefined;
  private readonly subscribe: OneShotSubscriber;

  constructor(private readonly opts: WatchLoopOptions) {
    this.subscribe = opts.subscribe ?? chokidarOneShot;
  }

  get state(): WatchState {
    return this._state;
  }

  // Builds once right away, then keeps rebuilding on every replace of the file
  start(): Promise<void> {
    return this.cycle();
  }

  async stop(): Promise<void> {
    this._state = "stopped";
    const w = this.current;
    this.current = undefined;
    if (w) await w.close();
  }

  private async cycle(): Promise<void> {
    if (this._state === "stopped") return;
    this._state = "building";
    try {
      await this.opts.build();
    } catch (err) {
      this._state = "stopped";
      throw err;
    }
    if (this.state === "stopped") return;
    this._state = "idle";
    this.current = this.subscribe(this.opts.file, () => this.onReplace(), (err) => this.fail(err));
  }

  private onReplace(): void {
    this.current = undefined;
    this.cycle().catch((err: unknown) => this.fail(asError(err)));
  }

  // The original failure is reported even if closing the watcher fails too
  private fail(err: Error): void {
    const report = () => this.opts.onError(err);
    this.stop().then(report, report);
  }
}
