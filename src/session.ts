/**
 * One editing session: watch the main document, rebuild on save, and serve the
 * keystroke menu until the operator quits. Builds from both sources share one
 * queue so they never overlap.
 */
import { SessionConfig, Toolchain } from "./config/schema.js";
import { build, buildBibliography } from "./tools/latex.js";
import { OneShotSubscriber, WatchLoop } from "./tools/watch.js";
import { commandLoop } from "./tools/commands.js";
import { editorLaunch, terminalLaunch, viewerLaunch } from "./tools/launch.js";
import { CommandRunner, Launcher, launchDetached } from "./utils/process.js";
import { Reporter } from "./utils/reporter.js";
import { Sequencer } from "./utils/sequencer.js";

export interface SessionDeps {
  toolchain: Toolchain;
  reporter: Reporter;
  keys: AsyncIterable<string>;
  run?: CommandRunner;
  launch?: Launcher;
  subscribe?: OneShotSubscriber;
}

export async function runSession(session: SessionConfig, deps: SessionDeps): Promise<void> {
  const { toolchain, reporter } = deps;
  const launch = deps.launch ?? launchDetached;
  const ctx = { toolchain, reporter, run: deps.run };
  const builds = new Sequencer();
  const make = () => builds.queue(() => build(session.mainFile, false, ctx));

  let failWatch: (err: Error) => void = () => undefined;
  const watchFailed = new Promise<never>((_, reject) => { failWatch = reject; });

  const watcher = new WatchLoop({
    file: session.mainFile,
    build: make,
    onError: err => failWatch(err),
    subscribe: deps.subscribe,
  });

  reporter.say("plain", `watching ${session.mainFile}; output is ${session.pdfFile}`);
  try {
    await watcher.start();
    await Promise.race([
      watchFailed,
      commandLoop(deps.keys, {
        make,
        bibliography: () => builds.queue(() => buildBibliography(session, ctx)),
        terminal: () => launch(terminalLaunch(session.mainFile, toolchain)),
        editor: () => launch(editorLaunch(session.mainFile, toolchain)),
        viewer: () => launch(viewerLaunch(session.pdfFile, toolchain)),
      }, reporter),
    ]);
  } finally {
    await watcher.stop();
  }
  reporter.say("plain", "bye");
}
