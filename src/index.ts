#!/usr/bin/env node
import { CommanderError } from "commander";
import { createProgram } from "./cli.js";
import { loadToolchain, UsageError } from "./config/load.js";
import { runSession } from "./session.js";
import { keystrokes } from "./tools/commands.js";
import { consoleReporter } from "./utils/reporter.js";

async function main(): Promise<void> {
  const program = createProgram(session =>
    runSession(session, {
      toolchain: loadToolchain(),
      reporter: consoleReporter(),
      keys: keystrokes(),
    }),
  );
  try {
    await program.parseAsync(process.argv);
    process.exit(0);
  } catch (err) {
    // commander has already printed its usage message
    if (err instanceof CommanderError) process.exit(err.exitCode);
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n`);
      console.error(program.helpInformation());
      process.exit(1);
    }
    console.error("Error:", err);
    process.exit(1);
  }
}

void main();
