#!/usr/bin/env node
import { CommanderError } from "commander";
import { ExitCode } from "./exit-codes.js";
import { createProgram } from "./program.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  process.stderr.write("\nInterrupted: finishing in-flight requests (Ctrl-C again to force)\n");
  controller.abort();
});

const program = createProgram({
  signal: controller.signal,
  onExit: (code) => {
    process.exitCode = code;
  },
});

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
  } else {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = ExitCode.UNEXPECTED;
  }
}
