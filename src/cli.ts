#!/usr/bin/env node
/**
 * pg-maint - CLI Entry Point
 *
 * The first SIGINT/SIGTERM stops dispatching new operations and lets the
 * in-flight ones finish (or cancels them under --on-interrupt cancel).
 * A second signal exits immediately.
 */

import { CommanderError } from "commander";
import {
  createProgram,
  EXIT_FATAL,
  exitStatusForError,
} from "./cli/commands.js";
import { logger } from "./utils/logger.js";

const controller = new AbortController();
let interrupted = false;

const onSignal = (signal: NodeJS.Signals): void => {
  if (interrupted) {
    logger.critical(`Received ${signal} again, exiting`);
    process.exit(EXIT_FATAL);
  }
  interrupted = true;
  logger.warn(`Received ${signal}, finishing in-flight operations`);
  controller.abort();
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

let exitCode = 0;
const program = createProgram(
  {
    env: process.env,
    print: (text) => {
      process.stdout.write(text);
    },
    signal: controller.signal,
  },
  (code) => {
    exitCode = code;
  },
);

program
  .parseAsync(process.argv)
  .then(() => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    // commander has already printed its own usage errors
    if (!(error instanceof CommanderError)) {
      logger.error("Fatal error", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    process.exitCode = exitStatusForError(error);
  })
  .finally(() => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
