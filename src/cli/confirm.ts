/**
 * pg-maint - Interactive confirmation for exclusive-lock operations
 */

import { createInterface } from "node:readline/promises";
import type { DestructiveConfirmer } from "../maintenance/SafetyFilter.js";
import type { Operation } from "../maintenance/Operation.js";

export interface ConfirmOptions {
  input?: (NodeJS.ReadableStream & { isTTY?: boolean }) | undefined;
  output?: NodeJS.WritableStream | undefined;
  /** The run's interrupt signal; an interrupt answers no */
  signal?: AbortSignal | undefined;
}

function buildPrompt(operations: readonly Operation[]): string {
  const lines = [
    `${String(operations.length)} operation(s) take an exclusive lock on their table:`,
    ...operations.map((operation) => `  ${operation.describe()}`),
    "Type 'yes' to run them: ",
  ];
  return lines.join("\n");
}

/**
 * Ask on the terminal. Without a TTY nobody can answer, so the answer is no.
 * Ctrl+C at the prompt, or an interrupt of the run, also answers no.
 */
export function createTerminalConfirmer(
  options: ConfirmOptions = {},
): DestructiveConfirmer {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;

  return async (operations) => {
    if (input.isTTY !== true) {
      return false;
    }

    const asked = new AbortController();
    const onInterrupt = (): void => {
      asked.abort();
    };
    options.signal?.addEventListener("abort", onInterrupt, { once: true });
    if (options.signal?.aborted === true) {
      asked.abort();
    }

    const rl = createInterface({ input, output });
    // In raw mode Ctrl+C reaches readline, not the process
    rl.on("SIGINT", onInterrupt);
    try {
      const answer = await rl.question(buildPrompt(operations), {
        signal: asked.signal,
      });
      return answer.trim().toLowerCase() === "yes";
    } catch (error) {
      if (asked.signal.aborted) {
        return false;
      }
      throw error;
    } finally {
      options.signal?.removeEventListener("abort", onInterrupt);
      rl.close();
    }
  };
}
