/**
 * pg-maint - Crontab access
 */

import { spawn } from "node:child_process";
import { CrontabError } from "../types/index.js";

/**
 * Reads and replaces the current user's crontab as a list of lines
 */
export interface CrontabStore {
  read(): Promise<string[]>;
  write(lines: readonly string[]): Promise<void>;
}

interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function runCommand(
  command: string,
  args: string[],
  input?: string,
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", (error) => {
      reject(
        new CrontabError(`Cannot run ${command}: ${error.message}`, {
          command,
        }),
      );
    });
    child.on("close", (code) => {
      resolve({ code, stdout, stderr });
    });
    child.stdin.end(input ?? "");
  });
}

function splitLines(text: string): string[] {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * The `crontab` binary on PATH. A user without a crontab reads as empty.
 */
export class SystemCrontab implements CrontabStore {
  constructor(private readonly binary = "crontab") {}

  async read(): Promise<string[]> {
    const result = await runCommand(this.binary, ["-l"]);
    if (result.code === 0) {
      return splitLines(result.stdout);
    }
    if (/no crontab for/i.test(result.stderr)) {
      return [];
    }
    throw new CrontabError(
      `${this.binary} -l exited with ${String(result.code)}: ${result.stderr.trim()}`,
    );
  }

  async write(lines: readonly string[]): Promise<void> {
    const content = lines.length > 0 ? `${lines.join("\n")}\n` : "";
    const result = await runCommand(this.binary, ["-"], content);
    if (result.code !== 0) {
      throw new CrontabError(
        `${this.binary} - exited with ${String(result.code)}: ${result.stderr.trim()}`,
      );
    }
  }
}
