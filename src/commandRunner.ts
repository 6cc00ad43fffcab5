/**
 * Thin wrapper around `execFile` for the external CLIs (`docker`, `gh`).
 * Commands never go through a shell.
 */

import { execFile as execFileCallback } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFileCallback);

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  error?: string;
  exitCode: number | null;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const promise = execFileAsync(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxBuffer: 64 * 1024 * 1024,
  });

  const stdin = promise.child.stdin;
  if (stdin) {
    stdin.on("error", () => {
      // EPIPE when the command exits before reading; reported via exit code
    });
    stdin.end(options.input);
  }

  try {
    const { stdout, stderr } = await promise;
    return { ok: true, stdout, stderr, exitCode: 0 };
  } catch (error) {
    return {
      ok: false,
      stdout: stringField(error, "stdout"),
      stderr: stringField(error, "stderr"),
      error: error instanceof Error ? error.message : String(error),
      exitCode: exitCodeOf(error),
    };
  }
};

function stringField(error: unknown, field: "stdout" | "stderr"): string {
  if (typeof error === "object" && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === "string" ? value : "";
  }
  return "";
}

function exitCodeOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "number" ? error.code : null;
  }
  return null;
}

/** Last lines of a failed command's output, for error messages. */
export function outputTail(result: CommandResult, lines = 5): string {
  const combined = [result.stderr, result.stdout]
    .filter(Boolean)
    .join("\n")
    .trim();
  const tail = combined.split("\n").slice(-lines).join("\n");
  return tail || result.error || `exit code ${result.exitCode}`;
}
