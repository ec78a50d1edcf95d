/**
 * flakedesk Engine — Command Runner
 *
 * Every external tool (apt, nix, gsettings, sudo, ...) is invoked through a
 * CommandRunner so steps can be exercised against an in-process fake.
 *
 * A non-zero exit is a result, not an exception: callers decide whether it
 * is fatal. Only a failure to spawn at all is folded into exit code 127,
 * matching what a shell reports for a missing command.
 */

import { spawn } from "child_process";
import { Logger } from "./logger";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  /** Called for every complete line on stdout or stderr */
  onLine?: (line: string) => void;
}

export interface CommandRunner {
  run(
    command: string,
    args: string[],
    options?: RunOptions,
  ): Promise<CommandResult>;
}

/** Exit code reported when the executable could not be started */
export const COMMAND_NOT_FOUND = 127;

/**
 * Split streamed chunks into lines, holding back a trailing partial line.
 */
export function createLineSplitter(
  onLine: (line: string) => void,
): { push(chunk: string): void; flush(): void } {
  let pending = "";
  return {
    push(chunk: string) {
      pending += chunk;
      const parts = pending.split(/\r?\n/);
      pending = parts.pop() ?? "";
      for (const part of parts) onLine(part);
    },
    flush() {
      if (pending.length > 0) onLine(pending);
      pending = "";
    },
  };
}

/**
 * Create the real runner backed by child_process.spawn.
 */
export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    run(command, args, options = {}) {
      logger.debug({ command, args }, "Running command");

      return new Promise<CommandResult>((resolve) => {
        let stdout = "";
        let stderr = "";
        const child = spawn(command, args, {
          env: options.env ?? process.env,
          cwd: options.cwd,
          stdio: ["pipe", "pipe", "pipe"],
        });

        const outLines = options.onLine
          ? createLineSplitter(options.onLine)
          : undefined;
        const errLines = options.onLine
          ? createLineSplitter(options.onLine)
          : undefined;

        child.stdout.setEncoding("utf-8");
        child.stderr.setEncoding("utf-8");
        child.stdout.on("data", (chunk: string) => {
          stdout += chunk;
          outLines?.push(chunk);
        });
        child.stderr.on("data", (chunk: string) => {
          stderr += chunk;
          errLines?.push(chunk);
        });

        child.on("error", (err) => {
          logger.debug({ command, error: err.message }, "Command failed to start");
          resolve({ exitCode: COMMAND_NOT_FOUND, stdout, stderr: err.message });
        });

        child.on("close", (code, signal) => {
          outLines?.flush();
          errLines?.flush();
          const exitCode = code ?? (signal ? 128 : 1);
          logger.debug({ command, exitCode }, "Command finished");
          resolve({ exitCode, stdout, stderr });
        });

        if (options.input !== undefined) {
          child.stdin.end(options.input);
        } else {
          child.stdin.end();
        }
      });
    },
  };
}

/**
 * Quote a value for inclusion in a POSIX shell command line.
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Check whether a command is resolvable on PATH, the way `command -v` does.
 */
export async function commandExists(
  runner: CommandRunner,
  name: string,
  env?: NodeJS.ProcessEnv,
): Promise<boolean> {
  const result = await runner.run("sh", ["-c", `command -v ${shellQuote(name)}`], {
    env,
  });
  return result.exitCode === 0;
}

/**
 * Condense a failed result into one line for error messages.
 */
export function describeFailure(
  command: string,
  args: string[],
  result: CommandResult,
): string {
  const detail = (result.stderr || result.stdout).trim().split("\n").pop() ?? "";
  const line = [command, ...args].join(" ");
  return detail
    ? `\`${line}\` exited with code ${result.exitCode}: ${detail}`
    : `\`${line}\` exited with code ${result.exitCode}`;
}
