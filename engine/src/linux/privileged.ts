/**
 * flakedesk Engine — Privileged Operations
 *
 * The installer runs as a regular user and escalates per action through
 * sudo. File writes try the direct route first and only fall back to sudo
 * when the target directory is not writable.
 */

import * as fs from "fs";
import * as path from "path";
import { EngineContext } from "../context";
import { StepFailure } from "../errors";
import { ErrorCategory, StepId } from "../types";
import { CommandResult, RunOptions, describeFailure } from "../utils/command";

export function isPermissionError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "EACCES" || err.code === "EPERM" || err.code === "EROFS")
  );
}

export function sudo(
  ctx: EngineContext,
  args: string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  return ctx.runner.run("sudo", args, { env: ctx.env, ...options });
}

/**
 * Run a command through sudo and throw a StepFailure on a non-zero exit.
 */
export async function sudoOrFail(
  ctx: EngineContext,
  args: string[],
  failure: { category: ErrorCategory; step?: StepId; message?: string },
  options: RunOptions = {},
): Promise<CommandResult> {
  const result = await sudo(ctx, args, options);
  if (result.exitCode !== 0) {
    const reason = describeFailure("sudo", args, result);
    throw new StepFailure(
      failure.category,
      failure.message ? `${failure.message}: ${reason}` : reason,
      { step: failure.step, details: { exitCode: result.exitCode } },
    );
  }
  return result;
}

/**
 * Write `content` to `filePath` with `mode`, escalating through
 * `sudo tee` when the direct write is refused.
 *
 * @returns how the file was written
 */
export async function writeFileWithFallback(
  ctx: EngineContext,
  filePath: string,
  content: string,
  mode: number,
  step?: StepId,
): Promise<"direct" | "sudo"> {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, "utf-8");
    fs.chmodSync(filePath, mode);
    return "direct";
  } catch (err: unknown) {
    if (!isPermissionError(err)) throw err;
  }

  ctx.logger.debug({ path: filePath }, "Direct write refused, using sudo");
  const failure = {
    category: "PERMISSION_ERROR" as const,
    step,
    message: `Could not write ${filePath}`,
  };
  await sudoOrFail(ctx, ["mkdir", "-p", path.dirname(filePath)], failure);
  await sudoOrFail(ctx, ["tee", filePath], failure, { input: content });
  await sudoOrFail(ctx, ["chmod", mode.toString(8), filePath], failure);
  return "sudo";
}

/**
 * Remove a file, escalating when needed. A missing file is not an error;
 * failures are reported, never thrown.
 */
export async function removeFileWithFallback(
  ctx: EngineContext,
  filePath: string,
): Promise<"removed" | "absent" | "failed"> {
  if (!fs.existsSync(filePath)) return "absent";

  try {
    fs.rmSync(filePath, { force: true });
    return "removed";
  } catch (err: unknown) {
    if (!isPermissionError(err)) {
      const message = err instanceof Error ? err.message : String(err);
      ctx.logger.warn({ path: filePath, error: message }, "Failed to remove file");
      return "failed";
    }
  }

  const result = await sudo(ctx, ["rm", "-f", filePath]);
  return result.exitCode === 0 ? "removed" : "failed";
}
