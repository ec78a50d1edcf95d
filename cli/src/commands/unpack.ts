/**
 * flakedesk CLI -- Unpack Command
 *
 * Extracts a self-extracting installer's payload without running it.
 */

import * as path from "path";
import { Command } from "commander";
import { extractSelfExtractingInstaller } from "@flakedesk/engine";
import { printBullet, printError, printSuccess } from "../output";

export async function runUnpack(installer: string, dest?: string): Promise<number> {
  const target = path.resolve(dest ?? `${path.basename(installer)}-payload`);
  try {
    const entries = await extractSelfExtractingInstaller(installer, target);
    printSuccess(`Extracted to ${target}`);
    for (const entry of entries) printBullet(entry);
    return 0;
  } catch (err: unknown) {
    printError(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

export function registerUnpackCommand(program: Command): void {
  program
    .command("unpack <installer> [dir]")
    .description("Extract an installer's payload without running it")
    .action(async (installer: string, dir?: string) => {
      process.exitCode = await runUnpack(installer, dir);
    });
}
