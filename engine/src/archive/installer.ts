/**
 * flakedesk Engine — Self-Extracting Installer
 */

import * as fs from "fs";
import * as path from "path";
import { StepFailure } from "../errors";
import { parseContainer, renderStub, writeContainer } from "./container";
import { extractTarballBuffer, tarballBuffer } from "./tarball";

export interface InstallerBuildOptions {
  /** Directory the payload entries are relative to */
  payloadDir: string;
  /** Files and directories to pack */
  entries: string[];
  /** Payload-relative script run after extraction */
  entry: string;
  title: string;
  output: string;
}

export async function buildSelfExtractingInstaller(
  options: InstallerBuildOptions,
): Promise<{ output: string; payload_bytes: number }> {
  const entryPath = path.join(options.payloadDir, options.entry);
  if (!fs.existsSync(entryPath)) {
    throw new StepFailure("ARCHIVE_ERROR", `Installer entry not found: ${entryPath}`);
  }
  for (const entry of options.entries) {
    if (!fs.existsSync(path.join(options.payloadDir, entry))) {
      throw new StepFailure("ARCHIVE_ERROR", `Payload entry not found: ${entry}`);
    }
  }

  const payload = await tarballBuffer(options.payloadDir, options.entries);
  const text = writeContainer(
    renderStub({ title: options.title, entry: options.entry }),
    payload,
  );

  fs.mkdirSync(path.dirname(options.output), { recursive: true });
  fs.writeFileSync(options.output, text, "utf-8");
  fs.chmodSync(options.output, 0o755);
  return { output: options.output, payload_bytes: payload.length };
}

/**
 * Unpack an installer's payload into `dest` without running anything.
 */
export async function extractSelfExtractingInstaller(
  file: string,
  dest: string,
): Promise<string[]> {
  if (!fs.existsSync(file)) {
    throw new StepFailure("ARCHIVE_ERROR", `Installer not found: ${file}`);
  }
  const { payload } = parseContainer(fs.readFileSync(file, "utf-8"));
  await extractTarballBuffer(payload, dest);
  return fs.readdirSync(dest).sort();
}
