/**
 * flakedesk Engine — Release Packager
 *
 * build/
 *   payload/                 staged installer payload
 *   <installer>              self-extracting installer
 *   release/
 *     <installer>
 *     <name>-v<version>-source.tar.gz
 *     checksums.sha256
 */

import * as fs from "fs";
import * as path from "path";
import { placeholderIcon } from "../desktop";
import { StepFailure } from "../errors";
import { Logger } from "../utils/logger";
import { ChecksumEntry, writeChecksumListing } from "./checksums";
import { buildSelfExtractingInstaller } from "./installer";
import { createTarball } from "./tarball";

export interface ReleaseFile {
  /** Source path, relative to the project root */
  from: string;
  /** Destination inside the payload */
  to: string;
}

export interface ReleaseOptions {
  projectRoot: string;
  /** Wiped and recreated on every build */
  buildDir: string;
  name: string;
  version: string;
  title: string;
  files: ReleaseFile[];
  /** Payload-relative script run by the installer */
  entry: string;
  /** Icon staged under assets/, generated when no file provides it */
  iconFile: string;
  logger: Logger;
}

export interface ReleaseResult {
  installer: string;
  release_dir: string;
  checksums: ChecksumEntry[];
}

/** Never part of the source archive */
const SOURCE_EXCLUDES = [".git", "node_modules", "dist"];

function stagePayload(options: ReleaseOptions, payloadDir: string): void {
  for (const file of options.files) {
    const from = path.join(options.projectRoot, file.from);
    if (!fs.existsSync(from)) {
      throw new StepFailure("ARCHIVE_ERROR", `Release file not found: ${file.from}`);
    }
    const to = path.join(payloadDir, file.to);
    fs.mkdirSync(path.dirname(to), { recursive: true });
    fs.cpSync(from, to, { recursive: true });
  }

  const icon = path.join(payloadDir, "assets", options.iconFile);
  if (!fs.existsSync(icon)) {
    options.logger.info({ icon }, "No icon in payload, writing placeholder");
    fs.mkdirSync(path.dirname(icon), { recursive: true });
    fs.writeFileSync(icon, placeholderIcon(options.title.charAt(0)), "utf-8");
  }

  fs.chmodSync(path.join(payloadDir, options.entry), 0o755);
}

export async function buildRelease(options: ReleaseOptions): Promise<ReleaseResult> {
  const { buildDir, logger } = options;
  const payloadDir = path.join(buildDir, "payload");
  const releaseDir = path.join(buildDir, "release");
  const installerName = `${options.name}-installer`;

  logger.info({ buildDir }, "Creating build directory");
  fs.rmSync(buildDir, { recursive: true, force: true });
  fs.mkdirSync(payloadDir, { recursive: true });

  stagePayload(options, payloadDir);

  const installer = path.join(buildDir, installerName);
  const built = await buildSelfExtractingInstaller({
    payloadDir,
    entries: fs.readdirSync(payloadDir).sort(),
    entry: options.entry,
    title: options.title,
    output: installer,
  });
  logger.info(built, "Self-extracting installer created");

  fs.mkdirSync(releaseDir, { recursive: true });
  fs.copyFileSync(installer, path.join(releaseDir, installerName));
  fs.chmodSync(path.join(releaseDir, installerName), 0o755);

  const relativeBuild = path.relative(options.projectRoot, buildDir);
  const excludes = [...SOURCE_EXCLUDES];
  if (relativeBuild && !relativeBuild.startsWith("..")) excludes.push(relativeBuild);

  const sourceEntries = fs
    .readdirSync(options.projectRoot)
    .filter((entry) => !excludes.includes(entry))
    .sort();
  await createTarball(
    path.join(releaseDir, `${options.name}-v${options.version}-source.tar.gz`),
    options.projectRoot,
    sourceEntries,
    { exclude: excludes },
  );

  const checksums = await writeChecksumListing(releaseDir);
  logger.info({ releaseDir, files: checksums.length }, "Release package created");

  return { installer, release_dir: releaseDir, checksums };
}
