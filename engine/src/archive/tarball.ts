/**
 * flakedesk Engine — Tarballs
 *
 * gzip'd tar archives through the `tar` package, always via a file on disk.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as tar from "tar";

export interface TarballOptions {
  /** Path prefixes (relative to cwd) left out of the archive */
  exclude?: string[];
}

function isExcluded(entry: string, exclude: string[]): boolean {
  const normalized = entry.replace(/^\.\//, "");
  return exclude.some(
    (prefix) => normalized === prefix || normalized.startsWith(`${prefix}/`),
  );
}

/**
 * Write `entries` (relative to `cwd`) into a gzip'd tarball at `file`.
 */
export async function createTarball(
  file: string,
  cwd: string,
  entries: string[],
  options: TarballOptions = {},
): Promise<void> {
  const exclude = options.exclude ?? [];
  fs.mkdirSync(path.dirname(file), { recursive: true });
  await tar.c(
    {
      gzip: true,
      file,
      cwd,
      portable: true,
      filter: (entry: string) => !isExcluded(entry, exclude),
    },
    entries,
  );
}

export async function extractTarball(file: string, dest: string): Promise<void> {
  fs.mkdirSync(dest, { recursive: true });
  await tar.x({ file, cwd: dest, preservePaths: false });
}

/**
 * Gzip'd tarball of `entries` as bytes.
 */
export async function tarballBuffer(cwd: string, entries: string[]): Promise<Buffer> {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "flakedesk-tar-"));
  try {
    const file = path.join(tmp, "payload.tar.gz");
    await createTarball(file, cwd, entries);
    return fs.readFileSync(file);
  } finally {
    fs.rmSync(tmp, { recursive: true, force: true });
  }
}

export async function extractTarballBuffer(payload: Buffer, dest: string): Promise<void> {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), "flakedesk-tar-"));
  try {
    const file = path.join(tmp, "payload.tar.gz");
    fs.writeFileSync(file, payload);
    await extractTarball(file, dest);
  } finally {
    fs.rmSync(tmp, { recursive: true, force: true });
  }
}
