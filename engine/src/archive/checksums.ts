/**
 * flakedesk Engine — SHA-256 Checksum Listing
 *
 * `sha256sum`-compatible listings: one `<hex>  <name>` line per regular
 * file in a directory. The listing never lists itself.
 */

import * as fs from "fs";
import * as crypto from "crypto";
import * as path from "path";

export const CHECKSUM_LISTING = "checksums.sha256";

export interface ChecksumEntry {
  hash: string;
  file: string;
}

export interface ListingVerification {
  ok: boolean;
  verified: string[];
  mismatched: string[];
  /** Listed but not present */
  missing: string[];
  /** Present but not listed */
  unlisted: string[];
}

/**
 * Compute SHA-256 hash of a file, streaming.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}

function listedFiles(dir: string, listingName: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name !== listingName)
    .map((entry) => entry.name)
    .sort();
}

export function formatChecksumListing(entries: ChecksumEntry[]): string {
  return entries.map((e) => `${e.hash}  ${e.file}\n`).join("");
}

/**
 * Accepts text and binary mode markers (`  name` and ` *name`).
 */
export function parseChecksumListing(text: string): ChecksumEntry[] {
  const entries: ChecksumEntry[] = [];
  for (const [index, raw] of text.split("\n").entries()) {
    const line = raw.replace(/\r$/, "");
    if (line.trim() === "") continue;
    const match = line.match(/^([a-fA-F0-9]{64}) [ *](.+)$/);
    if (!match) {
      throw new Error(`Malformed checksum line ${index + 1}: "${line}"`);
    }
    entries.push({ hash: match[1].toLowerCase(), file: match[2] });
  }
  return entries;
}

/**
 * Hash every regular file in `dir` and write the listing beside them.
 */
export async function writeChecksumListing(
  dir: string,
  listingName: string = CHECKSUM_LISTING,
): Promise<ChecksumEntry[]> {
  const entries: ChecksumEntry[] = [];
  for (const file of listedFiles(dir, listingName)) {
    entries.push({ hash: await computeFileHash(path.join(dir, file)), file });
  }
  fs.writeFileSync(path.join(dir, listingName), formatChecksumListing(entries), "utf-8");
  return entries;
}

export async function verifyChecksumListing(
  dir: string,
  listingName: string = CHECKSUM_LISTING,
): Promise<ListingVerification> {
  const listingPath = path.join(dir, listingName);
  if (!fs.existsSync(listingPath)) {
    throw new Error(`Checksum listing not found: ${listingPath}`);
  }

  const entries = parseChecksumListing(fs.readFileSync(listingPath, "utf-8"));
  const result: ListingVerification = {
    ok: false,
    verified: [],
    mismatched: [],
    missing: [],
    unlisted: [],
  };

  for (const entry of entries) {
    const file = path.join(dir, entry.file);
    if (!fs.existsSync(file)) {
      result.missing.push(entry.file);
    } else if ((await computeFileHash(file)) === entry.hash) {
      result.verified.push(entry.file);
    } else {
      result.mismatched.push(entry.file);
    }
  }

  const listed = new Set(entries.map((e) => e.file));
  result.unlisted = listedFiles(dir, listingName).filter((f) => !listed.has(f));
  result.ok = result.mismatched.length === 0 && result.missing.length === 0;
  return result;
}
