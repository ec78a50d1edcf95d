/**
 * flakedesk Engine — /etc/os-release Parsing
 */

import * as fs from "fs";
import { OsRelease } from "../types";

export const OS_RELEASE_PATH = "/etc/os-release";

/**
 * Parse os-release(5) text into a key/value map. Values may be bare,
 * single- or double-quoted; comments and blank lines are ignored.
 */
export function parseOsRelease(text: string): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.endsWith(quote) && value.length >= 2) {
      value = value.slice(1, -1);
      if (quote === '"') value = value.replace(/\\(["\\$`])/g, "$1");
    }
    fields[key] = value;
  }

  return fields;
}

/**
 * Read the OS identity. Returns null when the file is missing or lacks a
 * NAME.
 */
export function readOsRelease(filePath: string = OS_RELEASE_PATH): OsRelease | null {
  if (!fs.existsSync(filePath)) return null;

  const fields = parseOsRelease(fs.readFileSync(filePath, "utf-8"));
  if (!fields.NAME) return null;

  return {
    id: fields.ID ?? "",
    name: fields.NAME,
    version_id: fields.VERSION_ID ?? "",
  };
}
