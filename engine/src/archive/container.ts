/**
 * flakedesk Engine — Self-Extracting Container
 *
 * Layout:
 *
 *   <stub script lines>
 *   __FLAKEDESK_PAYLOAD_V1__
 *   <base64 of a gzip'd tar, 76 columns per line>
 *
 * The stub and parseContainer() both locate the payload by the first line
 * exactly equal to the sentinel, so text added above it (a longer stub, a
 * comment) does not shift the payload. The stub itself must not contain
 * the sentinel as a whole line.
 */

import { StepFailure } from "../errors";

export const SENTINEL = "__FLAKEDESK_PAYLOAD_V1__";
const LINE_WIDTH = 76;

export interface StubOptions {
  /** Shown in the stub's header comment */
  title: string;
  /** Payload-relative path executed after extraction */
  entry: string;
}

export function renderStub(options: StubOptions): string {
  return `#!/bin/sh
# ${options.title} self-extracting installer

set -e

EXTRACT_DIR="$(mktemp -d)"
PAYLOAD_LINE=$(grep -a -n -x -m 1 '${SENTINEL}' "$0" | cut -d: -f1)
if [ -z "$PAYLOAD_LINE" ]; then
    echo "ERROR: payload marker not found in $0" >&2
    exit 1
fi

tail -n +$((PAYLOAD_LINE + 1)) "$0" | base64 -d | tar -xzf - -C "$EXTRACT_DIR"

cd "$EXTRACT_DIR"
exec ./${options.entry} "$@"
`;
}

function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  for (let i = 0; i < text.length; i += width) {
    lines.push(text.slice(i, i + width));
  }
  return lines;
}

/**
 * Join a stub and a payload into the container text.
 */
export function writeContainer(stub: string, payload: Buffer): string {
  const stubLines = stub.replace(/\n+$/, "").split("\n");
  if (stubLines.includes(SENTINEL)) {
    throw new StepFailure("ARCHIVE_ERROR", "The stub must not contain the payload marker line");
  }
  return [...stubLines, SENTINEL, ...wrap(payload.toString("base64"), LINE_WIDTH), ""].join("\n");
}

export interface ParsedContainer {
  stub: string;
  payload: Buffer;
}

/**
 * Split container text back into stub and payload bytes.
 */
export function parseContainer(text: string): ParsedContainer {
  const lines = text.split("\n");
  const marker = lines.findIndex((line) => line.replace(/\r$/, "") === SENTINEL);
  if (marker < 0) {
    throw new StepFailure("ARCHIVE_ERROR", `Payload marker ${SENTINEL} not found`);
  }

  const encoded = lines.slice(marker + 1).join("").replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded)) {
    throw new StepFailure("ARCHIVE_ERROR", "Payload is not valid base64");
  }

  return {
    stub: `${lines.slice(0, marker).join("\n")}\n`,
    payload: Buffer.from(encoded, "base64"),
  };
}
