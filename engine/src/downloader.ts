/**
 * flakedesk Engine — File Downloader
 *
 * Fetches small assets (the application icon) over HTTPS.
 * HTTP URLs are rejected.
 */

import * as fs from "fs";
import * as path from "path";
import * as https from "https";
import { Logger } from "./utils/logger";

const MAX_REDIRECTS = 5;
const TIMEOUT_MS = 30000;

/**
 * Download `url` to `destPath`, following up to five redirects.
 *
 * @returns bytes written
 */
export async function downloadFile(
  url: string,
  destPath: string,
  logger: Logger,
  redirects = 0,
): Promise<number> {
  if (!url.startsWith("https://")) {
    throw new Error(`Download URL must be HTTPS. Got: ${url}`);
  }

  fs.mkdirSync(path.dirname(destPath), { recursive: true });
  logger.info({ url, dest: destPath }, "Starting download");

  return new Promise<number>((resolve, reject) => {
    const request = https.get(url, (response) => {
      if (
        response.statusCode &&
        response.statusCode >= 300 &&
        response.statusCode < 400 &&
        response.headers.location
      ) {
        response.resume();
        if (redirects >= MAX_REDIRECTS) {
          reject(new Error(`Too many redirects for ${url}`));
          return;
        }
        const next = new URL(response.headers.location, url).toString();
        logger.debug({ redirect: next }, "Following redirect");
        downloadFile(next, destPath, logger, redirects + 1).then(resolve, reject);
        return;
      }

      if (response.statusCode !== 200) {
        response.resume();
        reject(new Error(`Download failed: HTTP ${response.statusCode} for ${url}`));
        return;
      }

      let bytes = 0;
      const fileStream = fs.createWriteStream(destPath);
      response.on("data", (chunk: Buffer) => {
        bytes += chunk.length;
      });
      response.pipe(fileStream);

      fileStream.on("finish", () => {
        fileStream.close();
        logger.info({ dest: destPath, bytes }, "Download complete");
        resolve(bytes);
      });

      fileStream.on("error", (err) => {
        fs.rmSync(destPath, { force: true });
        reject(new Error(`Failed to write downloaded file: ${err.message}`));
      });
    });

    request.on("error", (err) => {
      reject(new Error(`Download request failed: ${err.message}`));
    });

    request.setTimeout(TIMEOUT_MS, () => {
      request.destroy();
      reject(new Error(`Download timed out after ${TIMEOUT_MS / 1000} seconds: ${url}`));
    });
  });
}
