/**
 * flakedesk CLI -- Verify Command
 *
 * Checks every file in a release directory against its checksum listing.
 */

import { Command } from "commander";
import { CHECKSUM_LISTING, ListingVerification, verifyChecksumListing } from "@flakedesk/engine";
import { printError, printStageError, printStageSuccess, printStageWarn, printSuccess } from "../output";

export async function runVerify(dir: string, listing: string = CHECKSUM_LISTING): Promise<number> {
  let result: ListingVerification;
  try {
    result = await verifyChecksumListing(dir, listing);
  } catch (err: unknown) {
    printError(err instanceof Error ? err.message : String(err));
    return 1;
  }

  for (const file of result.verified) printStageSuccess(`${file}: OK`);
  for (const file of result.mismatched) printStageError(`${file}: FAILED`);
  for (const file of result.missing) printStageError(`${file}: missing`);
  for (const file of result.unlisted) printStageWarn(`${file}: not in ${listing}`);

  if (!result.ok) {
    printError(
      `${result.mismatched.length + result.missing.length} of ` +
        `${result.verified.length + result.mismatched.length + result.missing.length} file(s) failed verification`,
    );
    return 1;
  }
  printSuccess(`${result.verified.length} file(s) verified`);
  return 0;
}

export function registerVerifyCommand(program: Command): void {
  program
    .command("verify <dir>")
    .description("Verify release files against their checksum listing")
    .option("--listing <name>", "Listing file name", CHECKSUM_LISTING)
    .action(async (dir: string, opts: { listing: string }) => {
      process.exitCode = await runVerify(dir, opts.listing);
    });
}
