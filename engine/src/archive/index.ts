export { SENTINEL, renderStub, writeContainer, parseContainer, type ParsedContainer, type StubOptions } from "./container";
export { createTarball, extractTarball, tarballBuffer, extractTarballBuffer } from "./tarball";
export {
  CHECKSUM_LISTING,
  computeFileHash,
  formatChecksumListing,
  parseChecksumListing,
  writeChecksumListing,
  verifyChecksumListing,
  type ChecksumEntry,
  type ListingVerification,
} from "./checksums";
export {
  buildSelfExtractingInstaller,
  extractSelfExtractingInstaller,
  type InstallerBuildOptions,
} from "./installer";
export { buildRelease, type ReleaseFile, type ReleaseOptions, type ReleaseResult } from "./release";
