/**
 * flakedesk Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

// Main engine class
export { FlakeDeskEngine, type EngineDependencies } from "./engine";

// All types
export type {
  AppProfile,
  CompanionSpec,
  DesktopEntrySpec,
  InstallPaths,
  OsRelease,
  ProbedTool,
  SystemProbe,
  PreflightProblem,
  StepId,
  StepSeverity,
  StepProbe,
  StepStatus,
  StepOutcome,
  StepPlan,
  SystemStatus,
  ErrorCategory,
  ExecutionError,
  FinalState,
  ExecutionResult,
  UninstallAction,
  UninstallResult,
  EngineOptions,
  InstallOptions,
  UninstallOptions,
  EngineEvent,
  EngineEventHandler,
} from "./types";

// Profile & paths
export {
  DEFAULT_PROFILE,
  resolveInstallPaths,
  desktopEntryId,
  type PathOverrides,
} from "./profile";

// Errors
export { StepFailure, toExecutionError } from "./errors";

// Launch
export type { LaunchResult } from "./launch";

// Archive builder, checksums, release packaging
export {
  SENTINEL,
  CHECKSUM_LISTING,
  renderStub,
  writeContainer,
  parseContainer,
  computeFileHash,
  parseChecksumListing,
  writeChecksumListing,
  verifyChecksumListing,
  buildSelfExtractingInstaller,
  extractSelfExtractingInstaller,
  buildRelease,
  type ChecksumEntry,
  type ListingVerification,
  type ReleaseFile,
  type ReleaseOptions,
  type ReleaseResult,
} from "./archive";

// Probing
export { PROBED_TOOLS } from "./linux/probe";

// Utilities
export { createLogger, type Logger, type LogLevel } from "./utils/logger";
export {
  createCommandRunner,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from "./utils/command";
export { compareVersions, isAtLeast } from "./utils/version";
