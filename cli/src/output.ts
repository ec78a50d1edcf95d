/**
 * flakedesk CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module; the engine itself
 * never prints.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type {
  ErrorCategory,
  StepOutcome,
  StepPlan,
  UninstallAction,
} from "@flakedesk/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols ────────────────────────────────────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
  bullet: chalk.gray("\u2022"), // •
  dash: chalk.gray("\u2500"), // ─
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

export function printBullet(msg: string): void {
  console.log(`  ${symbols.bullet} ${msg}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ Development tools
 *   ✔ Node.js (already installed)
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printStageWarn(msg: string): void {
  console.log(`  ${symbols.warn}  ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

// ─── Header / Banner ────────────────────────────────────────

/**
 * Print a bold header line, e.g.  "Claude Desktop Installer"
 */
export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

export interface TableOptions {
  head: string[];
  rows: string[][];
  colWidths?: number[];
}

export function printTable({ head, rows, colWidths }: TableOptions): void {
  const tableOpts: Table.TableConstructorOptions = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ["gray"] },
    wordWrap: false,
  };
  if (colWidths) {
    tableOpts.colWidths = colWidths;
  }
  const table = new Table(tableOpts);
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}

// ─── Step Outcomes ──────────────────────────────────────────

/**
 * One-line description of a finished step (without the symbol).
 */
export function formatOutcome(outcome: StepOutcome): string {
  switch (outcome.status) {
    case "done":
      return outcome.message ? `${outcome.title}: ${outcome.message}` : outcome.title;
    case "already_satisfied":
      return `${outcome.title} (already done)`;
    case "skipped":
      return `${outcome.title} skipped${outcome.message ? `: ${outcome.message}` : ""}`;
    case "warned":
      return `${outcome.title}: ${outcome.message ?? "completed with warnings"}`;
  }
}

export function printOutcome(outcome: StepOutcome): void {
  const line = formatOutcome(outcome);
  switch (outcome.status) {
    case "done":
    case "already_satisfied":
      printStageSuccess(line);
      break;
    case "skipped":
      printStageInfo(line);
      break;
    case "warned":
      printStageWarn(line);
      break;
  }
}

const PLAN_LABELS: Record<StepPlan["state"], string> = {
  satisfied: "done",
  pending: "to do",
  skipped: "skipped",
};

export function formatPlanState(state: StepPlan["state"]): string {
  const label = PLAN_LABELS[state];
  if (state === "satisfied") return colors.success(label);
  if (state === "pending") return colors.warn(label);
  return colors.dim(label);
}

/**
 * One-line description of an uninstall action, or null when there is
 * nothing worth showing (an absent target).
 */
export function formatAction(action: UninstallAction): string | null {
  switch (action.status) {
    case "removed":
      return `Removed ${action.target}${action.message ? ` (${action.message})` : ""}`;
    case "reset":
      return `Reset permissions on ${action.target}`;
    case "failed":
      return `Could not remove ${action.target}${action.message ? `: ${action.message}` : ""}`;
    case "absent":
      return null;
  }
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  PREFLIGHT_ERROR: "System requirements not met",
  PERMISSION_ERROR: "Insufficient permissions",
  PACKAGE_ERROR: "Package installation failed",
  PROVISION_ERROR: "Application build failed",
  SANDBOX_ERROR: "Sandbox setup failed",
  INTEGRATION_ERROR: "Desktop integration failed",
  ARCHIVE_ERROR: "Archive error",
  CONFIG_ERROR: "Invalid configuration",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
