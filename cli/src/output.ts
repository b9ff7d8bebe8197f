/**
 * MITS11 Bootstrap CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, stage lines.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors and ora for spinners.
 *
 * Everything goes to stderr: stdout belongs to the nested installer.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";

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
  dim: chalk.gray,
  bold: chalk.bold,
  product: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.error(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printInfo(msg: string): void {
  console.error(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.error(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.error();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.error(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ Resolved version 5.0.1
 *   ✔ Downloaded package (cached)
 */
export function printStageSuccess(msg: string): void {
  console.error(`  ${symbols.success} ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.error(`  ${symbols.info} ${colors.dim(msg)}`);
}

/**
 * Print a bold header line, e.g.  "Bootstrapping MITS11 (stable)"
 */
export function printHeader(msg: string): void {
  console.error();
  console.error(`  ${colors.bold(msg)}`);
  console.error();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan", stream: process.stderr });
}

// ─── State Badge ────────────────────────────────────────────

const STATE_COLORS: Record<string, chalk.Chalk> = {
  PENDING: chalk.gray,
  VALIDATING: chalk.cyan,
  DETECTING: chalk.cyan,
  RESOLVING: chalk.cyan,
  FETCHING_MANIFEST: chalk.cyan,
  DOWNLOADING: chalk.blue,
  VERIFYING: chalk.blue,
  EXTRACTING: chalk.blue,
  LAUNCHING: chalk.yellow,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
};

/** Human-friendly state labels */
const STATE_LABELS: Record<string, string> = {
  PENDING: "Starting",
  VALIDATING: "Validating",
  DETECTING: "Detecting platform",
  RESOLVING: "Resolving version",
  FETCHING_MANIFEST: "Fetching manifest",
  DOWNLOADING: "Downloading",
  VERIFYING: "Verifying",
  EXTRACTING: "Extracting",
  LAUNCHING: "Running installer",
  COMPLETED: "Done",
  FAILED: "Failed",
};

export function formatState(state: string): string {
  const colorFn = STATE_COLORS[state] || chalk.white;
  return colorFn(STATE_LABELS[state] || state);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  VALIDATION_ERROR: "Invalid target",
  ENVIRONMENT_ERROR: "Unsupported platform",
  NETWORK_ERROR: "Network or download failure",
  INTEGRITY_ERROR: "File integrity check failed",
  PACKAGING_ERROR: "Malformed release package",
  ELEVATION_ERROR: "Could not run with administrator privileges",
  EXECUTION_ERROR: "Installer execution failed",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
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
