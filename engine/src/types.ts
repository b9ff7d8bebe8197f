/**
 * MITS11 Bootstrap Engine — Core Type Definitions
 *
 * Shared by every stage of the bootstrap pipeline and re-exported for the CLI.
 */

// ─── Platform ────────────────────────────────────────────────────

export type OsToken = "linux" | "osx" | "win";
export type ArchToken = "x64" | "arm64";
export type PlatformId = `${OsToken}-${ArchToken}`;

export interface Platform {
  os: OsToken;
  arch: ArchToken;
  id: PlatformId;
}

// ─── Targets & Versions ──────────────────────────────────────────

export type Channel = "stable" | "latest" | "alpha" | "nightly";

/** Name of the pointer resource each channel is read from */
export type PointerName = "stable" | "alpha" | "nightly";

export type Target =
  | { kind: "channel"; channel: Channel; raw: string }
  | { kind: "explicit"; version: string; raw: string };

// ─── Manifest ────────────────────────────────────────────────────

export interface PlatformEntry {
  url: string;
  /** Lower-case hex SHA-256 of the artifact */
  sha256: string;
}

export type ManifestParserKind = "structured" | "pattern";
export type ManifestParserPreference = ManifestParserKind | "auto";

// ─── Configuration ───────────────────────────────────────────────

export interface BootstrapConfig {
  /** Release endpoint serving channel pointers and manifests */
  baseUrl: string;
  /** Directory holding content-addressed artifacts */
  cacheDir: string;
  /** Parent of the per-run temporary directory */
  tempRoot: string;
  /** Retain temporary state at exit */
  keepTemp: boolean;
  /** Used in cache file names and messages */
  productName: string;
  manifestParser: ManifestParserPreference;
  /** Re-launch the installer elevated when the process lacks privileges */
  elevate: boolean;
  pollIntervalMs: number;
  elevationTimeoutMs: number;
  requestTimeoutMs: number;
  /** Permit plain http:// URLs (local test servers only) */
  allowInsecureHttp: boolean;
  verbose: boolean;
}

// ─── Execution Lifecycle ─────────────────────────────────────────

export type BootstrapState =
  | "PENDING"
  | "VALIDATING"
  | "DETECTING"
  | "RESOLVING"
  | "FETCHING_MANIFEST"
  | "DOWNLOADING"
  | "VERIFYING"
  | "EXTRACTING"
  | "LAUNCHING"
  | "COMPLETED"
  | "FAILED";

export type ErrorCategory =
  | "VALIDATION_ERROR"
  | "ENVIRONMENT_ERROR"
  | "NETWORK_ERROR"
  | "INTEGRITY_ERROR"
  | "PACKAGING_ERROR"
  | "ELEVATION_ERROR"
  | "EXECUTION_ERROR";

export interface BootstrapFailure {
  category: ErrorCategory;
  code: string;
  message: string;
  state: BootstrapState;
}

export interface BootstrapResult {
  final_state: "COMPLETED" | "FAILED";
  exit_code: number;
  target: string;
  version?: string;
  platform?: PlatformId;
  cache_hit: boolean;
  elevated: boolean;
  /** Exit code reported by the nested installer, when it ran to completion */
  installer_exit_code?: number;
  /** Temporary paths left in place because of the keep-temp override */
  kept_paths: string[];
  started_at: string;
  finished_at: string;
  error?: BootstrapFailure;
}

export interface RunOptions {
  /** Channel name or explicit version; empty means stable */
  target?: string;
  /** Run the nested installer non-interactively */
  silent?: boolean;
  /** Clean up and exit on SIGINT/SIGTERM/SIGHUP (CLI runs) */
  handleSignals?: boolean;
}

// ─── Events ──────────────────────────────────────────────────────

export type BootstrapEventType =
  | "state_change"
  | "progress"
  | "cache_hit"
  | "elevation_required";

export interface StateChangeData {
  state: BootstrapState;
  message?: string;
}

export interface ProgressData {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export type BootstrapEvent =
  | { type: "state_change"; timestamp: string; data: StateChangeData }
  | { type: "progress"; timestamp: string; data: ProgressData }
  | { type: "cache_hit"; timestamp: string; data: { path: string } }
  | { type: "elevation_required"; timestamp: string; data: { sentinel: string } };

export type BootstrapEventHandler = (event: BootstrapEvent) => void;
