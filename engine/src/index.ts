/**
 * MITS11 Bootstrap Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

// Orchestrator
export { Bootstrapper, type BootstrapDeps } from "./bootstrap";

// All types
export type {
  OsToken,
  ArchToken,
  PlatformId,
  Platform,
  Channel,
  PointerName,
  Target,
  PlatformEntry,
  ManifestParserKind,
  ManifestParserPreference,
  BootstrapConfig,
  BootstrapState,
  ErrorCategory,
  BootstrapFailure,
  BootstrapResult,
  RunOptions,
  BootstrapEventType,
  StateChangeData,
  ProgressData,
  BootstrapEvent,
  BootstrapEventHandler,
} from "./types";

// Configuration
export {
  DEFAULT_BASE_URL,
  BOOTSTRAP_HOME,
  DEFAULTS,
  ENV,
  isTruthyEnv,
  resolveConfig,
} from "./config";

// Errors
export {
  BootstrapError,
  ValidationError,
  EnvironmentError,
  NetworkError,
  ManifestError,
  IntegrityError,
  PackagingError,
  ElevationError,
  InstallerExitError,
  errorMessage,
} from "./errors";

// Pipeline stages (for advanced usage and testing)
export { detectPlatform, readHostInfo, type HostInfo } from "./platform";
export {
  parseTarget,
  resolveVersion,
  pointerUrl,
  isExplicitVersion,
  normalizeVersion,
  EXPLICIT_VERSION_PATTERN,
} from "./version";
export {
  StructuredManifestParser,
  PatternManifestParser,
  selectManifestParser,
  fetchPlatformEntry,
  manifestUrl,
  type ManifestParser,
} from "./manifest";
export {
  HttpTransport,
  downloadFile,
  fetchText,
  type Transport,
  type HttpOptions,
  type DownloadProgress,
  type DownloadResult,
  type ProgressCallback,
} from "./downloader";
export {
  computeFileHash,
  verifyChecksum,
  normalizeSha256,
  SHA256_PATTERN,
  type VerificationResult,
} from "./verifier";
export {
  ArtifactCache,
  cacheFileName,
  type CacheKey,
  type AcquireResult,
} from "./cache";
export { ZipExtractor, type ArchiveExtractor } from "./extractor";
export { locateInstaller, INSTALLER_LAYOUTS, type InstallerLayout } from "./locator";
export { CleanupManager, type CleanupOptions } from "./cleanup";
export * from "./launch";

// Utilities
export { createLogger, type Logger, type LogLevel } from "./utils/logger";
