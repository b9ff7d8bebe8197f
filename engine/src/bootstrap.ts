/**
 * MITS11 Bootstrap Engine — Orchestrator
 *
 * Runs the whole bootstrap lifecycle:
 *
 *   PENDING → VALIDATING → DETECTING → RESOLVING → FETCHING_MANIFEST →
 *   DOWNLOADING → VERIFYING → EXTRACTING → LAUNCHING → COMPLETED
 *
 * Any failure ends in FAILED. Temporary state is released in a finally
 * block that wraps the entire sequence.
 *
 * The orchestrator has NO UI logic. It communicates via the returned
 * BootstrapResult and event callbacks.
 */

import * as fs from "fs";
import * as path from "path";
import {
  BootstrapConfig,
  BootstrapEvent,
  BootstrapEventHandler,
  BootstrapFailure,
  BootstrapResult,
  BootstrapState,
  ErrorCategory,
  PlatformId,
  RunOptions,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { BootstrapError, InstallerExitError, errorMessage } from "./errors";
import { HttpTransport, Transport } from "./downloader";
import { ArtifactCache, CacheKey } from "./cache";
import { CleanupManager } from "./cleanup";
import { ArchiveExtractor, ZipExtractor } from "./extractor";
import { INSTALLER_LAYOUTS, locateInstaller } from "./locator";
import { HostInfo, detectPlatform } from "./platform";
import { parseTarget, resolveVersion } from "./version";
import { ManifestParser, fetchPlatformEntry, selectManifestParser } from "./manifest";
import {
  DirectRunner,
  ElevatedRunner,
  InstallerLauncher,
  PrivilegeProbe,
  SystemDirectRunner,
  SystemElevatedRunner,
  SystemPrivilegeProbe,
} from "./launch";

/** Collaborators the orchestrator talks to; each has a system default. */
export interface BootstrapDeps {
  logger?: Logger;
  transport?: Transport;
  extractor?: ArchiveExtractor;
  parser?: ManifestParser;
  host?: HostInfo;
  privilege?: PrivilegeProbe;
  direct?: DirectRunner;
  elevated?: ElevatedRunner;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Category for errors that escaped without a BootstrapError wrapper */
const STATE_CATEGORIES: Partial<Record<BootstrapState, ErrorCategory>> = {
  VALIDATING: "VALIDATION_ERROR",
  RESOLVING: "NETWORK_ERROR",
  FETCHING_MANIFEST: "NETWORK_ERROR",
  DOWNLOADING: "NETWORK_ERROR",
  VERIFYING: "INTEGRITY_ERROR",
  EXTRACTING: "PACKAGING_ERROR",
  LAUNCHING: "EXECUTION_ERROR",
};

export class Bootstrapper {
  private readonly config: BootstrapConfig;
  private readonly deps: BootstrapDeps;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly extractor: ArchiveExtractor;
  private readonly parser: ManifestParser;
  private readonly cache: ArtifactCache;
  private eventHandlers: BootstrapEventHandler[] = [];

  constructor(config: BootstrapConfig, deps: BootstrapDeps = {}) {
    this.config = config;
    this.deps = deps;
    this.logger =
      deps.logger ?? createLogger({ level: config.verbose ? "debug" : "silent" });
    this.transport =
      deps.transport ??
      new HttpTransport({
        timeoutMs: config.requestTimeoutMs,
        allowInsecureHttp: config.allowInsecureHttp,
        logger: this.logger,
      });
    this.extractor = deps.extractor ?? new ZipExtractor();
    // Chosen once, at startup
    this.parser = deps.parser ?? selectManifestParser(config.manifestParser, this.logger);
    this.cache = new ArtifactCache({
      cacheDir: config.cacheDir,
      productName: config.productName,
      transport: this.transport,
      logger: this.logger,
    });
  }

  get manifestParser(): ManifestParser {
    return this.parser;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this to render progress.
   */
  on(handler: BootstrapEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: BootstrapEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // A broken handler must not abort the run
        this.logger.debug({ error: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  private emitStateChange(state: BootstrapState, message?: string): void {
    this.emit({
      type: "state_change",
      timestamp: new Date().toISOString(),
      data: { state, message },
    });
  }

  // ─── Core: Run ───────────────────────────────────────────────

  async run(options: RunOptions = {}): Promise<BootstrapResult> {
    const targetInput = options.target ?? "";
    const silent = options.silent ?? false;
    const startedAt = new Date().toISOString();

    let state: BootstrapState = "PENDING";
    let version: string | undefined;
    let platformId: PlatformId | undefined;
    let cacheKey: CacheKey | undefined;
    let cacheHit = false;
    let elevationRequested = false;
    let keptPaths: string[] = [];

    const enter = (next: BootstrapState, message?: string) => {
      state = next;
      this.emitStateChange(next, message);
    };

    const finish = (
      exitCode: number,
      extra: Partial<BootstrapResult> = {},
    ): BootstrapResult => ({
      final_state: exitCode === 0 && !extra.error ? "COMPLETED" : "FAILED",
      exit_code: exitCode,
      target: targetInput || "stable",
      version,
      platform: platformId,
      cache_hit: cacheHit,
      elevated: elevationRequested,
      kept_paths: keptPaths,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
      ...extra,
    });

    const cleanup = new CleanupManager({
      keepTemp: this.config.keepTemp,
      logger: this.logger,
      tempRoot: this.config.tempRoot,
    });
    const removeSignalHandlers = options.handleSignals
      ? cleanup.installSignalHandlers()
      : undefined;

    enter("PENDING");
    this.logger.info({ target: targetInput, silent }, "Starting bootstrap");

    try {
      // ─── VALIDATING ───
      enter("VALIDATING");
      const target = parseTarget(targetInput);

      // ─── DETECTING ───
      enter("DETECTING");
      const platform = detectPlatform(this.deps.host);
      platformId = platform.id;
      const layout = INSTALLER_LAYOUTS[platform.os];

      const launcher = new InstallerLauncher({
        privilege: this.deps.privilege ?? new SystemPrivilegeProbe(this.logger),
        direct: this.deps.direct ?? new SystemDirectRunner({ logger: this.logger }),
        elevated: this.deps.elevated ?? new SystemElevatedRunner({ logger: this.logger }),
        logger: this.logger,
        elevate: this.config.elevate,
        pollIntervalMs: this.config.pollIntervalMs,
        timeoutMs: this.config.elevationTimeoutMs,
        sleep: this.deps.sleep,
        now: this.deps.now,
        onElevationRequested: (sentinel) => {
          elevationRequested = true;
          this.emit({
            type: "elevation_required",
            timestamp: new Date().toISOString(),
            data: { sentinel },
          });
        },
      });

      if (await launcher.needsElevation(platform.os)) {
        this.logger.info({ platform: platform.id }, "Installer will need elevation");
      }
      enter("DETECTING", platform.id);

      // ─── RESOLVING ───
      enter("RESOLVING");
      version = await resolveVersion(
        target,
        this.config.baseUrl,
        this.transport,
        this.logger,
      );
      enter("RESOLVING", version);

      // ─── FETCHING_MANIFEST ───
      enter("FETCHING_MANIFEST");
      const entry = await fetchPlatformEntry(version, platform.id, {
        baseUrl: this.config.baseUrl,
        transport: this.transport,
        parser: this.parser,
        logger: this.logger,
      });

      // ─── DOWNLOADING + VERIFYING ───
      enter("DOWNLOADING");
      cacheKey = { version, platform: platform.id };
      const acquired = await this.cache.acquire(entry, cacheKey, (progress) => {
        this.emit({
          type: "progress",
          timestamp: new Date().toISOString(),
          data: progress,
        });
      });
      cacheHit = acquired.cacheHit;
      if (cacheHit) {
        this.emit({
          type: "cache_hit",
          timestamp: new Date().toISOString(),
          data: { path: acquired.filePath },
        });
      }

      // The cache only returns bytes that matched the manifest hash
      enter("VERIFYING", entry.sha256);

      // ─── EXTRACTING ───
      enter("EXTRACTING");
      const workDir = cleanup.createTempDir(`${this.config.productName}-bootstrap-`);
      const extractRoot = path.join(workDir, "extract");
      await this.extractor.extract(acquired.filePath, extractRoot);
      const installerPath = locateInstaller(extractRoot, layout.relativePath);
      if (platform.os !== "win") {
        await fs.promises.chmod(installerPath, 0o755);
      }
      enter("EXTRACTING", installerPath);

      // ─── LAUNCHING ───
      enter("LAUNCHING");
      const outcome = await launcher.launch({
        installerPath,
        os: platform.os,
        args: silent ? layout.silentArgs : [],
        silent,
        workDir,
      });

      enter("COMPLETED");
      this.logger.info({ version, platform: platform.id }, "Bootstrap completed");
      keptPaths = this.config.keepTemp ? cleanup.paths : [];
      return finish(0, { installer_exit_code: outcome.exitCode });
    } catch (err: unknown) {
      keptPaths = this.config.keepTemp ? cleanup.paths : [];
      return this.fail(err, state, finish);
    } finally {
      removeSignalHandlers?.();
      await cleanup.dispose();
      // The elevated child works from the extracted tree; the archive is no longer needed
      if (elevationRequested && cacheKey) {
        await this.cache.remove(cacheKey);
      }
    }
  }

  private fail(
    err: unknown,
    failedState: BootstrapState,
    finish: (exitCode: number, extra?: Partial<BootstrapResult>) => BootstrapResult,
  ): BootstrapResult {
    const failure: BootstrapFailure =
      err instanceof BootstrapError
        ? {
            category: err.category,
            code: err.code,
            message: err.message,
            state: failedState,
          }
        : {
            category: STATE_CATEGORIES[failedState] ?? "ENVIRONMENT_ERROR",
            code: "UNEXPECTED",
            message: errorMessage(err),
            state: failedState,
          };

    this.logger.error(
      { state: failedState, category: failure.category, error: failure.message },
      "Bootstrap failed",
    );
    this.emitStateChange("FAILED", failure.message);

    const exitCode = err instanceof BootstrapError ? err.exitCode : 1;
    return finish(exitCode, {
      error: failure,
      installer_exit_code:
        err instanceof InstallerExitError && err.installerExitCode >= 0
          ? err.installerExitCode
          : undefined,
    });
  }
}
