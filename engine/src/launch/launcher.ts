/**
 * MITS11 Bootstrap Engine — Elevation & Launch Controller
 *
 * State machine:
 *
 *   CHECKING ──privileged──────────▶ RUNNING_DIRECT ──▶ SUCCEEDED | FAILED
 *      │
 *      └──not privileged──▶ ELEVATING ──▶ AWAITING_SENTINEL ──▶ SUCCEEDED | FAILED
 *
 * Privilege is re-checked inside launch(), right before the installer
 * runs, even when the caller checked earlier: elevation prompts can be
 * dismissed and privileges can change between the two points.
 */

import * as fs from "fs";
import * as path from "path";
import { Logger } from "../utils/logger";
import { InstallerExitError, errorMessage } from "../errors";
import { OsToken } from "../types";
import { PrivilegeProbe } from "./privilege";
import { DirectRunner, ElevatedRunner } from "./runners";
import { SENTINEL_FILENAME, buildWrapperScript, waitForSentinel } from "./sentinel";

export type LaunchState =
  | "IDLE"
  | "CHECKING"
  | "RUNNING_DIRECT"
  | "ELEVATING"
  | "AWAITING_SENTINEL"
  | "SUCCEEDED"
  | "FAILED";

export interface LaunchRequest {
  installerPath: string;
  os: OsToken;
  /** Extra arguments for the installer (silent flags) */
  args: string[];
  silent: boolean;
  /** Private directory for the wrapper script and sentinel */
  workDir: string;
}

export interface LaunchOutcome {
  exitCode: number;
  elevated: boolean;
}

export interface InstallerLauncherOptions {
  privilege: PrivilegeProbe;
  direct: DirectRunner;
  elevated: ElevatedRunner;
  logger: Logger;
  /** When false the installer always runs directly */
  elevate: boolean;
  pollIntervalMs: number;
  timeoutMs: number;
  onStateChange?: (state: LaunchState) => void;
  /** Called once the elevated process has been requested */
  onElevationRequested?: (sentinelPath: string) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class InstallerLauncher {
  private readonly opts: InstallerLauncherOptions;
  private current: LaunchState = "IDLE";

  constructor(opts: InstallerLauncherOptions) {
    this.opts = opts;
  }

  get state(): LaunchState {
    return this.current;
  }

  /**
   * Whether running the installer on `os` would need elevation right now.
   */
  async needsElevation(os: OsToken): Promise<boolean> {
    if (!this.opts.elevate) return false;
    return !(await this.opts.privilege.isPrivileged(os));
  }

  /**
   * Run the installer, elevating when required.
   *
   * @throws InstallerExitError when the installer exits non-zero
   * @throws ElevationError when elevation is denied, times out or the
   *         sentinel cannot be read
   */
  async launch(request: LaunchRequest): Promise<LaunchOutcome> {
    this.transition("CHECKING");

    try {
      const elevate = await this.needsElevation(request.os);
      const exitCode = elevate
        ? await this.runElevated(request)
        : await this.runDirect(request);

      if (exitCode !== 0) {
        throw new InstallerExitError(exitCode);
      }

      this.transition("SUCCEEDED");
      return { exitCode, elevated: elevate };
    } catch (err: unknown) {
      this.transition("FAILED");
      throw err;
    }
  }

  private transition(state: LaunchState): void {
    this.current = state;
    this.opts.logger.debug({ state }, "Launch state");
    this.opts.onStateChange?.(state);
  }

  private async runDirect(request: LaunchRequest): Promise<number> {
    this.transition("RUNNING_DIRECT");
    try {
      return await this.opts.direct.run({
        installerPath: request.installerPath,
        args: request.args,
        os: request.os,
        silent: request.silent,
      });
    } catch (err: unknown) {
      throw new InstallerExitError(-1, `Failed to launch installer: ${errorMessage(err)}`);
    }
  }

  private async runElevated(request: LaunchRequest): Promise<number> {
    this.transition("ELEVATING");
    const { logger } = this.opts;

    const sentinelPath = path.join(request.workDir, SENTINEL_FILENAME);
    await fs.promises.rm(sentinelPath, { force: true });

    const wrapper = buildWrapperScript(
      request.os,
      request.installerPath,
      request.args,
      sentinelPath,
    );
    const wrapperPath = path.join(request.workDir, wrapper.fileName);
    await fs.promises.writeFile(wrapperPath, wrapper.content, { mode: 0o755 });

    logger.info({ wrapper: wrapperPath, sentinel: sentinelPath }, "Handing off to elevated process");
    const handle = this.opts.elevated.start({
      os: request.os,
      wrapperPath,
      silent: request.silent,
    });
    this.opts.onElevationRequested?.(sentinelPath);

    this.transition("AWAITING_SENTINEL");
    const exitCode = await waitForSentinel(sentinelPath, {
      intervalMs: this.opts.pollIntervalMs,
      timeoutMs: this.opts.timeoutMs,
      launcherExit: handle.exited,
      sleep: this.opts.sleep,
      now: this.opts.now,
    });

    logger.info({ exitCode }, "Elevated installer finished");
    return exitCode;
  }
}
