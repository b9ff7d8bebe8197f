/**
 * MITS11 Bootstrap Engine — Privilege Detection
 *
 * Every supported OS separates administrator/root from regular users, so
 * the only question is whether this process already holds the privilege.
 */

import { exec } from "child_process";
import { promisify } from "util";
import { Logger } from "../utils/logger";
import { OsToken } from "../types";

const execAsync = promisify(exec);

export interface PrivilegeProbe {
  isPrivileged(os: OsToken): Promise<boolean>;
}

export class SystemPrivilegeProbe implements PrivilegeProbe {
  constructor(private readonly logger: Logger) {}

  async isPrivileged(os: OsToken): Promise<boolean> {
    if (os === "win") {
      return this.isWindowsAdmin();
    }
    const uid = typeof process.geteuid === "function" ? process.geteuid() : undefined;
    const privileged = uid === 0;
    this.logger.debug({ uid, privileged }, "Checked effective uid");
    return privileged;
  }

  /**
   * `net session` succeeds only when the process runs elevated.
   */
  private async isWindowsAdmin(): Promise<boolean> {
    try {
      await execAsync("net session", { windowsHide: true, timeout: 5000 });
      this.logger.debug("Process is running elevated (admin)");
      return true;
    } catch {
      this.logger.debug("Process is NOT running elevated");
      return false;
    }
  }
}
