/**
 * MITS11 Bootstrap Engine — Temporary State Cleanup
 *
 * Owns every ephemeral path a run creates (temp dir, extracted tree,
 * wrapper script, sentinel) and removes them on all exit paths: normal
 * completion, failure, and SIGINT/SIGTERM/SIGHUP. With keepTemp set the
 * paths are left in place and logged for post-mortem inspection.
 *
 * The cached artifact is deliberately never registered here.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Logger } from "./utils/logger";
import { errorMessage } from "./errors";

export interface CleanupOptions {
  keepTemp: boolean;
  logger: Logger;
  /** Parent directory for temp dirs (defaults to the OS temp dir) */
  tempRoot?: string;
}

const HANDLED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

export class CleanupManager {
  private readonly opts: CleanupOptions;
  private readonly tracked = new Set<string>();
  private disposed = false;

  constructor(opts: CleanupOptions) {
    this.opts = opts;
  }

  /** Paths currently scheduled for removal */
  get paths(): string[] {
    return Array.from(this.tracked);
  }

  /**
   * Create a process-unique directory under the temp root and track it.
   */
  createTempDir(prefix: string): string {
    const root = this.opts.tempRoot ?? os.tmpdir();
    fs.mkdirSync(root, { recursive: true });
    const dir = fs.mkdtempSync(path.join(root, prefix));
    this.track(dir);
    return dir;
  }

  track(target: string): void {
    this.tracked.add(target);
  }

  async dispose(): Promise<void> {
    if (!this.beginDispose()) return;
    for (const target of this.tracked) {
      try {
        await fs.promises.rm(target, { recursive: true, force: true });
        this.opts.logger.debug({ path: target }, "Removed temporary path");
      } catch (err: unknown) {
        this.opts.logger.warn(
          { path: target, error: errorMessage(err) },
          "Failed to remove temporary path",
        );
      }
    }
    this.tracked.clear();
  }

  /** Synchronous variant for signal handlers, where awaiting is not possible. */
  disposeSync(): void {
    if (!this.beginDispose()) return;
    for (const target of this.tracked) {
      try {
        fs.rmSync(target, { recursive: true, force: true });
      } catch (err: unknown) {
        this.opts.logger.warn(
          { path: target, error: errorMessage(err) },
          "Failed to remove temporary path",
        );
      }
    }
    this.tracked.clear();
  }

  /**
   * Remove tracked paths and exit when the process is interrupted.
   *
   * @returns A function that uninstalls the handlers
   */
  installSignalHandlers(exit: (code: number) => void = process.exit): () => void {
    const handlers = HANDLED_SIGNALS.map((signal) => {
      const handler = () => {
        this.opts.logger.warn({ signal }, "Interrupted - cleaning up");
        this.disposeSync();
        exit(128 + (os.constants.signals[signal] ?? 0));
      };
      process.once(signal, handler);
      return { signal, handler };
    });

    return () => {
      for (const { signal, handler } of handlers) {
        process.removeListener(signal, handler);
      }
    };
  }

  /** Returns false when there is nothing to do (already disposed, or keepTemp). */
  private beginDispose(): boolean {
    if (this.disposed) return false;
    this.disposed = true;

    if (this.opts.keepTemp) {
      if (this.tracked.size > 0) {
        this.opts.logger.info(
          { paths: Array.from(this.tracked) },
          "Keeping temporary state (keep-temp override set)",
        );
      }
      return false;
    }
    return true;
  }
}
