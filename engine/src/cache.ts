/**
 * MITS11 Bootstrap Engine — Content-Addressed Artifact Cache
 *
 * Idempotent artifact acquisition:
 * 1. If the cache file exists and its SHA-256 matches → reuse it
 * 2. If it exists but mismatches → delete it and download once
 * 3. A fresh download is hashed before it is moved into place; on
 *    mismatch it is deleted and the run fails. There is no second attempt.
 *
 * The manifest hash is the cache address: there is no expiry.
 */

import * as fs from "fs";
import * as path from "path";
import { Logger } from "./utils/logger";
import { normalizeSha256, verifyChecksum } from "./verifier";
import { ProgressCallback, Transport } from "./downloader";
import { BootstrapError, IntegrityError, NetworkError, errorMessage } from "./errors";
import { PlatformEntry, PlatformId } from "./types";

export interface CacheKey {
  version: string;
  platform: PlatformId;
}

export interface AcquireResult {
  /** Absolute path to the verified archive */
  filePath: string;
  /** Whether a valid cached copy was reused */
  cacheHit: boolean;
  /** Bytes downloaded (0 on a hit) */
  bytesDownloaded: number;
}

export interface ArtifactCacheOptions {
  cacheDir: string;
  productName: string;
  transport: Transport;
  logger: Logger;
}

/**
 * Deterministic cache file name for a (version, platform) pair.
 * Characters that are unsafe in file names are replaced with "_".
 */
export function cacheFileName(productName: string, key: CacheKey): string {
  const safeVersion = key.version.replace(/[^A-Za-z0-9._+-]/g, "_");
  return `${productName}-${safeVersion}-${key.platform}.zip`;
}

export class ArtifactCache {
  private readonly opts: ArtifactCacheOptions;

  constructor(opts: ArtifactCacheOptions) {
    this.opts = opts;
  }

  pathFor(key: CacheKey): string {
    return path.join(this.opts.cacheDir, cacheFileName(this.opts.productName, key));
  }

  /**
   * Check the cached file for `expected`. A file that fails the check,
   * or cannot be hashed, is deleted.
   *
   * @returns true on a cache hit
   */
  async evaluate(filePath: string, expected: string): Promise<boolean> {
    const { logger } = this.opts;
    if (!fs.existsSync(filePath)) {
      logger.debug({ path: filePath }, "Artifact not cached - download needed");
      return false;
    }

    try {
      const check = await verifyChecksum(filePath, expected);
      if (check.valid) {
        logger.info(
          { path: filePath, sha256: check.actual },
          "Cached artifact checksum matches - skipping download",
        );
        return true;
      }
      logger.warn(
        { path: filePath, expected, actual: check.actual },
        "Cached artifact checksum mismatch - will redownload",
      );
    } catch (err: unknown) {
      logger.warn(
        { path: filePath, error: errorMessage(err) },
        "Failed to hash cached artifact - will redownload",
      );
    }

    await fs.promises.rm(filePath, { force: true });
    return false;
  }

  /**
   * Return a path to an archive whose bytes match `entry.sha256`.
   */
  async acquire(
    entry: PlatformEntry,
    key: CacheKey,
    onProgress?: ProgressCallback,
  ): Promise<AcquireResult> {
    const { logger, transport } = this.opts;
    const expected = normalizeSha256(entry.sha256);
    const filePath = this.pathFor(key);

    await fs.promises.mkdir(this.opts.cacheDir, { recursive: true });

    if (await this.evaluate(filePath, expected)) {
      return { filePath, cacheHit: true, bytesDownloaded: 0 };
    }

    // Process-unique name: concurrent runs never write the same file
    const partPath = `${filePath}.${process.pid}.part`;
    let bytesDownloaded: number;
    try {
      const result = await transport.download(entry.url, partPath, onProgress);
      bytesDownloaded = result.bytes_downloaded;
    } catch (err: unknown) {
      await fs.promises.rm(partPath, { force: true });
      if (err instanceof BootstrapError) throw err;
      throw new NetworkError(
        `Failed to download ${entry.url}: ${errorMessage(err)}`,
        "REQUEST_FAILED",
      );
    }

    const check = await verifyChecksum(partPath, expected);
    if (!check.valid) {
      await fs.promises.rm(partPath, { force: true });
      logger.error(
        { url: entry.url, expected, actual: check.actual },
        "Downloaded artifact checksum MISMATCH",
      );
      throw new IntegrityError(
        `Checksum verification failed for ${entry.url}: expected ${expected}, got ${check.actual}`,
      );
    }

    await fs.promises.rename(partPath, filePath);
    logger.info(
      { path: filePath, sha256: check.actual, bytes: bytesDownloaded },
      "Download complete - checksum verified",
    );

    return { filePath, cacheHit: false, bytesDownloaded };
  }

  /** Drop the cached artifact for `key`, if present. */
  async remove(key: CacheKey): Promise<void> {
    const filePath = this.pathFor(key);
    await fs.promises.rm(filePath, { force: true });
    this.opts.logger.debug({ path: filePath }, "Removed cached artifact");
  }
}
