/**
 * MITS11 Bootstrap Engine — Archive Extraction
 *
 * Unpacks a verified zip archive into the run's temporary directory.
 * Unix file modes stored in the archive are preserved so shell installers
 * stay executable.
 */

import yauzl from "yauzl";
import * as fs from "fs";
import * as path from "path";
import { pipeline } from "stream/promises";
import { PackagingError, errorMessage } from "./errors";

export interface ArchiveExtractor {
  /**
   * Extract an archive to a destination directory.
   *
   * @param archivePath - Path to the archive file
   * @param destDir - Directory to extract to (created if missing)
   * @throws PackagingError on extraction failure
   */
  extract(archivePath: string, destDir: string): Promise<void>;
}

export class ZipExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await this.extractZip(archivePath, path.resolve(destDir));
    } catch (error) {
      if (error instanceof PackagingError) {
        throw error;
      }
      throw new PackagingError(
        `Failed to extract ${archivePath}: ${errorMessage(error)}`,
        "EXTRACTION_FAILED",
      );
    }
  }

  private extractZip(archivePath: string, destDir: string): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
        if (err || !zipfile) {
          reject(
            new PackagingError(
              `Invalid or corrupt zip archive at ${archivePath}: ${errorMessage(err)}`,
              "INVALID_ARCHIVE",
            ),
          );
          return;
        }

        const fail = (error: unknown) => {
          zipfile.close();
          reject(error);
        };

        zipfile.on("entry", (entry: yauzl.Entry) => {
          const entryPath = path.resolve(destDir, entry.fileName);

          if (!entryPath.startsWith(destDir + path.sep)) {
            fail(
              new PackagingError(
                `Path traversal detected in archive: ${entry.fileName}`,
                "INVALID_ARCHIVE",
              ),
            );
            return;
          }

          if (entry.fileName.endsWith("/")) {
            fs.promises
              .mkdir(entryPath, { recursive: true })
              .then(() => zipfile.readEntry())
              .catch(fail);
            return;
          }

          fs.promises
            .mkdir(path.dirname(entryPath), { recursive: true })
            .then(() => {
              zipfile.openReadStream(entry, (streamErr, readStream) => {
                if (streamErr || !readStream) {
                  fail(
                    new PackagingError(
                      `Failed to read entry ${entry.fileName}: ${errorMessage(streamErr)}`,
                      "EXTRACTION_FAILED",
                    ),
                  );
                  return;
                }

                pipeline(readStream, fs.createWriteStream(entryPath))
                  .then(async () => {
                    // Unix mode lives in the upper 16 bits of the external attributes
                    const mode = (entry.externalFileAttributes >>> 16) & 0o777;
                    if (mode !== 0) {
                      await fs.promises.chmod(entryPath, mode);
                    }
                  })
                  .then(() => zipfile.readEntry())
                  .catch(fail);
              });
            })
            .catch(fail);
        });

        zipfile.on("end", () => resolve());
        zipfile.on("error", (zipErr: Error) => {
          reject(
            new PackagingError(`Error reading zip archive: ${zipErr.message}`, "EXTRACTION_FAILED"),
          );
        });

        zipfile.readEntry();
      });
    });
  }
}
