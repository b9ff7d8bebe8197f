/**
 * MITS11 Bootstrap Engine — Nested Installer Locator
 *
 * Finds the installer the release archive ships. Exactly one file may
 * match; an archive with several candidates is rejected rather than
 * silently picking one.
 */

import * as fs from "fs";
import * as path from "path";
import { PackagingError } from "./errors";
import { OsToken } from "./types";

export interface InstallerLayout {
  /** Path of the installer relative to any directory in the archive */
  relativePath: string;
  /** Arguments appended for non-interactive runs */
  silentArgs: string[];
}

export const INSTALLER_LAYOUTS: Record<OsToken, InstallerLayout> = {
  linux: { relativePath: "script/install.sh", silentArgs: ["--silent"] },
  osx: { relativePath: "script/install.sh", silentArgs: ["--silent"] },
  win: { relativePath: "script/install.cmd", silentArgs: ["--silent"] },
};

/**
 * Recursively collect all file paths under `dir`, sorted for a
 * deterministic walk order.
 */
export function collectFiles(dir: string): string[] {
  const files: string[] = [];

  const walk = (current: string) => {
    const entries = fs
      .readdirSync(current, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  };

  walk(dir);
  return files;
}

function matchesLayout(root: string, filePath: string, relativePath: string): boolean {
  const relative = path.relative(root, filePath).split(path.sep).join("/");
  return relative === relativePath || relative.endsWith(`/${relativePath}`);
}

/**
 * Locate the single nested installer under `root`.
 *
 * @throws PackagingError when none or more than one file matches
 */
export function locateInstaller(root: string, relativePath: string): string {
  const matches = collectFiles(root).filter((file) =>
    matchesLayout(root, file, relativePath),
  );

  if (matches.length === 0) {
    throw new PackagingError(
      `Installer not found in package (expected ${relativePath})`,
      "INSTALLER_NOT_FOUND",
    );
  }
  if (matches.length > 1) {
    const listed = matches.map((m) => path.relative(root, m)).join(", ");
    throw new PackagingError(
      `Ambiguous package: ${matches.length} installers match ${relativePath} (${listed})`,
      "INSTALLER_AMBIGUOUS",
    );
  }
  return matches[0];
}
