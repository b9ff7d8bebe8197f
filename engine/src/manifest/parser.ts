/**
 * MITS11 Bootstrap Engine — Manifest Parser Interface
 *
 * Two backends read the same document:
 *   - structured: JSON.parse + zod schema
 *   - pattern:    bracket-balanced scanning of whitespace-normalized text
 *
 * Both hand their raw findings to toPlatformEntry(), so field validation
 * and error messages are identical whichever backend runs.
 */

import { ManifestError } from "../errors";
import { SHA256_PATTERN } from "../verifier";
import { ManifestParserKind, PlatformEntry, PlatformId } from "../types";

export interface ManifestParser {
  readonly kind: ManifestParserKind;

  /**
   * Extract the {url, sha256} entry for `platform`.
   *
   * @param json - Raw manifest body
   * @param version - Only used in error messages
   * @throws ManifestError
   */
  readPlatformEntry(json: string, platform: PlatformId, version: string): PlatformEntry;
}

/** What a backend found inside the platform object; non-strings are undefined */
export interface RawEntryFields {
  url: string | undefined;
  sha256: string | undefined;
}

export function malformedManifest(version: string, detail: string): ManifestError {
  return new ManifestError(`Malformed manifest for version ${version}: ${detail}`, "MALFORMED");
}

export function platformMissing(platform: PlatformId, version: string): ManifestError {
  return new ManifestError(
    `Platform ${platform} not found in manifest for version ${version}`,
    "PLATFORM_MISSING",
  );
}

export function toPlatformEntry(
  fields: RawEntryFields,
  platform: PlatformId,
  version: string,
): PlatformEntry {
  if (!fields.url) {
    throw new ManifestError(
      `Manifest entry for ${platform} (version ${version}) has no url`,
      "URL_MISSING",
    );
  }
  if (!fields.sha256) {
    throw new ManifestError(
      `Manifest entry for ${platform} (version ${version}) has no sha256`,
      "CHECKSUM_MISSING",
    );
  }
  // Lower-case only: the manifest's canonical form
  if (!SHA256_PATTERN.test(fields.sha256)) {
    throw new ManifestError(
      `Invalid checksum in manifest for ${platform} (version ${version})`,
      "CHECKSUM_INVALID",
    );
  }
  return { url: fields.url, sha256: fields.sha256 };
}
