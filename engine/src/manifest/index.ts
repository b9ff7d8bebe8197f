/**
 * MITS11 Bootstrap Engine — Manifest Fetching & Parser Selection
 */

import { Logger } from "../utils/logger";
import { Transport } from "../downloader";
import { NetworkError, errorMessage } from "../errors";
import { ManifestParserPreference, PlatformEntry, PlatformId } from "../types";
import type { ManifestParser } from "./parser";
import { StructuredManifestParser } from "./structured-parser";
import { PatternManifestParser } from "./pattern-parser";

export type { ManifestParser, RawEntryFields } from "./parser";
export { toPlatformEntry } from "./parser";
export { StructuredManifestParser } from "./structured-parser";
export {
  PatternManifestParser,
  normalizeWhitespace,
  decodeStringLiteral,
} from "./pattern-parser";

const PROBE_SHA256 = "0".repeat(64);
const PROBE_DOCUMENT = JSON.stringify({
  platforms: { "linux-x64": { url: "https://probe.invalid/a.zip", sha256: PROBE_SHA256 } },
});

/**
 * Check that a parser reads the built-in probe document correctly.
 */
export function probeParser(parser: ManifestParser): boolean {
  try {
    const entry = parser.readPlatformEntry(PROBE_DOCUMENT, "linux-x64", "probe");
    return entry.url === "https://probe.invalid/a.zip" && entry.sha256 === PROBE_SHA256;
  } catch {
    return false;
  }
}

/**
 * Pick the manifest backend once at startup. "auto" prefers the
 * structured parser and falls back to the pattern parser when the probe
 * fails.
 */
export function selectManifestParser(
  preference: ManifestParserPreference,
  logger: Logger,
): ManifestParser {
  if (preference === "pattern") return new PatternManifestParser();
  if (preference === "structured") return new StructuredManifestParser();

  const structured = new StructuredManifestParser();
  if (probeParser(structured)) {
    logger.debug("Using structured manifest parser");
    return structured;
  }
  logger.warn("Structured manifest parser unavailable - using pattern parser");
  return new PatternManifestParser();
}

export function manifestUrl(baseUrl: string, version: string): string {
  return `${baseUrl}/${version}/manifest.json`;
}

export interface FetchManifestOptions {
  baseUrl: string;
  transport: Transport;
  parser: ManifestParser;
  logger: Logger;
}

/**
 * Download the manifest for `version` and return this platform's entry.
 * Manifests are never cached.
 */
export async function fetchPlatformEntry(
  version: string,
  platform: PlatformId,
  opts: FetchManifestOptions,
): Promise<PlatformEntry> {
  const url = manifestUrl(opts.baseUrl, version);

  let body: string;
  try {
    body = await opts.transport.fetchText(url);
  } catch (err: unknown) {
    throw new NetworkError(
      `Failed to download ${url} (${errorMessage(err)})`,
      "REQUEST_FAILED",
    );
  }

  const entry = opts.parser.readPlatformEntry(body, platform, version);
  opts.logger.info(
    { version, platform, url: entry.url, parser: opts.parser.kind },
    "Manifest entry resolved",
  );
  return entry;
}
