import { z } from "zod";
import { ManifestParser, malformedManifest, platformMissing, toPlatformEntry } from "./parser";
import { PlatformEntry, PlatformId } from "../types";

const manifestSchema = z.object({
  platforms: z.record(z.string(), z.unknown()),
});

const entrySchema = z.object({
  url: z.string().optional().catch(undefined),
  sha256: z.string().optional().catch(undefined),
});

export class StructuredManifestParser implements ManifestParser {
  readonly kind = "structured" as const;

  readPlatformEntry(json: string, platform: PlatformId, version: string): PlatformEntry {
    let document: unknown;
    try {
      document = JSON.parse(json);
    } catch (err: unknown) {
      throw malformedManifest(version, err instanceof Error ? err.message : "invalid JSON");
    }

    const manifest = manifestSchema.safeParse(document);
    if (!manifest.success) {
      throw malformedManifest(version, "missing platforms object");
    }

    const { platforms } = manifest.data;
    if (!Object.prototype.hasOwnProperty.call(platforms, platform)) {
      throw platformMissing(platform, version);
    }

    const entry = entrySchema.safeParse(platforms[platform]);
    if (!entry.success) {
      throw platformMissing(platform, version);
    }

    return toPlatformEntry(
      { url: entry.data.url, sha256: entry.data.sha256 },
      platform,
      version,
    );
  }
}
