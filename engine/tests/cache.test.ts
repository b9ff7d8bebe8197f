/**
 * MITS11 Bootstrap Engine — Artifact Cache Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ArtifactCache, cacheFileName } from "../src/cache";
import { IntegrityError, NetworkError } from "../src/errors";
import { FakeTransport, makeTempDir, sha256Of, silentLogger } from "./test-utils";

const URL_PKG = "https://cdn.test/mits11-5.0.1-linux-x64.zip";
const GOOD = Buffer.from("package bytes v5.0.1");
const KEY = { version: "5.0.1", platform: "linux-x64" as const };

describe("cacheFileName", () => {
  it("names files by product, version and platform", () => {
    expect(cacheFileName("mits11", KEY)).toBe("mits11-5.0.1-linux-x64.zip");
  });

  it("replaces unsafe characters in the version", () => {
    expect(cacheFileName("mits11", { version: "5.0.1+build/7", platform: "win-x64" })).toBe(
      "mits11-5.0.1+build_7-win-x64.zip",
    );
  });
});

describe("ArtifactCache", () => {
  let cacheDir: string;
  let transport: FakeTransport;
  let cache: ArtifactCache;

  beforeEach(() => {
    cacheDir = path.join(makeTempDir("cache"), "nested", "cache");
    transport = new FakeTransport();
    transport.files.set(URL_PKG, GOOD);
    cache = new ArtifactCache({
      cacheDir,
      productName: "mits11",
      transport,
      logger: silentLogger(),
    });
  });

  afterEach(() => {
    fs.rmSync(path.dirname(path.dirname(cacheDir)), { recursive: true, force: true });
  });

  it("downloads into the cache directory on a miss", async () => {
    const result = await cache.acquire({ url: URL_PKG, sha256: sha256Of(GOOD) }, KEY);

    expect(result.cacheHit).toBe(false);
    expect(result.bytesDownloaded).toBe(GOOD.length);
    expect(result.filePath).toBe(path.join(cacheDir, "mits11-5.0.1-linux-x64.zip"));
    expect(fs.readFileSync(result.filePath)).toEqual(GOOD);
    expect(transport.downloads).toEqual([URL_PKG]);
  });

  it("reuses a cached file whose hash matches", async () => {
    const entry = { url: URL_PKG, sha256: sha256Of(GOOD) };
    await cache.acquire(entry, KEY);
    const second = await cache.acquire(entry, KEY);

    expect(second.cacheHit).toBe(true);
    expect(second.bytesDownloaded).toBe(0);
    expect(transport.downloads).toHaveLength(1);
  });

  it("matches a cached file against an upper-case manifest hash", async () => {
    fs.mkdirSync(cacheDir, { recursive: true });
    fs.writeFileSync(cache.pathFor(KEY), GOOD);

    const result = await cache.acquire(
      { url: URL_PKG, sha256: sha256Of(GOOD).toUpperCase() },
      KEY,
    );

    expect(result.cacheHit).toBe(true);
    expect(transport.downloads).toEqual([]);
  });

  it("evaluate() deletes a file whose hash differs", async () => {
    fs.mkdirSync(cacheDir, { recursive: true });
    const filePath = cache.pathFor(KEY);
    fs.writeFileSync(filePath, "stale bytes");

    await expect(cache.evaluate(filePath, sha256Of(GOOD))).resolves.toBe(false);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("replaces a stale cached file with one fresh download", async () => {
    fs.mkdirSync(cacheDir, { recursive: true });
    fs.writeFileSync(cache.pathFor(KEY), "stale bytes");

    const result = await cache.acquire({ url: URL_PKG, sha256: sha256Of(GOOD) }, KEY);

    expect(result.cacheHit).toBe(false);
    expect(fs.readFileSync(result.filePath)).toEqual(GOOD);
    expect(transport.downloads).toEqual([URL_PKG]);
  });

  it("deletes a download that fails verification and does not retry", async () => {
    const expected = sha256Of("something else");
    const promise = cache.acquire({ url: URL_PKG, sha256: expected }, KEY);

    await expect(promise).rejects.toBeInstanceOf(IntegrityError);
    await expect(promise).rejects.toThrow(
      `Checksum verification failed for ${URL_PKG}: expected ${expected}, got ${sha256Of(GOOD)}`,
    );
    expect(transport.downloads).toEqual([URL_PKG]);
    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });

  it("deletes a stale file even when the new download fails", async () => {
    fs.mkdirSync(cacheDir, { recursive: true });
    fs.writeFileSync(cache.pathFor(KEY), "stale bytes");

    await expect(
      cache.acquire({ url: URL_PKG, sha256: sha256Of("something else") }, KEY),
    ).rejects.toThrow(IntegrityError);
    expect(fs.existsSync(cache.pathFor(KEY))).toBe(false);
  });

  it("propagates network failures and leaves no partial file", async () => {
    const missing = "https://cdn.test/missing.zip";
    await expect(
      cache.acquire({ url: missing, sha256: sha256Of(GOOD) }, KEY),
    ).rejects.toBeInstanceOf(NetworkError);
    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });

  it("forwards download progress", async () => {
    const seen: number[] = [];
    await cache.acquire({ url: URL_PKG, sha256: sha256Of(GOOD) }, KEY, (p) => {
      seen.push(p.percent);
    });
    expect(seen).toEqual([100]);
  });

  it("remove() deletes the cached artifact", async () => {
    const result = await cache.acquire({ url: URL_PKG, sha256: sha256Of(GOOD) }, KEY);
    await cache.remove(KEY);
    expect(fs.existsSync(result.filePath)).toBe(false);
  });
});
