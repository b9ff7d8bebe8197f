/**
 * MITS11 Bootstrap CLI — Tests
 *
 * Output formatting, flag/environment configuration and the install
 * command driven against stubbed engine collaborators.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as crypto from "crypto";
import { Command } from "commander";
import {
  ArchiveExtractor,
  BootstrapDeps,
  DirectRunRequest,
  DirectRunner,
  DownloadResult,
  ElevatedHandle,
  ElevatedRunner,
  NetworkError,
  OsToken,
  PrivilegeProbe,
  Transport,
  createLogger,
} from "@mits11-bootstrap/engine";
import { getBootstrapConfig } from "../src/config";
import { registerInstallCommand, runInstall } from "../src/commands/install";
import {
  formatBytes,
  formatDuration,
  formatState,
  formatErrorCategory,
  setDebugMode,
  isDebugMode,
} from "../src/output";

// ─── Stubs ──────────────────────────────────────────────────

const BASE = "https://releases.test/mits11";
const PKG_URL = "https://cdn.test/mits11-5.0.1-linux-x64.zip";
const PACKAGE = Buffer.from("stub package bytes");
const PACKAGE_SHA = crypto.createHash("sha256").update(PACKAGE).digest("hex");

class StubTransport implements Transport {
  readonly texts = new Map<string, string>([
    [`${BASE}/stable`, "5.0.1\n"],
    [
      `${BASE}/5.0.1/manifest.json`,
      JSON.stringify({ platforms: { "linux-x64": { url: PKG_URL, sha256: PACKAGE_SHA } } }),
    ],
  ]);

  async fetchText(url: string): Promise<string> {
    const body = this.texts.get(url);
    if (body === undefined) throw new NetworkError(`HTTP 404 for ${url}`, "HTTP_STATUS");
    return body;
  }

  async download(_url: string, destPath: string): Promise<DownloadResult> {
    await fs.promises.writeFile(destPath, PACKAGE);
    return { file_path: destPath, bytes_downloaded: PACKAGE.length, duration_ms: 0 };
  }
}

/** Lays out a package tree instead of unzipping. */
class StubExtractor implements ArchiveExtractor {
  async extract(_archivePath: string, destDir: string): Promise<void> {
    await fs.promises.mkdir(path.join(destDir, "mits11", "script"), { recursive: true });
    await fs.promises.writeFile(path.join(destDir, "mits11", "script", "install.sh"), "#!/bin/sh\n");
  }
}

class StubPrivilege implements PrivilegeProbe {
  async isPrivileged(_os: OsToken): Promise<boolean> {
    return true;
  }
}

class StubDirectRunner implements DirectRunner {
  readonly requests: DirectRunRequest[] = [];
  constructor(private readonly exitCode: number) {}

  async run(request: DirectRunRequest): Promise<number> {
    this.requests.push(request);
    return this.exitCode;
  }
}

class UnusedElevatedRunner implements ElevatedRunner {
  start(): ElevatedHandle {
    throw new Error("elevation not expected in this test");
  }
}

function stubDeps(direct: DirectRunner = new StubDirectRunner(0)): BootstrapDeps {
  return {
    logger: createLogger({ level: "silent" }),
    transport: new StubTransport(),
    extractor: new StubExtractor(),
    host: { kernel: "Linux", machine: "x86_64" },
    privilege: new StubPrivilege(),
    direct,
    elevated: new UnusedElevatedRunner(),
  };
}

function stripAnsi(s: string): string {
  // eslint-disable-next-line no-control-regex
  return s.replace(/\u001b\[[0-9;]*m/g, "");
}

const FLAGS = { silent: false, elevate: true, debug: false };

let tmp: string;
let env: Record<string, string | undefined>;
let errorSpy: MockInstance<typeof console.error>;

function printed(): string[] {
  return errorSpy.mock.calls.map((args: unknown[]) => stripAnsi(args.map(String).join(" ")));
}

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "mits11-cli-test-"));
  env = { MITS11_CACHE_DIR: path.join(tmp, "cache"), MITS11_BASE_URL: BASE };
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  errorSpy.mockRestore();
  setDebugMode(false);
  fs.rmSync(tmp, { recursive: true, force: true });
});

// ─── Output Formatting ──────────────────────────────────────

describe("Output Formatting", () => {
  describe("formatBytes", () => {
    it("formats zero bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
    });

    it("formats bytes", () => {
      expect(formatBytes(512)).toBe("512.0 B");
    });

    it("formats kilobytes", () => {
      expect(formatBytes(1024)).toBe("1.0 KB");
    });

    it("formats megabytes", () => {
      expect(formatBytes(1024 * 1024 * 5.5)).toBe("5.5 MB");
    });

    it("caps at gigabytes", () => {
      expect(formatBytes(1024 * 1024 * 1024 * 2)).toBe("2.0 GB");
      expect(formatBytes(1024 ** 4)).toBe("1024.0 GB");
    });
  });

  describe("formatDuration", () => {
    it("formats milliseconds", () => {
      expect(formatDuration(150)).toBe("150ms");
    });

    it("formats seconds", () => {
      expect(formatDuration(5500)).toBe("5.5s");
    });

    it("formats minutes", () => {
      expect(formatDuration(125000)).toBe("2m 5s");
    });
  });

  describe("formatState", () => {
    it("returns human-friendly label for LAUNCHING", () => {
      expect(stripAnsi(formatState("LAUNCHING"))).toBe("Running installer");
    });

    it("passes through unknown states", () => {
      expect(stripAnsi(formatState("UNKNOWN_STATE"))).toBe("UNKNOWN_STATE");
    });
  });

  describe("formatErrorCategory", () => {
    it("maps INTEGRITY_ERROR to human message", () => {
      expect(formatErrorCategory("INTEGRITY_ERROR")).toBe("File integrity check failed");
    });

    it("maps NETWORK_ERROR to human message", () => {
      expect(formatErrorCategory("NETWORK_ERROR")).toBe("Network or download failure");
    });

    it("passes through unknown categories", () => {
      expect(formatErrorCategory("UNKNOWN_CAT")).toBe("UNKNOWN_CAT");
    });
  });

  describe("debug mode", () => {
    it("defaults to false", () => {
      expect(isDebugMode()).toBe(false);
    });

    it("can be toggled", () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
      setDebugMode(false);
      expect(isDebugMode()).toBe(false);
    });
  });
});

// ─── Configuration ──────────────────────────────────────────

describe("getBootstrapConfig", () => {
  it("applies environment overrides and flags", () => {
    const config = getBootstrapConfig(
      { silent: true, elevate: false, debug: true },
      {
        MITS11_CACHE_DIR: path.join(tmp, "c"),
        MITS11_KEEP_TMP: "yes",
        MITS11_BASE_URL: "https://mirror.test/r/",
        MITS11_MANIFEST_PARSER: "pattern",
      },
    );

    expect(config.cacheDir).toBe(path.join(tmp, "c"));
    expect(config.keepTemp).toBe(true);
    expect(config.baseUrl).toBe("https://mirror.test/r");
    expect(config.manifestParser).toBe("pattern");
    expect(config.elevate).toBe(false);
    expect(config.verbose).toBe(true);
  });

  it("falls back to defaults", () => {
    const config = getBootstrapConfig(FLAGS, {});

    expect(config.baseUrl).toBe("https://arbin-com.github.io/mits11-release");
    expect(config.cacheDir).toBe(path.join(os.homedir(), ".mits11-bootstrap", "cache"));
    expect(config.keepTemp).toBe(false);
    expect(config.manifestParser).toBe("auto");
    expect(config.elevate).toBe(true);
  });
});

// ─── Install Command ────────────────────────────────────────

describe("runInstall", () => {
  it("prints each completed stage and returns 0", async () => {
    const direct = new StubDirectRunner(0);
    const code = await runInstall("5.0.1", FLAGS, {
      deps: stubDeps(direct),
      env,
      handleSignals: false,
    });

    expect(code).toBe(0);
    expect(direct.requests).toHaveLength(1);

    const lines = printed();
    expect(lines).toContain("  Bootstrapping MITS11 (5.0.1)");
    expect(lines.filter((l) => l.startsWith("  ✔"))).toEqual([
      "  ✔ Detected platform linux-x64",
      "  ✔ Resolved version 5.0.1",
      "  ✔ Fetched manifest",
      "  ✔ Downloaded package",
      "  ✔ Verified checksum",
      "  ✔ Extracted package",
    ]);
    expect(lines[lines.length - 1]).toMatch(/^✔ Installed MITS11 5\.0\.1 in \d/);
  });

  it("marks a cached download", async () => {
    await runInstall("5.0.1", FLAGS, { deps: stubDeps(), env, handleSignals: false });
    errorSpy.mockClear();

    await runInstall("5.0.1", FLAGS, { deps: stubDeps(), env, handleSignals: false });

    expect(printed()).toContain("  ✔ Downloaded package (cached)");
  });

  it("explains a failure and returns 1", async () => {
    const code = await runInstall("bogus", FLAGS, {
      deps: stubDeps(),
      env,
      handleSignals: false,
    });

    expect(code).toBe(1);
    const lines = printed();
    expect(lines).toContain("✖ Failed to install MITS11 bogus");
    expect(lines).toContain("  Reason: Invalid target");
    expect(lines).toContain("  Details: Invalid target: bogus");
    expect(lines).toContain("  Stage: Validating");
    expect(lines).toContain("ℹ Use --debug to see the detailed log.");
  });

  it("returns the installer's exit code", async () => {
    const code = await runInstall("", FLAGS, {
      deps: stubDeps(new StubDirectRunner(3)),
      env,
      handleSignals: false,
    });

    expect(code).toBe(3);
    expect(printed()).toContain("  Installer exit code: 3");
  });

  it("passes --silent through to the installer", async () => {
    const direct = new StubDirectRunner(0);
    await runInstall("5.0.1", { ...FLAGS, silent: true }, {
      deps: stubDeps(direct),
      env,
      handleSignals: false,
    });

    expect(direct.requests[0].args).toEqual(["--silent"]);
  });
});

describe("registerInstallCommand", () => {
  function program(exit: (code: number) => void): Command {
    const cmd = new Command();
    cmd.exitOverride();
    registerInstallCommand(cmd, { deps: stubDeps(), env, handleSignals: false, exit });
    return cmd;
  }

  it("parses flags and exits with the run's code", async () => {
    const exit = vi.fn();
    const cmd = program(exit);

    await cmd.parseAsync(["bogus", "--no-elevate", "-s"], { from: "user" });

    expect(cmd.opts()).toEqual({ silent: true, elevate: false, debug: false });
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("defaults to the stable channel", async () => {
    const exit = vi.fn();
    const cmd = program(exit);

    await cmd.parseAsync([], { from: "user" });

    expect(exit).toHaveBeenCalledWith(0);
    expect(printed()).toContain("  Bootstrapping MITS11 (stable)");
  });

  it("rejects a second positional argument without running", async () => {
    const exit = vi.fn();
    const cmd = program(exit);
    cmd.configureOutput({ writeErr: () => undefined });

    await expect(cmd.parseAsync(["5.0.1", "extra"], { from: "user" })).rejects.toThrow(
      "too many arguments",
    );
    expect(exit).not.toHaveBeenCalled();
    expect(printed()).toEqual([]);
  });

  it("rejects unknown options", async () => {
    const cmd = program(vi.fn());
    cmd.configureOutput({ writeErr: () => undefined });

    await expect(cmd.parseAsync(["--bogus"], { from: "user" })).rejects.toThrow(
      "unknown option '--bogus'",
    );
  });
});
