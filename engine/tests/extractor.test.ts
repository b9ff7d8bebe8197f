/**
 * MITS11 Bootstrap Engine — Extraction & Installer Locator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ZipExtractor } from "../src/extractor";
import { INSTALLER_LAYOUTS, collectFiles, locateInstaller } from "../src/locator";
import { PackagingError } from "../src/errors";
import { makeTempDir, writeTestZip } from "./test-utils";

let tmp: string;

beforeEach(() => {
  tmp = makeTempDir("extract");
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("ZipExtractor", () => {
  it("extracts nested files", async () => {
    const archive = path.join(tmp, "pkg.zip");
    await writeTestZip(archive, {
      "mits11/script/install.sh": "#!/bin/sh\nexit 0\n",
      "mits11/README.txt": "readme",
    });

    const dest = path.join(tmp, "out");
    await new ZipExtractor().extract(archive, dest);

    expect(fs.readFileSync(path.join(dest, "mits11/script/install.sh"), "utf8")).toBe(
      "#!/bin/sh\nexit 0\n",
    );
    expect(fs.readFileSync(path.join(dest, "mits11/README.txt"), "utf8")).toBe("readme");
  });

  describe.skipIf(process.platform === "win32")("on POSIX hosts", () => {
    it("preserves unix file modes", async () => {
      const archive = path.join(tmp, "pkg.zip");
      await writeTestZip(archive, {
        "script/install.sh": { content: "#!/bin/sh\n", mode: 0o755 },
        "data.txt": { content: "data", mode: 0o644 },
      });

      const dest = path.join(tmp, "out");
      await new ZipExtractor().extract(archive, dest);

      expect(fs.statSync(path.join(dest, "script/install.sh")).mode & 0o777).toBe(0o755);
      expect(fs.statSync(path.join(dest, "data.txt")).mode & 0o777).toBe(0o644);
    });
  });

  it("rejects a file that is not a zip archive", async () => {
    const archive = path.join(tmp, "broken.zip");
    fs.writeFileSync(archive, "this is not a zip file");

    const promise = new ZipExtractor().extract(archive, path.join(tmp, "out"));
    await expect(promise).rejects.toBeInstanceOf(PackagingError);
    await expect(promise).rejects.toThrow("Invalid or corrupt zip archive");
  });
});

describe("locateInstaller", () => {
  const touch = (relative: string) => {
    const full = path.join(tmp, relative);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, "");
    return full;
  };

  it("finds the installer at the archive root", () => {
    const expected = touch("script/install.sh");
    expect(locateInstaller(tmp, "script/install.sh")).toBe(expected);
  });

  it("finds the installer below a top-level directory", () => {
    touch("mits11-5.0.1/bin/app");
    const expected = touch("mits11-5.0.1/script/install.sh");
    expect(locateInstaller(tmp, "script/install.sh")).toBe(expected);
  });

  it("does not match a similarly named directory", () => {
    touch("myscript/install.sh");
    expect(() => locateInstaller(tmp, "script/install.sh")).toThrow(
      "Installer not found in package (expected script/install.sh)",
    );
  });

  it("fails when the package has no installer", () => {
    touch("README.txt");
    try {
      locateInstaller(tmp, "script/install.sh");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PackagingError);
      if (err instanceof PackagingError) {
        expect(err.code).toBe("INSTALLER_NOT_FOUND");
        expect(err.category).toBe("PACKAGING_ERROR");
      }
    }
  });

  it("fails when more than one installer matches", () => {
    touch("a/script/install.sh");
    touch("b/script/install.sh");
    expect(() => locateInstaller(tmp, "script/install.sh")).toThrow(
      `Ambiguous package: 2 installers match script/install.sh (${path.join("a", "script", "install.sh")}, ${path.join("b", "script", "install.sh")})`,
    );
  });

  it("uses the cmd installer on Windows", () => {
    expect(INSTALLER_LAYOUTS.win.relativePath).toBe("script/install.cmd");
    expect(INSTALLER_LAYOUTS.linux.relativePath).toBe("script/install.sh");
    expect(INSTALLER_LAYOUTS.osx.silentArgs).toEqual(["--silent"]);
  });
});

describe("collectFiles", () => {
  it("walks directories in sorted order", () => {
    for (const name of ["b/2.txt", "a/1.txt", "c.txt"]) {
      const full = path.join(tmp, name);
      fs.mkdirSync(path.dirname(full), { recursive: true });
      fs.writeFileSync(full, "");
    }
    expect(collectFiles(tmp).map((f) => path.relative(tmp, f))).toEqual([
      path.join("a", "1.txt"),
      path.join("b", "2.txt"),
      "c.txt",
    ]);
  });
});
