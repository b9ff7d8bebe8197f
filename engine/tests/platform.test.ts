/**
 * MITS11 Bootstrap Engine — Platform Detection Tests
 */

import { describe, it, expect } from "vitest";
import * as os from "os";
import { detectPlatform, readHostInfo } from "../src/platform";
import { EnvironmentError } from "../src/errors";

describe("detectPlatform", () => {
  it.each([
    ["Linux", "x86_64", "linux-x64"],
    ["Linux", "aarch64", "linux-arm64"],
    ["Darwin", "arm64", "osx-arm64"],
    ["Darwin", "x86_64", "osx-x64"],
    ["Windows_NT", "AMD64", "win-x64"],
    ["Windows_NT", "x64", "win-x64"],
  ])("maps %s/%s to %s", (kernel, machine, expected) => {
    expect(detectPlatform({ kernel, machine }).id).toBe(expected);
  });

  it("splits the identifier into os and arch tokens", () => {
    expect(detectPlatform({ kernel: "Darwin", machine: "arm64" })).toEqual({
      os: "osx",
      arch: "arm64",
      id: "osx-arm64",
    });
  });

  it("rejects unknown kernels", () => {
    expect(() => detectPlatform({ kernel: "FreeBSD", machine: "x86_64" })).toThrow(
      "Unsupported OS: FreeBSD",
    );
  });

  it("rejects 32-bit machines", () => {
    expect(() => detectPlatform({ kernel: "Linux", machine: "i686" })).toThrow(
      "Unsupported arch: i686 (32-bit hosts are not supported)",
    );
    expect(() => detectPlatform({ kernel: "Linux", machine: "armv7l" })).toThrow(
      EnvironmentError,
    );
  });

  it("rejects unknown architectures with UNSUPPORTED_ARCH", () => {
    try {
      detectPlatform({ kernel: "Linux", machine: "riscv64" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EnvironmentError);
      if (err instanceof EnvironmentError) {
        expect(err.code).toBe("UNSUPPORTED_ARCH");
        expect(err.category).toBe("ENVIRONMENT_ERROR");
        expect(err.message).toBe("Unsupported arch: riscv64");
      }
    }
  });
});

describe("readHostInfo", () => {
  it("reports the kernel and machine name", () => {
    expect(readHostInfo("x86_64", "arm64")).toEqual({ kernel: os.type(), machine: "x86_64" });
  });

  it("falls back to the Node architecture when the machine name is empty", () => {
    expect(readHostInfo("  ", "arm64").machine).toBe("arm64");
    expect(detectPlatform({ kernel: "Linux", machine: readHostInfo("", "x64").machine }).id).toBe(
      "linux-x64",
    );
  });
});
