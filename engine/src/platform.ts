/**
 * MITS11 Bootstrap Engine — Platform Detection
 *
 * Maps the host kernel name and machine architecture onto the platform
 * identifiers used as manifest keys. Both mappings are closed: anything
 * not listed is rejected before any network activity.
 */

import * as os from "os";
import { EnvironmentError } from "./errors";
import { ArchToken, OsToken, Platform } from "./types";

export interface HostInfo {
  /** Kernel name as reported by os.type(): "Linux", "Darwin", "Windows_NT" */
  kernel: string;
  /** Machine name as reported by os.machine() or uname -m */
  machine: string;
}

const OS_TOKENS = new Map<string, OsToken>([
  ["Linux", "linux"],
  ["Darwin", "osx"],
  ["Windows_NT", "win"],
]);

const ARCH_TOKENS = new Map<string, ArchToken>([
  ["x86_64", "x64"],
  ["amd64", "x64"],
  ["x64", "x64"],
  ["arm64", "arm64"],
  ["aarch64", "arm64"],
]);

const ARCH_32_BIT = new Set(["i386", "i686", "x86", "ia32", "arm", "armv6l", "armv7l"]);

/**
 * Read the running host. An empty machine name falls back to the
 * architecture Node was built for ("x64", "arm64", "ia32", ...).
 */
export function readHostInfo(
  machine: string = os.machine(),
  nodeArch: string = process.arch,
): HostInfo {
  return { kernel: os.type(), machine: machine.trim() || nodeArch };
}

export function detectPlatform(host: HostInfo = readHostInfo()): Platform {
  const osToken = OS_TOKENS.get(host.kernel);
  if (!osToken) {
    throw new EnvironmentError(`Unsupported OS: ${host.kernel}`, "UNSUPPORTED_OS");
  }

  const machine = host.machine.trim().toLowerCase();
  if (ARCH_32_BIT.has(machine)) {
    throw new EnvironmentError(
      `Unsupported arch: ${host.machine} (32-bit hosts are not supported)`,
      "UNSUPPORTED_ARCH",
    );
  }

  const arch = ARCH_TOKENS.get(machine);
  if (!arch) {
    throw new EnvironmentError(`Unsupported arch: ${host.machine}`, "UNSUPPORTED_ARCH");
  }

  return { os: osToken, arch, id: `${osToken}-${arch}` };
}
