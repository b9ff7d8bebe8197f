/**
 * MITS11 Bootstrap Engine — Elevation Sentinel Handshake
 *
 * The elevated process cannot hand its exit code back over a pipe on every
 * platform, so a wrapper script runs the installer and writes the code to
 * a sentinel file. The wrapper writes a `.partial` file and renames it, so
 * the parent never reads a half-written sentinel.
 */

import * as fs from "fs";
import { setTimeout as delay } from "timers/promises";
import { ElevationError, errorMessage } from "../errors";
import { OsToken } from "../types";

export const SENTINEL_FILENAME = "installer.exit";

export interface WrapperScript {
  fileName: string;
  content: string;
}

/** Quote a value for POSIX sh. */
export function shQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Quote a value for cmd.exe. Embedded double quotes are not representable. */
export function cmdQuote(value: string): string {
  return `"${value.replace(/"/g, "")}"`;
}

/**
 * Build the script the elevated process runs.
 */
export function buildWrapperScript(
  os: OsToken,
  installerPath: string,
  args: string[],
  sentinelPath: string,
): WrapperScript {
  const partial = `${sentinelPath}.partial`;

  if (os === "win") {
    const command = [cmdQuote(installerPath), ...args.map(cmdQuote)].join(" ");
    return {
      fileName: "run-elevated.cmd",
      content: [
        "@echo off",
        `call ${command}`,
        `>${cmdQuote(partial)} echo %ERRORLEVEL%`,
        `move /y ${cmdQuote(partial)} ${cmdQuote(sentinelPath)} >nul`,
        "",
      ].join("\r\n"),
    };
  }

  const command = [shQuote(installerPath), ...args.map(shQuote)].join(" ");
  return {
    fileName: "run-elevated.sh",
    content: [
      "#!/bin/sh",
      command,
      "code=$?",
      `printf '%s\\n' "$code" > ${shQuote(partial)}`,
      `mv -f ${shQuote(partial)} ${shQuote(sentinelPath)}`,
      "",
    ].join("\n"),
  };
}

/**
 * Parse the sentinel body into an exit code.
 *
 * @throws ElevationError when the body is not a single integer
 */
export function parseSentinel(content: string): number {
  const trimmed = content.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ElevationError(
      `Elevated installer left an unreadable exit status: "${trimmed}"`,
      "SENTINEL_INVALID",
    );
  }
  return parseInt(trimmed, 10);
}

export interface SentinelWaitOptions {
  intervalMs: number;
  timeoutMs: number;
  /** Settles when the process that requested elevation exits */
  launcherExit?: Promise<number>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Block until the sentinel appears and return the exit code it carries.
 *
 * @throws ElevationError TIMEOUT when `timeoutMs` passes first, DENIED when
 *         the launcher fails before any sentinel is written
 */
export async function waitForSentinel(
  sentinelPath: string,
  opts: SentinelWaitOptions,
): Promise<number> {
  const sleep = opts.sleep ?? ((ms: number) => delay(ms).then(() => undefined));
  const now = opts.now ?? Date.now;
  const deadline = now() + opts.timeoutMs;

  const launcher: { failure?: string } = {};
  void opts.launcherExit?.then(
    (code) => {
      if (code !== 0) launcher.failure = `elevation request exited with code ${code}`;
    },
    (err: unknown) => {
      launcher.failure = errorMessage(err);
    },
  );

  for (;;) {
    if (fs.existsSync(sentinelPath)) {
      return parseSentinel(await fs.promises.readFile(sentinelPath, "utf8"));
    }
    if (launcher.failure !== undefined) {
      throw new ElevationError(
        `Could not obtain administrator privileges: ${launcher.failure}`,
        "DENIED",
      );
    }
    if (now() >= deadline) {
      throw new ElevationError(
        `Timed out after ${Math.round(opts.timeoutMs / 1000)}s waiting for the elevated installer to finish`,
        "TIMEOUT",
      );
    }
    await sleep(opts.intervalMs);
  }
}
