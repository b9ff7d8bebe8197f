/**
 * MITS11 Bootstrap Engine — Installer Process Runners
 *
 * DirectRunner runs the nested installer in this process's privilege
 * context. ElevatedRunner asks the OS to run the sentinel wrapper script
 * with administrator/root privileges:
 *   linux → sudo /bin/sh <wrapper>
 *   osx   → osascript "do shell script … with administrator privileges"
 *   win   → PowerShell Start-Process -Verb RunAs (UAC prompt)
 */

import { spawn, ChildProcess, StdioOptions } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { Logger } from "../utils/logger";
import { ElevationError } from "../errors";
import { OsToken } from "../types";
import { cmdQuote } from "./sentinel";

export type SpawnFn = typeof spawn;

export interface DirectRunRequest {
  installerPath: string;
  args: string[];
  os: OsToken;
  silent: boolean;
}

export interface DirectRunner {
  /** Resolves with the installer's exit code */
  run(request: DirectRunRequest): Promise<number>;
}

export interface ElevatedRunRequest {
  os: OsToken;
  wrapperPath: string;
  silent: boolean;
}

export interface ElevatedHandle {
  /** Settles when the elevation request process exits */
  exited: Promise<number>;
}

export interface ElevatedRunner {
  start(request: ElevatedRunRequest): ElevatedHandle;
}

/**
 * Open the controlling terminal so an installer can prompt even when our
 * own stdin is a pipe (e.g. `curl … | sh`). Returns undefined when there
 * is no terminal to open.
 */
export function openControllingTerminal(): number | undefined {
  if (process.platform === "win32" || process.stdin.isTTY) return undefined;
  try {
    return fs.openSync("/dev/tty", "r");
  } catch {
    return undefined;
  }
}

function waitForExit(child: ChildProcess): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code) => resolve(code ?? 1));
  });
}

export interface SystemRunnerOptions {
  logger: Logger;
  spawnFn?: SpawnFn;
  openTerminal?: () => number | undefined;
}

export class SystemDirectRunner implements DirectRunner {
  private readonly logger: Logger;
  private readonly spawnFn: SpawnFn;
  private readonly openTerminal: () => number | undefined;

  constructor(options: SystemRunnerOptions) {
    this.logger = options.logger;
    this.spawnFn = options.spawnFn ?? spawn;
    this.openTerminal = options.openTerminal ?? openControllingTerminal;
  }

  async run(request: DirectRunRequest): Promise<number> {
    const { installerPath, args, os, silent } = request;
    const ttyFd = silent ? undefined : this.openTerminal();
    const stdio: StdioOptions = [ttyFd ?? "inherit", "inherit", "inherit"];

    this.logger.info(
      { installer: installerPath, args, tty: ttyFd !== undefined },
      "Running installer directly",
    );

    try {
      const child =
        os === "win"
          ? this.spawnFn(
              "cmd.exe",
              ["/d", "/s", "/c", `"${[cmdQuote(installerPath), ...args.map(cmdQuote)].join(" ")}"`],
              { cwd: path.dirname(installerPath), stdio, windowsVerbatimArguments: true },
            )
          : this.spawnFn(installerPath, args, { cwd: path.dirname(installerPath), stdio });
      return await waitForExit(child);
    } finally {
      if (ttyFd !== undefined) fs.closeSync(ttyFd);
    }
  }
}

/** Escape a value for an AppleScript string literal. */
export function appleScriptQuote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** Quote a value for a PowerShell single-quoted string. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export interface LauncherCommand {
  command: string;
  args: string[];
}

/**
 * The command that asks the OS to run `wrapperPath` elevated.
 */
export function buildElevationCommand(request: ElevatedRunRequest): LauncherCommand {
  const { os, wrapperPath, silent } = request;

  if (os === "linux") {
    return { command: "sudo", args: ["/bin/sh", wrapperPath] };
  }

  if (os === "osx") {
    const script =
      `do shell script "/bin/sh " & quoted form of ${appleScriptQuote(wrapperPath)}` +
      " with administrator privileges";
    return { command: "osascript", args: ["-e", script] };
  }

  const psCommand = [
    "Start-Process",
    "-FilePath 'cmd.exe'",
    `-ArgumentList @('/d', '/c', ${psQuote(cmdQuote(wrapperPath))})`,
    "-Verb RunAs",
    `-WindowStyle ${silent ? "Hidden" : "Normal"}`,
  ].join(" ");

  // -EncodedCommand avoids quoting issues with complex paths
  const encoded = Buffer.from(psCommand, "utf16le").toString("base64");
  return {
    command: "powershell",
    args: ["-NoProfile", "-ExecutionPolicy", "Bypass", "-EncodedCommand", encoded],
  };
}

export class SystemElevatedRunner implements ElevatedRunner {
  private readonly logger: Logger;
  private readonly spawnFn: SpawnFn;
  private readonly openTerminal: () => number | undefined;

  constructor(options: SystemRunnerOptions) {
    this.logger = options.logger;
    this.spawnFn = options.spawnFn ?? spawn;
    this.openTerminal = options.openTerminal ?? openControllingTerminal;
  }

  start(request: ElevatedRunRequest): ElevatedHandle {
    const { command, args } = buildElevationCommand(request);
    this.logger.info({ command, wrapper: request.wrapperPath }, "Requesting elevation");

    // sudo prompts for a password on the terminal
    const ttyFd = request.os === "linux" ? this.openTerminal() : undefined;

    let child: ChildProcess;
    try {
      child = this.spawnFn(command, args, {
        stdio: [ttyFd ?? "inherit", "inherit", "inherit"],
        windowsHide: true,
      });
    } catch (err: unknown) {
      if (ttyFd !== undefined) fs.closeSync(ttyFd);
      throw new ElevationError(
        `Could not request administrator privileges via ${command}: ${err instanceof Error ? err.message : String(err)}`,
        "DENIED",
      );
    }

    const exited = waitForExit(child).finally(() => {
      if (ttyFd !== undefined) fs.closeSync(ttyFd);
    });
    return { exited };
  }
}
