/**
 * MITS11 Bootstrap CLI — Install Command
 *
 * The program's only command: resolve, download, verify, extract and run
 * the MITS11 installer.
 *
 * Usage:
 *   mits11-bootstrap                 Install the stable channel
 *   mits11-bootstrap nightly         Install the nightly channel
 *   mits11-bootstrap 5.0.1 --silent  Install a specific version unattended
 *
 * Output:
 *
 *   Bootstrapping MITS11 (stable)
 *
 *     ✔ Detected platform linux-x64
 *     ✔ Resolved version 5.0.1
 *     ✔ Fetched manifest
 *     ✔ Downloaded package (cached)
 *     ✔ Verified checksum
 *     ✔ Extracted package
 *
 *   ✔ Installed MITS11 5.0.1 in 4.2s
 */

import { Command } from "commander";
import {
  Bootstrapper,
  BootstrapDeps,
  BootstrapEvent,
  BootstrapState,
  errorMessage,
} from "@mits11-bootstrap/engine";
import { CliFlags, getBootstrapConfig } from "../config";
import {
  printSuccess,
  printError,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageInfo,
  printDetail,
  printBlank,
  printDebug,
  setDebugMode,
  isDebugMode,
  createSpinner,
  formatState,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  colors,
} from "../output";

/** Stages the spinner cycles through */
const STAGE_MESSAGES: Partial<Record<BootstrapState, string>> = {
  VALIDATING: "Validating target...",
  DETECTING: "Detecting platform...",
  RESOLVING: "Resolving version...",
  FETCHING_MANIFEST: "Fetching manifest...",
  DOWNLOADING: "Downloading package...",
  VERIFYING: "Verifying checksum...",
  EXTRACTING: "Extracting package...",
};

/** After each stage completes, print a check-marked line */
const STAGE_DONE: Partial<Record<BootstrapState, (detail: StageDetail) => string>> = {
  DETECTING: (d) => `Detected platform ${d.message ?? ""}`.trimEnd(),
  RESOLVING: (d) => `Resolved version ${d.message ?? ""}`.trimEnd(),
  FETCHING_MANIFEST: () => "Fetched manifest",
  DOWNLOADING: (d) => (d.cached ? "Downloaded package (cached)" : "Downloaded package"),
  VERIFYING: () => "Verified checksum",
  EXTRACTING: () => "Extracted package",
};

interface StageDetail {
  message?: string;
  cached: boolean;
}

export interface InstallCommandOptions {
  /** Engine collaborators (tests replace network, host and runners) */
  deps?: BootstrapDeps;
  env?: Record<string, string | undefined>;
  /** Install SIGINT/SIGTERM/SIGHUP cleanup handlers (default true) */
  handleSignals?: boolean;
  exit?: (code: number) => void;
}

/**
 * Run one bootstrap and render its progress.
 *
 * @returns The process exit code
 */
export async function runInstall(
  target: string,
  flags: CliFlags,
  options: InstallCommandOptions = {},
): Promise<number> {
  setDebugMode(flags.debug);
  const config = getBootstrapConfig(flags, options.env);
  const label = target || "stable";

  let engine: Bootstrapper;
  try {
    engine = new Bootstrapper(config, options.deps);
  } catch (err: unknown) {
    printError(`Could not start: ${errorMessage(err)}`);
    return 1;
  }

  printHeader(`Bootstrapping ${colors.product("MITS11")} (${colors.version(label)})`);
  printDebug(`Release endpoint: ${config.baseUrl}`);
  printDebug(`Cache directory: ${config.cacheDir}`);
  printDebug(`Manifest parser: ${engine.manifestParser.kind}`);

  const spinner = createSpinner("Starting...");
  let lastState: BootstrapState | "" = "";
  const detail: StageDetail = { cached: false };

  const completeStage = () => {
    const done = lastState ? STAGE_DONE[lastState] : undefined;
    if (done) {
      spinner.stop();
      printStageSuccess(done(detail));
    }
  };

  engine.on((event: BootstrapEvent) => {
    switch (event.type) {
      case "state_change": {
        const { state, message } = event.data;
        if (message) {
          printDebug(`${state}: ${message}`);
        }

        // Engine emits enter + detail for some stages
        if (state === lastState) {
          if (message) detail.message = message;
          return;
        }

        if (state !== "FAILED") completeStage();
        lastState = state;
        detail.message = message;

        const stageMsg = STAGE_MESSAGES[state];
        if (stageMsg) {
          spinner.text = stageMsg;
          spinner.start();
        } else {
          // The installer owns the terminal from here on
          spinner.stop();
        }
        break;
      }
      case "progress": {
        const { percent, bytes_downloaded } = event.data;
        spinner.text = `Downloading package... ${percent}% (${formatBytes(bytes_downloaded)})`;
        break;
      }
      case "cache_hit":
        detail.cached = true;
        printDebug(`Reusing cached package ${event.data.path}`);
        break;
      case "elevation_required":
        spinner.stop();
        printStageInfo("Waiting for the elevated installer to finish...");
        printDebug(`Sentinel: ${event.data.sentinel}`);
        break;
    }
  });

  const startTime = Date.now();
  try {
    const result = await engine.run({
      target,
      silent: flags.silent,
      handleSignals: options.handleSignals ?? true,
    });
    spinner.stop();
    const elapsed = Date.now() - startTime;

    for (const kept of result.kept_paths) {
      printDebug(`Kept temporary path: ${kept}`);
    }

    if (result.final_state === "COMPLETED") {
      printBlank();
      printSuccess(
        `Installed ${colors.product("MITS11")} ${colors.version(result.version ?? label)} in ${formatDuration(elapsed)}`,
      );
      return result.exit_code;
    }

    // ─── Failure output ───
    printBlank();
    printError(`Failed to install ${colors.product("MITS11")} ${colors.version(label)}`);
    if (result.error) {
      printDetail("Reason", formatErrorCategory(result.error.category));
      printDetail("Details", result.error.message);
      printDetail("Stage", formatState(result.error.state));
    }
    if (result.installer_exit_code !== undefined) {
      printDetail("Installer exit code", String(result.installer_exit_code));
    }
    if (!isDebugMode()) {
      printInfo(`Use ${colors.bold("--debug")} to see the detailed log.`);
    }
    return result.exit_code;
  } catch (err: unknown) {
    spinner.stop();
    printBlank();
    printError("Unexpected error during bootstrap");
    if (isDebugMode()) {
      console.error(err);
    } else {
      printDetail("Message", errorMessage(err));
      printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
    }
    return 1;
  }
}

export function registerInstallCommand(
  program: Command,
  options: InstallCommandOptions = {},
): void {
  program
    .argument("[target]", "stable, latest, alpha, nightly or an explicit version", "")
    .option("-s, --silent", "Run the installer non-interactively", false)
    .option("--no-elevate", "Never request administrator privileges")
    .option("--debug", "Show the detailed log on stderr", false)
    .allowExcessArguments(false)
    .action(async (target: string, opts: CliFlags) => {
      const code = await runInstall(target, opts, options);
      (options.exit ?? process.exit)(code);
    });
}
