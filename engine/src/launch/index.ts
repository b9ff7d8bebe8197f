/**
 * MITS11 Bootstrap Engine — Launch (Barrel Export)
 */

export {
  InstallerLauncher,
  type LaunchState,
  type LaunchRequest,
  type LaunchOutcome,
  type InstallerLauncherOptions,
} from "./launcher";

export { SystemPrivilegeProbe, type PrivilegeProbe } from "./privilege";

export {
  SystemDirectRunner,
  SystemElevatedRunner,
  buildElevationCommand,
  openControllingTerminal,
  appleScriptQuote,
  psQuote,
  type DirectRunner,
  type DirectRunRequest,
  type ElevatedRunner,
  type ElevatedRunRequest,
  type ElevatedHandle,
  type LauncherCommand,
  type SpawnFn,
} from "./runners";

export {
  SENTINEL_FILENAME,
  buildWrapperScript,
  parseSentinel,
  waitForSentinel,
  shQuote,
  cmdQuote,
  type SentinelWaitOptions,
  type WrapperScript,
} from "./sentinel";
