/**
 * MITS11 Bootstrap CLI — Configuration
 *
 * Turns parsed command-line flags into the engine's BootstrapConfig.
 * Environment overrides (MITS11_CACHE_DIR, MITS11_KEEP_TMP, ...) are
 * applied by the engine's resolveConfig; flags win over them.
 */

import { BootstrapConfig, resolveConfig } from "@mits11-bootstrap/engine";

export interface CliFlags {
  silent: boolean;
  /** commander sets this to false for --no-elevate */
  elevate: boolean;
  debug: boolean;
}

export function getBootstrapConfig(
  flags: CliFlags,
  env: Record<string, string | undefined> = process.env,
): BootstrapConfig {
  return resolveConfig(env, {
    elevate: flags.elevate,
    verbose: flags.debug,
  });
}
