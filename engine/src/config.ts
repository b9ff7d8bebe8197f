/**
 * MITS11 Bootstrap Engine — Configuration
 *
 * Environment-derived paths and switches are read exactly once, here, and
 * passed down as a BootstrapConfig. Nothing else in the engine reads
 * process.env.
 */

import * as os from "os";
import * as path from "path";
import { BootstrapConfig, ManifestParserPreference } from "./types";

export const DEFAULT_BASE_URL = "https://arbin-com.github.io/mits11-release";

/** Root data directory: ~/.mits11-bootstrap */
export const BOOTSTRAP_HOME = path.join(os.homedir(), ".mits11-bootstrap");

export const ENV = {
  keepTemp: "MITS11_KEEP_TMP",
  cacheDir: "MITS11_CACHE_DIR",
  baseUrl: "MITS11_BASE_URL",
  manifestParser: "MITS11_MANIFEST_PARSER",
} as const;

export const DEFAULTS = {
  productName: "mits11",
  cacheDir: path.join(BOOTSTRAP_HOME, "cache"),
  pollIntervalMs: 2_000,
  elevationTimeoutMs: 4 * 60 * 60 * 1000,
  requestTimeoutMs: 60_000,
} as const;

type Env = Record<string, string | undefined>;

/**
 * "1", "true", "yes" and "on" (any case) enable a flag; everything else,
 * including an empty value, leaves it off.
 */
export function isTruthyEnv(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseParserPreference(
  value: string | undefined,
): ManifestParserPreference {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "structured" || normalized === "pattern") {
    return normalized;
  }
  return "auto";
}

/**
 * Build the configuration for one run.
 *
 * @param env - Usually process.env
 * @param overrides - Values from CLI flags; they win over the environment
 */
export function resolveConfig(
  env: Env = process.env,
  overrides: Partial<BootstrapConfig> = {},
): BootstrapConfig {
  const cacheDir = env[ENV.cacheDir]?.trim();
  const baseUrl = env[ENV.baseUrl]?.trim();

  return {
    baseUrl: (baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, ""),
    cacheDir: cacheDir ? path.resolve(cacheDir) : DEFAULTS.cacheDir,
    tempRoot: os.tmpdir(),
    keepTemp: isTruthyEnv(env[ENV.keepTemp]),
    productName: DEFAULTS.productName,
    manifestParser: parseParserPreference(env[ENV.manifestParser]),
    elevate: true,
    pollIntervalMs: DEFAULTS.pollIntervalMs,
    elevationTimeoutMs: DEFAULTS.elevationTimeoutMs,
    requestTimeoutMs: DEFAULTS.requestTimeoutMs,
    allowInsecureHttp: false,
    verbose: false,
    ...overrides,
  };
}
