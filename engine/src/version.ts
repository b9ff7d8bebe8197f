/**
 * MITS11 Bootstrap Engine — Target Validation & Version Resolution
 *
 * Channel names are pointers that the release endpoint may move at any
 * time; explicit versions are used as-is and never touch the network.
 */

import { Logger } from "./utils/logger";
import { Transport } from "./downloader";
import { NetworkError, ValidationError, errorMessage } from "./errors";
import { Channel, PointerName, Target } from "./types";

/** MAJOR.MINOR.PATCH with an optional pre-release or build suffix */
export const EXPLICIT_VERSION_PATTERN = /^\d+\.\d+\.\d+(?:[-+]\S+)?$/;

const POINTERS: Record<Channel, PointerName> = {
  stable: "stable",
  latest: "stable",
  alpha: "alpha",
  nightly: "nightly",
};

function isChannel(value: string): value is Channel {
  return Object.prototype.hasOwnProperty.call(POINTERS, value);
}

export function isExplicitVersion(value: string): boolean {
  return EXPLICIT_VERSION_PATTERN.test(value);
}

/**
 * Validate a user-supplied target. The empty string selects stable.
 *
 * @throws ValidationError for anything that is neither a channel nor an
 *         explicit version
 */
export function parseTarget(raw: string = ""): Target {
  if (raw === "") {
    return { kind: "channel", channel: "stable", raw };
  }
  if (isChannel(raw)) {
    return { kind: "channel", channel: raw, raw };
  }
  if (isExplicitVersion(raw)) {
    return { kind: "explicit", version: raw, raw };
  }
  throw new ValidationError(`Invalid target: ${raw}`);
}

export function pointerUrl(baseUrl: string, channel: Channel): string {
  return `${baseUrl}/${POINTERS[channel]}`;
}

/** Strip every whitespace character from a pointer body. */
export function normalizeVersion(body: string): string {
  return body.replace(/\s+/g, "");
}

/**
 * Turn a validated target into a concrete version string.
 */
export async function resolveVersion(
  target: Target,
  baseUrl: string,
  transport: Transport,
  logger: Logger,
): Promise<string> {
  if (target.kind === "explicit") {
    logger.debug({ version: target.version }, "Explicit version - no lookup");
    return target.version;
  }

  const label = target.raw || target.channel;
  const url = pointerUrl(baseUrl, target.channel);

  let body: string;
  try {
    body = await transport.fetchText(url);
  } catch (err: unknown) {
    logger.error({ url, error: errorMessage(err) }, "Channel pointer fetch failed");
    throw new NetworkError(
      `Failed to resolve version for target: ${label} (${errorMessage(err)})`,
      "REQUEST_FAILED",
    );
  }

  const version = normalizeVersion(body);
  if (!version) {
    throw new NetworkError(
      `Failed to resolve version for target: ${label}`,
      "EMPTY_VERSION",
    );
  }

  logger.info({ target: label, version }, "Resolved channel pointer");
  return version;
}
