/**
 * MITS11 Bootstrap Engine — HTTP Transport
 *
 * Fetches channel pointers, manifests and artifacts.
 * HTTPS only — plain HTTP is rejected unless the configuration explicitly
 * allows it (local test servers).
 */

import * as fs from "fs";
import * as http from "http";
import * as https from "https";
import { pipeline } from "stream/promises";
import { NetworkError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";
import { ProgressData } from "./types";

export type DownloadProgress = ProgressData;

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface HttpOptions {
  timeoutMs: number;
  allowInsecureHttp: boolean;
  logger: Logger;
}

/**
 * Everything the pipeline needs from the network. The orchestrator only
 * talks to this interface so tests can count requests.
 */
export interface Transport {
  fetchText(url: string): Promise<string>;
  download(
    url: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult>;
}

const MAX_REDIRECTS = 5;

function checkUrl(url: string, opts: HttpOptions): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new NetworkError(`Invalid URL: ${url}`, "REQUEST_FAILED");
  }
  if (parsed.protocol === "https:") return parsed;
  if (parsed.protocol === "http:" && opts.allowInsecureHttp) return parsed;
  throw new NetworkError(`Download URL must be HTTPS. Got: ${url}`, "INSECURE_URL");
}

/**
 * GET a URL, following up to five redirects, and resolve with the
 * response once a 200 arrives. Any other status is a NetworkError.
 */
function openResponse(
  url: string,
  opts: HttpOptions,
  redirectsLeft: number = MAX_REDIRECTS,
): Promise<http.IncomingMessage> {
  const parsed = checkUrl(url, opts);

  return new Promise<http.IncomingMessage>((resolve, reject) => {
    const onResponse = (response: http.IncomingMessage): void => {
      const status = response.statusCode ?? 0;

      if (status >= 300 && status < 400 && response.headers.location) {
        response.resume();
        if (redirectsLeft <= 0) {
          reject(new NetworkError(`Too many redirects for ${url}`, "REQUEST_FAILED"));
          return;
        }
        let followed: Promise<http.IncomingMessage>;
        try {
          const next = new URL(response.headers.location, parsed).toString();
          opts.logger.debug({ redirect: next }, "Following redirect");
          followed = openResponse(next, opts, redirectsLeft - 1);
        } catch (err: unknown) {
          // Thrown here it would escape the response handler
          reject(
            err instanceof NetworkError
              ? err
              : new NetworkError(
                  `Invalid redirect from ${url}: ${errorMessage(err)}`,
                  "REQUEST_FAILED",
                ),
          );
          return;
        }
        followed.then(resolve, reject);
        return;
      }

      if (status !== 200) {
        response.resume();
        reject(new NetworkError(`HTTP ${status} for ${url}`, "HTTP_STATUS"));
        return;
      }

      resolve(response);
    };

    const request =
      parsed.protocol === "https:"
        ? https.get(parsed, onResponse)
        : http.get(parsed, onResponse);

    request.on("error", (err) => {
      reject(new NetworkError(`Request failed for ${url}: ${err.message}`, "REQUEST_FAILED"));
    });

    request.setTimeout(opts.timeoutMs, () => {
      request.destroy();
      reject(
        new NetworkError(
          `Request timed out after ${Math.round(opts.timeoutMs / 1000)} seconds: ${url}`,
          "TIMEOUT",
        ),
      );
    });
  });
}

/**
 * Fetch a small text resource (channel pointer or manifest).
 */
export async function fetchText(url: string, opts: HttpOptions): Promise<string> {
  opts.logger.debug({ url }, "Fetching text resource");
  const response = await openResponse(url, opts);
  response.setEncoding("utf8");

  let body = "";
  for await (const chunk of response) {
    body += chunk;
  }
  return body;
}

/**
 * Stream a URL to destPath. A partial file is removed on failure.
 */
export async function downloadFile(
  url: string,
  destPath: string,
  onProgress: ProgressCallback | undefined,
  opts: HttpOptions,
): Promise<DownloadResult> {
  const { logger } = opts;
  logger.info({ url, dest: destPath }, "Starting download");
  const startTime = Date.now();

  const response = await openResponse(url, opts);
  const totalBytes = parseInt(response.headers["content-length"] || "0", 10);
  let downloadedBytes = 0;

  response.on("data", (chunk: Buffer) => {
    downloadedBytes += chunk.length;
    if (onProgress && totalBytes > 0) {
      onProgress({
        bytes_downloaded: downloadedBytes,
        bytes_total: totalBytes,
        percent: Math.round((downloadedBytes / totalBytes) * 100),
      });
    }
  });

  try {
    await pipeline(response, fs.createWriteStream(destPath));
  } catch (err: unknown) {
    await fs.promises.rm(destPath, { force: true });
    throw new NetworkError(
      `Failed to download ${url}: ${errorMessage(err)}`,
      "REQUEST_FAILED",
    );
  }

  const duration = Date.now() - startTime;
  logger.info(
    { dest: destPath, bytes: downloadedBytes, duration_ms: duration },
    "Download complete",
  );

  return {
    file_path: destPath,
    bytes_downloaded: downloadedBytes,
    duration_ms: duration,
  };
}

export class HttpTransport implements Transport {
  constructor(private readonly opts: HttpOptions) {}

  fetchText(url: string): Promise<string> {
    return fetchText(url, this.opts);
  }

  download(
    url: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult> {
    return downloadFile(url, destPath, onProgress, this.opts);
  }
}
