/**
 * MITS11 Bootstrap Engine — SHA-256 Checksum Verification
 *
 * The integrity gate: nothing is extracted or executed unless its bytes
 * hash to the value the manifest declares.
 */

import * as fs from "fs";
import * as crypto from "crypto";
import { IntegrityError } from "./errors";

export const SHA256_PATTERN = /^[a-f0-9]{64}$/;

export interface VerificationResult {
  valid: boolean;
  expected: string;
  actual: string;
  file_path: string;
}

/**
 * Compute the SHA-256 of a file, streaming over its full contents.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}

/**
 * Canonical lower-case form of a SHA-256 hex string.
 *
 * @throws IntegrityError if the value is not 64 hex characters
 */
export function normalizeSha256(value: string): string {
  const normalized = value.trim().toLowerCase();
  if (!SHA256_PATTERN.test(normalized)) {
    throw new IntegrityError(
      `Invalid SHA-256 hash format: "${value}". Expected 64 hex characters.`,
      "INVALID_HASH",
    );
  }
  return normalized;
}

/**
 * Hash a file and compare it with the expected value, ignoring case.
 */
export async function verifyChecksum(
  filePath: string,
  expectedHash: string,
): Promise<VerificationResult> {
  const expected = normalizeSha256(expectedHash);
  const actual = await computeFileHash(filePath);

  return {
    valid: actual === expected,
    expected,
    actual,
    file_path: filePath,
  };
}
