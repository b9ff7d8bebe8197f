/**
 * MITS11 Bootstrap Engine — Error Types
 *
 * Every fatal condition in the pipeline is a BootstrapError. The category
 * decides how the CLI labels it; exitCode is what the process exits with.
 */

import { ErrorCategory } from "./types";

export abstract class BootstrapError extends Error {
  abstract readonly category: ErrorCategory;
  readonly code: string;
  readonly exitCode: number;

  constructor(message: string, code: string, exitCode: number = 1) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export type ValidationErrorCode = "INVALID_TARGET";

export class ValidationError extends BootstrapError {
  readonly category = "VALIDATION_ERROR" as const;

  constructor(message: string, code: ValidationErrorCode = "INVALID_TARGET") {
    super(message, code);
  }
}

export type EnvironmentErrorCode = "UNSUPPORTED_OS" | "UNSUPPORTED_ARCH";

export class EnvironmentError extends BootstrapError {
  readonly category = "ENVIRONMENT_ERROR" as const;

  constructor(message: string, code: EnvironmentErrorCode) {
    super(message, code);
  }
}

export type NetworkErrorCode =
  | "INSECURE_URL"
  | "HTTP_STATUS"
  | "REQUEST_FAILED"
  | "TIMEOUT"
  | "EMPTY_VERSION";

export class NetworkError extends BootstrapError {
  readonly category = "NETWORK_ERROR" as const;

  constructor(message: string, code: NetworkErrorCode) {
    super(message, code);
  }
}

export type ManifestErrorCode =
  | "MALFORMED"
  | "PLATFORM_MISSING"
  | "URL_MISSING"
  | "CHECKSUM_MISSING"
  | "CHECKSUM_INVALID";

/** A manifest that was fetched but cannot yield an entry for this platform */
export class ManifestError extends BootstrapError {
  readonly category = "NETWORK_ERROR" as const;

  constructor(message: string, code: ManifestErrorCode) {
    super(message, code);
  }
}

export type IntegrityErrorCode = "CHECKSUM_MISMATCH" | "INVALID_HASH";

export class IntegrityError extends BootstrapError {
  readonly category = "INTEGRITY_ERROR" as const;

  constructor(message: string, code: IntegrityErrorCode = "CHECKSUM_MISMATCH") {
    super(message, code);
  }
}

export type PackagingErrorCode =
  | "INVALID_ARCHIVE"
  | "EXTRACTION_FAILED"
  | "INSTALLER_NOT_FOUND"
  | "INSTALLER_AMBIGUOUS";

export class PackagingError extends BootstrapError {
  readonly category = "PACKAGING_ERROR" as const;

  constructor(message: string, code: PackagingErrorCode) {
    super(message, code);
  }
}

export type ElevationErrorCode = "DENIED" | "TIMEOUT" | "SENTINEL_INVALID";

export class ElevationError extends BootstrapError {
  readonly category = "ELEVATION_ERROR" as const;

  constructor(message: string, code: ElevationErrorCode) {
    super(message, code);
  }
}

/** The nested installer ran and exited non-zero (or could not be spawned) */
export class InstallerExitError extends BootstrapError {
  readonly category = "EXECUTION_ERROR" as const;
  readonly installerExitCode: number;

  constructor(installerExitCode: number, message?: string) {
    super(
      message ?? `Installer exited with code ${installerExitCode}`,
      "INSTALLER_FAILED",
      installerExitCode > 0 && installerExitCode < 256 ? installerExitCode : 1,
    );
    this.installerExitCode = installerExitCode;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
