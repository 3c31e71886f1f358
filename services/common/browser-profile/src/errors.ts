/**
 * Errors raised while locating or cloning a browser profile
 */

/**
 * The host OS has no known Chrome user-data root
 */
export class UnsupportedPlatformError extends Error {
  readonly code = "UNSUPPORTED_PLATFORM";

  constructor(public readonly platform: string) {
    super(`Unsupported platform: ${platform}`);
    this.name = "UnsupportedPlatformError";
  }
}

/**
 * The requested profile directory does not exist
 */
export class ProfileNotFoundError extends Error {
  readonly code = "PROFILE_NOT_FOUND";

  constructor(
    public readonly profilePath: string,
    public readonly originalError?: unknown
  ) {
    super(`Chrome profile directory not found: ${profilePath}`);
    this.name = "ProfileNotFoundError";
  }
}

/**
 * A credential file or the Local State stub could not be written to the scratch profile
 */
export class ProfileCopyFailedError extends Error {
  readonly code = "PROFILE_COPY_FAILED";

  constructor(
    message: string,
    public readonly file: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ProfileCopyFailedError";
  }
}

/**
 * Narrow an unknown error to a Node.js system error
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
