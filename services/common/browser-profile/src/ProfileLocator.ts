import os from "os";
import path from "path";
import { UnsupportedPlatformError } from "./errors.js";

/**
 * Profile used when none is given
 */
export const DEFAULT_PROFILE_NAME = "Default";

/**
 * Which Chromium build owns the user-data root
 */
export type BrowserChannel = "chrome" | "chromium";

/**
 * Overrides for the host the profile lives on.
 * Every field defaults to the running process.
 */
export interface LocateOptions {
  /** Platform identifier as reported by process.platform */
  platform?: string;
  /** Home directory of the user owning the profile */
  homeDir?: string;
  /** Environment used for LOCALAPPDATA lookup on Windows */
  env?: NodeJS.ProcessEnv;
  /** Browser build, default: 'chrome' */
  channel?: BrowserChannel;
}

const USER_DATA_SEGMENTS: Record<BrowserChannel, Record<"darwin" | "linux" | "win32", string[]>> = {
  chrome: {
    darwin: ["Library", "Application Support", "Google", "Chrome"],
    linux: [".config", "google-chrome"],
    win32: ["Google", "Chrome", "User Data"],
  },
  chromium: {
    darwin: ["Library", "Application Support", "Chromium"],
    linux: [".config", "chromium"],
    win32: ["Chromium", "User Data"],
  },
};

/**
 * Get the browser user-data root for the given platform.
 * Pure path arithmetic: nothing is read from disk.
 */
export function getUserDataRoot(options: LocateOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;
  const segments = USER_DATA_SEGMENTS[options.channel ?? "chrome"];

  switch (platform) {
    case "darwin":
      return path.posix.join(homeDir, ...segments.darwin);
    case "linux":
      return path.posix.join(homeDir, ...segments.linux);
    case "win32": {
      const localAppData = env.LOCALAPPDATA || path.win32.join(homeDir, "AppData", "Local");
      return path.win32.join(localAppData, ...segments.win32);
    }
    default:
      throw new UnsupportedPlatformError(platform);
  }
}

/**
 * Resolve the absolute directory of a named profile, e.g. "Default" or "Profile 1"
 */
export function resolveProfilePath(
  profileName: string = DEFAULT_PROFILE_NAME,
  options: LocateOptions = {}
): string {
  const root = getUserDataRoot(options);
  const join = (options.platform ?? process.platform) === "win32" ? path.win32.join : path.posix.join;
  return join(root, profileName);
}
