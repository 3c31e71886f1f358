import fs from "fs/promises";
import os from "os";
import path from "path";
import { ProfileCopyFailedError, ProfileNotFoundError, isErrnoException } from "./errors.js";

/**
 * Logger function type for BrowserProfileManager
 */
export type ProfileLogger = (
  level: "info" | "warn" | "error" | "debug",
  message: string
) => void;

const silentLogger: ProfileLogger = () => {};

/**
 * Profile configuration options
 */
export interface ProfileConfig {
  /** Directory scratch profiles are created in, default: os.tmpdir() */
  tempRoot?: string;
  /** Prefix of scratch profile directory names, default: 'nlm-auth-' */
  scratchPrefix?: string;
  /** Custom logger function */
  logger?: ProfileLogger;
}

/**
 * Files carrying the signed-in state of a profile
 */
export const CREDENTIAL_FILES = ["Cookies", "Login Data", "Web Data"] as const;

/**
 * Profile directory name inside the scratch user-data dir
 */
export const SCRATCH_PROFILE_NAME = "Default";

export const LOCAL_STATE_FILE = "Local State";

/**
 * Minimal Local State so Chrome accepts the profile without the OS keychain key
 */
export const LOCAL_STATE_STUB = '{"os_crypt":{"encrypted_key":""}}';

/**
 * Anti-detection browser arguments for Chromium
 * Use these when launching browser against a scratch profile
 */
export const ANTI_DETECTION_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-first-run",
  "--no-default-browser-check",
  "--password-store=basic",
];

/**
 * Flags that keep an automated session quiet and predictable
 */
export const SESSION_ARGS = [
  "--disable-gpu",
  "--disable-extensions",
  "--disable-sync",
  "--disable-popup-blocking",
  "--disable-hang-monitor",
  "--disable-ipc-flooding-protection",
  "--disable-prompt-on-repost",
  "--disable-renderer-backgrounding",
  "--force-color-profile=srgb",
  "--metrics-recording-only",
  "--safebrowsing-disable-auto-update",
];

/**
 * Default args to ignore when launching with anti-detection
 */
export const IGNORE_DEFAULT_ARGS = ["--enable-automation"];

/**
 * BrowserProfileManager - Clones a signed-in Chrome profile into a throwaway user-data dir
 *
 * Only the credential databases are copied, and only ever from the real profile into
 * the scratch one, so a Chrome instance holding the real profile open is left alone.
 *
 * @example
 * ```typescript
 * const manager = new BrowserProfileManager();
 *
 * const cookies = await manager.withScratchProfile(profilePath, async (userDataDir) => {
 *   const context = await chromium.launchPersistentContext(userDataDir, {
 *     args: ANTI_DETECTION_ARGS,
 *     ignoreDefaultArgs: IGNORE_DEFAULT_ARGS,
 *   });
 *   try {
 *     return await context.cookies();
 *   } finally {
 *     await context.close();
 *   }
 * });
 * ```
 */
export class BrowserProfileManager {
  private readonly tempRoot: string;
  private readonly scratchPrefix: string;
  private readonly logger: ProfileLogger;

  constructor(config?: ProfileConfig) {
    this.tempRoot = config?.tempRoot || os.tmpdir();
    this.scratchPrefix = config?.scratchPrefix || "nlm-auth-";
    this.logger = config?.logger || silentLogger;
  }

  /**
   * Create an empty, uniquely named scratch user-data dir
   */
  async createScratchDir(): Promise<string> {
    const scratchDir = await fs.mkdtemp(path.join(this.tempRoot, this.scratchPrefix));
    this.logger("debug", `Created scratch profile: ${scratchDir}`);
    return scratchDir;
  }

  /**
   * Copy the credential files of `profilePath` into `scratchDir`
   */
  async clone(profilePath: string, scratchDir: string): Promise<void> {
    await this.assertProfileExists(profilePath);
    this.logger("debug", `Copying profile data from: ${profilePath}`);

    const targetDir = path.join(scratchDir, SCRATCH_PROFILE_NAME);
    try {
      await fs.mkdir(targetDir, { recursive: true });
    } catch (error) {
      throw new ProfileCopyFailedError(
        `Failed to create profile directory: ${targetDir}`,
        SCRATCH_PROFILE_NAME,
        error
      );
    }

    for (const file of CREDENTIAL_FILES) {
      await this.copyCredentialFile(profilePath, targetDir, file);
    }

    try {
      await fs.writeFile(path.join(scratchDir, LOCAL_STATE_FILE), LOCAL_STATE_STUB, "utf-8");
      this.logger("debug", "Created minimal Local State file");
    } catch (error) {
      throw new ProfileCopyFailedError(
        `Failed to write ${LOCAL_STATE_FILE}: ${describeError(error)}`,
        LOCAL_STATE_FILE,
        error
      );
    }
  }

  /**
   * Delete a scratch user-data dir and everything in it
   */
  async removeScratchDir(scratchDir: string): Promise<void> {
    // Chrome may still be releasing file handles right after exit
    await fs.rm(scratchDir, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
    this.logger("debug", `Removed scratch profile: ${scratchDir}`);
  }

  /**
   * Run `fn` against a fresh clone of `profilePath`.
   * The scratch dir is removed whether `fn` resolves or throws.
   */
  async withScratchProfile<T>(
    profilePath: string,
    fn: (scratchDir: string) => Promise<T>
  ): Promise<T> {
    const scratchDir = await this.createScratchDir();

    let result: T;
    try {
      await this.clone(profilePath, scratchDir);
      result = await fn(scratchDir);
    } catch (error) {
      await this.removeScratchDir(scratchDir).catch((cleanupError: unknown) => {
        this.logger(
          "warn",
          `Failed to remove scratch profile ${scratchDir}: ${describeError(cleanupError)}`
        );
      });
      throw error;
    }

    await this.removeScratchDir(scratchDir);
    return result;
  }

  private async assertProfileExists(profilePath: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(profilePath)).isDirectory();
    } catch (error) {
      if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
        throw new ProfileNotFoundError(profilePath, error);
      }
      throw new ProfileCopyFailedError(
        `Failed to read profile directory ${profilePath}: ${describeError(error)}`,
        profilePath,
        error
      );
    }

    if (!isDirectory) {
      throw new ProfileNotFoundError(profilePath);
    }
  }

  private async copyCredentialFile(
    profilePath: string,
    targetDir: string,
    file: string
  ): Promise<void> {
    try {
      await fs.copyFile(path.join(profilePath, file), path.join(targetDir, file));
      this.logger("debug", `Copied: ${file}`);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        this.logger("debug", `Skipping non-existent file: ${file}`);
        return;
      }
      throw new ProfileCopyFailedError(
        `Failed to copy ${file}: ${describeError(error)}`,
        file,
        error
      );
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
