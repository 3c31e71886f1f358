/**
 * @nlm-auth/browser-profile
 *
 * Locates a local Chrome profile and clones its credential files
 * into a throwaway user-data dir for automation.
 */

export {
  BrowserProfileManager,
  CREDENTIAL_FILES,
  SCRATCH_PROFILE_NAME,
  LOCAL_STATE_FILE,
  LOCAL_STATE_STUB,
  ANTI_DETECTION_ARGS,
  SESSION_ARGS,
  IGNORE_DEFAULT_ARGS,
  type ProfileConfig,
  type ProfileLogger,
} from "./BrowserProfileManager.js";

export {
  DEFAULT_PROFILE_NAME,
  getUserDataRoot,
  resolveProfilePath,
  type BrowserChannel,
  type LocateOptions,
} from "./ProfileLocator.js";

export {
  UnsupportedPlatformError,
  ProfileNotFoundError,
  ProfileCopyFailedError,
  isErrnoException,
} from "./errors.js";
