/**
 * BrowserProfileManager - Unit Tests
 *
 * Runs against real temporary directories.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import {
  BrowserProfileManager,
  LOCAL_STATE_STUB,
} from "../../src/BrowserProfileManager.js";
import { ProfileCopyFailedError, ProfileNotFoundError } from "../../src/errors.js";

describe("BrowserProfileManager", () => {
  let workDir: string;
  let sourceProfile: string;
  let tempRoot: string;
  let manager: BrowserProfileManager;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "profile-manager-test-"));
    sourceProfile = path.join(workDir, "chrome", "Default");
    tempRoot = path.join(workDir, "tmp");
    await fs.mkdir(sourceProfile, { recursive: true });
    await fs.mkdir(tempRoot);
    await fs.writeFile(path.join(sourceProfile, "Cookies"), Buffer.from([0, 1, 2, 255]));
    await fs.writeFile(path.join(sourceProfile, "Web Data"), "web-data");
    await fs.writeFile(path.join(sourceProfile, "History"), "history");
    manager = new BrowserProfileManager({ tempRoot });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe("createScratchDir", () => {
    it("creates a prefixed directory under the temp root", async () => {
      const scratchDir = await manager.createScratchDir();

      expect(path.dirname(scratchDir)).toBe(tempRoot);
      expect(path.basename(scratchDir).startsWith("nlm-auth-")).toBe(true);
      expect(await fs.readdir(scratchDir)).toEqual([]);
    });

    it("honours a custom prefix", async () => {
      const custom = new BrowserProfileManager({ tempRoot, scratchPrefix: "scratch-" });
      const scratchDir = await custom.createScratchDir();

      expect(path.basename(scratchDir).startsWith("scratch-")).toBe(true);
    });
  });

  describe("clone", () => {
    it("copies credential files byte for byte and skips missing ones", async () => {
      const scratchDir = await manager.createScratchDir();
      await manager.clone(sourceProfile, scratchDir);

      const copied = (await fs.readdir(path.join(scratchDir, "Default"))).sort();
      expect(copied).toEqual(["Cookies", "Web Data"]);
      expect(await fs.readFile(path.join(scratchDir, "Default", "Cookies"))).toEqual(
        Buffer.from([0, 1, 2, 255])
      );
      expect(await fs.readFile(path.join(scratchDir, "Default", "Web Data"), "utf-8")).toBe(
        "web-data"
      );
    });

    it("writes the Local State stub at the scratch root", async () => {
      const scratchDir = await manager.createScratchDir();
      await manager.clone(sourceProfile, scratchDir);

      expect(await fs.readFile(path.join(scratchDir, "Local State"), "utf-8")).toBe(
        LOCAL_STATE_STUB
      );
      expect(JSON.parse(LOCAL_STATE_STUB)).toEqual({ os_crypt: { encrypted_key: "" } });
    });

    it("succeeds when no credential file exists", async () => {
      const emptyProfile = path.join(workDir, "chrome", "Profile 1");
      await fs.mkdir(emptyProfile);
      const scratchDir = await manager.createScratchDir();

      await manager.clone(emptyProfile, scratchDir);

      expect(await fs.readdir(path.join(scratchDir, "Default"))).toEqual([]);
      expect((await fs.readdir(scratchDir)).sort()).toEqual(["Default", "Local State"]);
    });

    it("leaves the source profile untouched", async () => {
      const before = (await fs.readdir(sourceProfile)).sort();
      const scratchDir = await manager.createScratchDir();

      await manager.clone(sourceProfile, scratchDir);

      expect((await fs.readdir(sourceProfile)).sort()).toEqual(before);
      expect(await fs.readFile(path.join(sourceProfile, "Web Data"), "utf-8")).toBe("web-data");
    });

    it("fails with ProfileNotFoundError and writes nothing when the profile is missing", async () => {
      const scratchDir = await manager.createScratchDir();
      const missing = path.join(workDir, "chrome", "Nope");

      await expect(manager.clone(missing, scratchDir)).rejects.toBeInstanceOf(ProfileNotFoundError);
      await expect(manager.clone(missing, scratchDir)).rejects.toMatchObject({
        code: "PROFILE_NOT_FOUND",
        profilePath: missing,
      });
      expect(await fs.readdir(scratchDir)).toEqual([]);
    });

    it("treats a regular file as a missing profile", async () => {
      const scratchDir = await manager.createScratchDir();
      const notADir = path.join(sourceProfile, "History");

      await expect(manager.clone(notADir, scratchDir)).rejects.toBeInstanceOf(ProfileNotFoundError);
    });

    it("fails with ProfileCopyFailedError when the Local State stub cannot be written", async () => {
      const scratchDir = await manager.createScratchDir();
      await fs.mkdir(path.join(scratchDir, "Local State"));

      await expect(manager.clone(sourceProfile, scratchDir)).rejects.toMatchObject({
        name: "ProfileCopyFailedError",
        code: "PROFILE_COPY_FAILED",
        file: "Local State",
      });
    });

    it("fails with ProfileCopyFailedError on copy errors other than a missing file", async () => {
      const denied = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
      vi.spyOn(fs, "copyFile").mockRejectedValueOnce(denied);
      const scratchDir = await manager.createScratchDir();

      const result = manager.clone(sourceProfile, scratchDir);

      await expect(result).rejects.toBeInstanceOf(ProfileCopyFailedError);
      await expect(result).rejects.toMatchObject({
        file: "Cookies",
        message: "Failed to copy Cookies: EACCES: permission denied",
        originalError: denied,
      });
      await expect(fs.stat(path.join(scratchDir, "Local State"))).rejects.toMatchObject({
        code: "ENOENT",
      });
    });

    it("logs skipped files at debug level", async () => {
      const logger = vi.fn();
      const logged = new BrowserProfileManager({ tempRoot, logger });
      const scratchDir = await logged.createScratchDir();

      await logged.clone(sourceProfile, scratchDir);

      expect(logger).toHaveBeenCalledWith("debug", "Skipping non-existent file: Login Data");
      expect(logger).toHaveBeenCalledWith("debug", "Copied: Cookies");
    });
  });

  describe("withScratchProfile", () => {
    it("hands a cloned scratch dir to the callback and removes it afterwards", async () => {
      let seen = "";
      const result = await manager.withScratchProfile(sourceProfile, async (scratchDir) => {
        seen = scratchDir;
        return fs.readdir(path.join(scratchDir, "Default"));
      });

      expect(result.sort()).toEqual(["Cookies", "Web Data"]);
      expect(seen).not.toBe("");
      expect(await fs.readdir(tempRoot)).toEqual([]);
    });

    it("removes the scratch dir when the callback throws", async () => {
      const failure = new Error("callback failed");

      await expect(
        manager.withScratchProfile(sourceProfile, async () => {
          throw failure;
        })
      ).rejects.toBe(failure);
      expect(await fs.readdir(tempRoot)).toEqual([]);
    });

    it("removes the scratch dir when cloning fails", async () => {
      const callback = vi.fn();

      await expect(
        manager.withScratchProfile(path.join(workDir, "missing"), callback)
      ).rejects.toBeInstanceOf(ProfileNotFoundError);
      expect(callback).not.toHaveBeenCalled();
      expect(await fs.readdir(tempRoot)).toEqual([]);
    });
  });
});
