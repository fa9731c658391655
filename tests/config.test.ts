import { existsSync, mkdirSync, mkdtempSync, rmSync } from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ensureDataDirectories, FatalConfigurationError, resolvePaths } from "../src/lib/config";
import { logger, resolveLogLevel } from "../src/lib/log";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("logging", () => {
  it("resolves levels case-insensitively with an info default", () => {
    expect(resolveLogLevel(" WARN ")).toBe("warn");
    expect(resolveLogLevel("loud")).toBe("info");
    expect(resolveLogLevel(undefined)).toBe("info");
  });

  it("drops messages below the configured level", () => {
    vi.stubEnv("CALC_LOG_LEVEL", "error");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.warn("quiet");
    logger.fatal("boom");

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[fatal] boom");
  });
});

describe("data paths", () => {
  it("lays out the data directory", () => {
    const paths = resolvePaths("/srv/calc");
    expect(paths.metadataDir).toBe(path.join("/srv/calc", "metadata"));
    expect(paths.savesDir).toBe(path.join("/srv/calc", "saves"));
    expect(paths.creationSettingsPath).toBe(path.join("/srv/calc", "creation-settings.json"));
  });

  it("requires the metadata directory and creates the rest", () => {
    const root = mkdtempSync(path.join(os.tmpdir(), "paths-"));
    try {
      const paths = resolvePaths(root);
      expect(() => ensureDataDirectories(paths)).toThrow(FatalConfigurationError);

      mkdirSync(paths.metadataDir);
      ensureDataDirectories(paths);
      expect([paths.addendaDir, paths.savesDir, paths.legacyDir].every((dir) => existsSync(dir))).toBe(true);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });
});
