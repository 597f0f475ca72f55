import { afterEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { getConfigDir, getConfigPath, loadEnvFile } from "../../src/config/paths.js";

describe("getConfigPath", () => {
  it("prefers ALIASMGR_CONFIG_PATH", () => {
    expect(getConfigPath({ ALIASMGR_CONFIG_PATH: "/srv/aliases.toml", XDG_CONFIG_HOME: "/xdg" }))
      .toBe("/srv/aliases.toml");
  });

  it("resolves a relative ALIASMGR_CONFIG_PATH from the working directory", () => {
    expect(getConfigPath({ ALIASMGR_CONFIG_PATH: "my-aliases.toml" }))
      .toBe(resolve(process.cwd(), "my-aliases.toml"));
  });

  it("uses XDG_CONFIG_HOME when set", () => {
    expect(getConfigPath({ XDG_CONFIG_HOME: "/xdg" })).toBe("/xdg/aliasmgr/aliases.toml");
  });

  it("falls back to ~/.config", () => {
    expect(getConfigPath({})).toBe(join(homedir(), ".config", "aliasmgr", "aliases.toml"));
    expect(getConfigDir({ XDG_CONFIG_HOME: "" })).toBe(join(homedir(), ".config", "aliasmgr"));
  });
});

describe("loadEnvFile", () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    delete process.env.ALIASMGR_TEST_VALUE;
    if (tempDir) await rm(tempDir, { recursive: true, force: true });
  });

  it("loads variables from .env in the config directory", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "aliasmgr-env-test-"));
    await mkdir(join(tempDir, "aliasmgr"));
    await writeFile(join(tempDir, "aliasmgr", ".env"), "ALIASMGR_TEST_VALUE=from-env-file\n");

    loadEnvFile({ XDG_CONFIG_HOME: tempDir });

    expect(process.env.ALIASMGR_TEST_VALUE).toBe("from-env-file");
  });

  it("does not override variables already set", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "aliasmgr-env-test-"));
    await mkdir(join(tempDir, "aliasmgr"));
    await writeFile(join(tempDir, "aliasmgr", ".env"), "ALIASMGR_TEST_VALUE=from-env-file\n");
    process.env.ALIASMGR_TEST_VALUE = "from-shell";

    loadEnvFile({ XDG_CONFIG_HOME: tempDir });

    expect(process.env.ALIASMGR_TEST_VALUE).toBe("from-shell");
  });

  it("is a no-op without a .env file", () => {
    expect(() => loadEnvFile({ XDG_CONFIG_HOME: "/nonexistent-aliasmgr-dir" })).not.toThrow();
  });
});
