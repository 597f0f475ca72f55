import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { lstatSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, saveConfig } from "../../src/alias/store.js";
import { createAlias, createConfig } from "../../src/alias/types.js";

describe("alias store", () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    tempDir = await mkdtemp(join(tmpdir(), "aliasmgr-store-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("returns an empty config when the file is missing", async () => {
    const config = await loadConfig(join(tempDir, "aliases.toml"));
    expect(config.aliases.size).toBe(0);
    expect(config.groups.size).toBe(0);
  });

  it("save/load round-trip preserves aliases, groups and order", async () => {
    const path = join(tempDir, "aliases.toml");
    const config = createConfig();
    config.aliases.set("ll", createAlias("ls -la"));
    config.groups.set("git", { enabled: false });
    config.aliases.set("gs", createAlias("git status", { group: "git", global: true }));

    await saveConfig(path, config);
    const loaded = await loadConfig(path);

    expect([...loaded.aliases]).toEqual([...config.aliases]);
    expect([...loaded.groups]).toEqual([...config.groups]);
  });

  it("creates missing parent directories and leaves no temp files", async () => {
    const dir = join(tempDir, "nested", "aliasmgr");
    const config = createConfig();
    config.aliases.set("ll", createAlias("ls -la"));

    await saveConfig(join(dir, "aliases.toml"), config);

    expect(await readdir(dir)).toEqual(["aliases.toml"]);
    expect(await readFile(join(dir, "aliases.toml"), "utf-8")).toBe("ll = \"ls -la\"\n");
  });

  it("writes through a symlinked alias file", async () => {
    const target = join(tempDir, "dotfiles", "aliases.toml");
    const link = join(tempDir, "aliases.toml");
    await mkdir(join(tempDir, "dotfiles"));
    await writeFile(target, "");
    await symlink(target, link);

    const config = createConfig();
    config.aliases.set("gs", createAlias("git status"));
    await saveConfig(link, config);

    expect(lstatSync(link).isSymbolicLink()).toBe(true);
    expect(await readFile(target, "utf-8")).toBe("gs = \"git status\"\n");
  });

  it("wraps read failures in FILE_IO", async () => {
    await expect(loadConfig(tempDir)).rejects.toMatchObject({ code: "FILE_IO" });
  });

  it("wraps write failures in FILE_IO", async () => {
    const blocker = join(tempDir, "file");
    await writeFile(blocker, "");
    await expect(saveConfig(join(blocker, "aliases.toml"), createConfig())).rejects.toMatchObject({
      code: "FILE_IO",
    });
  });

  it("surfaces malformed content", async () => {
    const path = join(tempDir, "aliases.toml");
    await writeFile(path, "ll = [1, 2]\n");
    await expect(loadConfig(path)).rejects.toMatchObject({ code: "MALFORMED_CONFIG" });
  });
});
