import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  activeStatements,
  aliasStatement,
  diffStatements,
  quoteSingle,
  selectAliases,
  syncScript,
  unaliasStatement,
} from "../../src/shell/projector.js";
import type { AliasConfig } from "../../src/alias/types.js";
import { createAlias, createConfig } from "../../src/alias/types.js";

function sampleConfig(): AliasConfig {
  const config = createConfig();
  config.aliases.set("ll", createAlias("ls -la"));
  config.aliases.set("G", createAlias("| grep", { global: true }));
  config.aliases.set("x", createAlias("exit", { enabled: false }));
  config.groups.set("git", { enabled: true });
  config.groups.set("docker", { enabled: false });
  config.aliases.set("gs", createAlias("git status", { group: "git" }));
  config.aliases.set("dps", createAlias("docker ps", { group: "docker" }));
  return config;
}

describe("shell statements", () => {
  it("quotes commands with single quotes", () => {
    expect(quoteSingle("it's")).toBe("'it'\\''s'");
    expect(aliasStatement("say", createAlias("echo 'hi there'"), "bash"))
      .toBe("alias say='echo '\\''hi there'\\'''");
  });

  it("uses alias -g for zsh globals and skips them on bash", () => {
    const global = createAlias("| less", { global: true });
    expect(aliasStatement("L", global, "zsh")).toBe("alias -g L='| less'");
    expect(aliasStatement("L", global, "bash")).toBeUndefined();
  });

  it("unaliases by quoted name", () => {
    expect(unaliasStatement("ll")).toBe("unalias 'll'");
  });
});

describe("syncScript", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("starts with unalias -a and hides disabled aliases and groups", () => {
    expect(syncScript(sampleConfig(), "bash")).toBe(
      ["unalias -a", "alias ll='ls -la'", "alias gs='git status'"].join("\n"),
    );
  });

  it("includes globals on zsh", () => {
    expect(syncScript(sampleConfig(), "zsh")).toBe(
      ["unalias -a", "alias ll='ls -la'", "alias -g G='| grep'", "alias gs='git status'"].join("\n"),
    );
  });

  it("is only unalias -a for an empty config", () => {
    expect(syncScript(createConfig(), "zsh")).toBe("unalias -a");
  });

  it("lists active statements by name", () => {
    expect([...activeStatements(sampleConfig(), "bash").keys()]).toEqual(["ll", "gs"]);
  });
});

describe("diffStatements", () => {
  it("emits removals first, then new and changed definitions", () => {
    const before = new Map([
      ["a", "alias a='1'"],
      ["b", "alias b='2'"],
      ["c", "alias c='3'"],
    ]);
    const after = new Map([
      ["c", "alias c='33'"],
      ["a", "alias a='1'"],
      ["d", "alias d='4'"],
    ]);
    expect(diffStatements(before, after)).toEqual(["unalias 'b'", "alias c='33'", "alias d='4'"]);
  });
});

describe("selectAliases", () => {
  const names = (sections: ReturnType<typeof selectAliases>) =>
    sections.map(section => [section.group, section.aliases.map(entry => entry.name)]);

  it("returns ungrouped first, then groups in order", () => {
    expect(names(selectAliases(sampleConfig(), "bash"))).toEqual([
      [undefined, ["ll", "G", "x"]],
      ["git", ["gs"]],
      ["docker", ["dps"]],
    ]);
  });

  it("filters by pattern", () => {
    expect(names(selectAliases(sampleConfig(), "bash", { pattern: "*s" }))).toEqual([
      ["git", ["gs"]],
      ["docker", ["dps"]],
    ]);
  });

  it("filters by effective state", () => {
    expect(names(selectAliases(sampleConfig(), "bash", { state: "disabled" }))).toEqual([
      [undefined, ["x"]],
      ["docker", ["dps"]],
    ]);
    expect(names(selectAliases(sampleConfig(), "bash", { state: "enabled" }))).toEqual([
      [undefined, ["ll", "G"]],
      ["git", ["gs"]],
    ]);
  });

  it("filters by group", () => {
    expect(names(selectAliases(sampleConfig(), "bash", { group: { kind: "named", name: "git" } })))
      .toEqual([["git", ["gs"]]]);
    expect(names(selectAliases(sampleConfig(), "bash", { group: { kind: "ungrouped" } })))
      .toEqual([[undefined, ["ll", "G", "x"]]]);
    expect(() => selectAliases(sampleConfig(), "bash", { group: { kind: "named", name: "nope" } }))
      .toThrow(expect.objectContaining({ code: "GROUP_NOT_FOUND" }));
  });

  it("returns no global aliases on bash", () => {
    expect(selectAliases(sampleConfig(), "bash", { global: true })).toEqual([]);
    expect(names(selectAliases(sampleConfig(), "zsh", { global: true }))).toEqual([[undefined, ["G"]]]);
  });

  it("marks disabled group sections", () => {
    const sections = selectAliases(sampleConfig(), "bash", { group: { kind: "named", name: "docker" } });
    expect(sections[0]?.enabled).toBe(false);
  });
});
