import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";

import { ConfigStore, SCOPE_ORDER, loadConfig, loadScopeFile } from "../../src/core/config.js";
import { ConfigError } from "../../src/core/errors.js";
import { FIXTURE_ROOT, cleanupTempDir, createTempDir } from "../helpers.js";

describe("ConfigStore", () => {
  it("orders scopes from lowest to highest priority", () => {
    expect(SCOPE_ORDER).toEqual(["defaults", "site", "user", "command_line"]);
  });

  it("returns the default for a missing key", () => {
    const config = new ConfigStore();

    expect(config.get("config:build_jobs")).toBeUndefined();
    expect(config.get("config:build_jobs", 16)).toBe(16);
  });

  it("lets the highest scope holding a key win", () => {
    const config = new ConfigStore({
      defaults: { config: { build_jobs: 16 } },
      site: { config: { build_jobs: 8 } },
    });
    expect(config.get("config:build_jobs")).toBe(8);

    config.set("config:build_jobs", 2, "command_line");
    expect(config.get("config:build_jobs")).toBe(2);
  });

  it("reads a single scope when asked", () => {
    const config = new ConfigStore({ site: { config: { build_jobs: 8 } } });

    expect(config.get("config:build_jobs", undefined, "site")).toBe(8);
    expect(config.get("config:build_jobs", "none", "user")).toBe("none");
  });

  it("merges objects found in several scopes", () => {
    const config = new ConfigStore({
      defaults: { config: { dirty: false, build_jobs: 16 } },
      user: { config: { build_jobs: 4 } },
    });

    expect(config.get("config")).toEqual({ dirty: false, build_jobs: 4 });
  });

  it("stops merging at a scope holding a scalar", () => {
    const config = new ConfigStore({
      defaults: { mirrors: { main: "a" } },
      site: { mirrors: "none" },
      user: { mirrors: { backup: "b" } },
    });

    expect(config.get("mirrors")).toEqual({ backup: "b" });
  });

  it("creates intermediate mappings on set", () => {
    const config = new ConfigStore();
    config.set("modules:default:enable", ["tcl"], "user");

    expect(config.scopeData("user")).toEqual({ modules: { default: { enable: ["tcl"] } } });
  });

  it("returns copies", () => {
    const config = new ConfigStore({ site: { config: { build_jobs: 8 } } });
    const value = config.get("config");
    if (typeof value === "object" && value !== null) {
      Object.assign(value, { build_jobs: 1 });
    }

    expect(config.get("config:build_jobs")).toBe(8);
  });

  it("rejects an empty key", () => {
    expect(() => new ConfigStore().get("::")).toThrow('invalid configuration key "::"');
  });
});

describe("loadScopeFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tmpDir);
  });

  it("treats a missing file as an empty scope", () => {
    expect(loadScopeFile(path.join(tmpDir, "missing.yaml"))).toEqual({});
  });

  it("treats an empty file as an empty scope", () => {
    const file = path.join(tmpDir, "empty.yaml");
    fs.writeFileSync(file, "");

    expect(loadScopeFile(file)).toEqual({});
  });

  it("rejects a file whose top level is not a mapping", () => {
    const file = path.join(tmpDir, "list.yaml");
    fs.writeFileSync(file, "- one\n- two\n");

    expect(() => loadScopeFile(file)).toThrow(
      `Invalid configuration at ${file}: expected a mapping at the top level`,
    );
  });

  it("reports malformed YAML with the file path", () => {
    const file = path.join(tmpDir, "broken.yaml");
    fs.writeFileSync(file, "config: [unclosed\n");

    expect(() => loadScopeFile(file)).toThrow(ConfigError);
    expect(() => loadScopeFile(file)).toThrow(`Invalid configuration at ${file}:`);
  });
});

describe("loadConfig", () => {
  it("layers built-in defaults, site and user files", () => {
    const config = loadConfig({
      site: path.join(FIXTURE_ROOT, "config.yaml"),
      user: path.join(FIXTURE_ROOT, "no-such-user.yaml"),
    });

    expect(config.get("config:build_jobs")).toBe(4);
    expect(config.get("config:dirty")).toBe(false);
    expect(config.get("config:dirty", undefined, "defaults")).toBe(false);
    expect(config.scopeData("command_line")).toEqual({});
  });

  it("works without any files", () => {
    expect(loadConfig({}).get("config")).toEqual({ dirty: false });
  });
});
