import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";

import {
  EnvironmentTracker,
  NamedEnvironment,
  environmentPath,
  loadEnvironment,
} from "../../src/core/environment.js";
import { ConfigError } from "../../src/core/errors.js";
import { FIXTURE_ROOT, cleanupTempDir, createTempDir } from "../helpers.js";

const ENVIRONMENTS = path.join(FIXTURE_ROOT, "environments");

describe("loadEnvironment", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tmpDir);
  });

  it("reads the installed hashes", () => {
    const env = loadEnvironment(ENVIRONMENTS, "dev");

    expect(env.name).toBe("dev");
    expect([...env.installedHashes()]).toEqual(["3kq7m2xw5tzvb9rp", "p0vgt5rk1mzx7nab"]);
  });

  it("fails for an unknown environment", () => {
    expect(() => loadEnvironment(ENVIRONMENTS, "prod")).toThrow(
      `no environment named "prod" in ${ENVIRONMENTS}`,
    );
  });

  it("refuses names that would leave the directory", () => {
    expect(() => loadEnvironment(ENVIRONMENTS, "../config")).toThrow(
      'invalid environment name "../config"',
    );
  });

  it("requires an installed list", () => {
    fs.writeFileSync(environmentPath(tmpDir, "empty"), "specs: []\n");
    fs.writeFileSync(environmentPath(tmpDir, "numbers"), "installed: [1, 2]\n");

    expect(() => loadEnvironment(tmpDir, "empty")).toThrow("expected an 'installed' list");
    expect(() => loadEnvironment(tmpDir, "numbers")).toThrow(ConfigError);
  });
});

describe("EnvironmentTracker", () => {
  it("starts with no active environment", () => {
    expect(new EnvironmentTracker(ENVIRONMENTS).current()).toBeNull();
  });

  it("activates by name or by value", () => {
    const tracker = new EnvironmentTracker(ENVIRONMENTS);

    expect(tracker.activate("dev").name).toBe("dev");
    expect(tracker.current()?.name).toBe("dev");

    const scratch = new NamedEnvironment("scratch", []);
    tracker.activate(scratch);
    expect(tracker.current()).toBe(scratch);
  });

  it("deactivates", () => {
    const tracker = new EnvironmentTracker(ENVIRONMENTS);
    tracker.activate("dev");
    tracker.deactivate();

    expect(tracker.current()).toBeNull();
  });
});
