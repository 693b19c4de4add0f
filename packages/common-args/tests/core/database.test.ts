import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";

import {
  InstalledDatabase,
  InstalledSpec,
  compareVersions,
  contentHash,
  loadDatabase,
  versionSatisfies,
} from "../../src/core/database.js";
import { ConfigError } from "../../src/core/errors.js";
import { parseSpecs } from "../../src/core/spec-parser.js";
import { FIXTURE_ROOT, cleanupTempDir, createTempDir } from "../helpers.js";

import type { QueryFilters, UnresolvedSpec } from "../../src/types/index.js";

function spec(text: string): UnresolvedSpec {
  const [parsed] = parseSpecs([text]);
  if (!parsed) throw new Error(`no spec in "${text}"`);
  return parsed;
}

describe("compareVersions", () => {
  it("compares numeric segments as numbers", () => {
    expect(compareVersions("1.10", "1.9")).toBeGreaterThan(0);
    expect(compareVersions("1.2.11", "1.2.13")).toBeLessThan(0);
    expect(compareVersions("3.0", "3.0")).toBe(0);
  });

  it("orders a prefix before its extensions", () => {
    expect(compareVersions("1.2", "1.2.1")).toBeLessThan(0);
  });

  it("orders words before numbers", () => {
    expect(compareVersions("1.develop", "1.0")).toBeLessThan(0);
  });
});

describe("versionSatisfies", () => {
  it("matches a version prefix", () => {
    expect(versionSatisfies("1.2.11", "1.2")).toBe(true);
    expect(versionSatisfies("1.2", "1.2")).toBe(true);
    expect(versionSatisfies("1.20", "1.2")).toBe(false);
  });

  it("matches inclusive ranges", () => {
    expect(versionSatisfies("1.3", "1.2:1.4")).toBe(true);
    expect(versionSatisfies("1.4.7", "1.2:1.4")).toBe(true);
    expect(versionSatisfies("1.5", "1.2:1.4")).toBe(false);
    expect(versionSatisfies("1.1", "1.2:1.4")).toBe(false);
  });

  it("matches ranges open at either end", () => {
    expect(versionSatisfies("9.0", "3.0:")).toBe(true);
    expect(versionSatisfies("0.1", ":3.0")).toBe(true);
    expect(versionSatisfies("2.9", "3.0:")).toBe(false);
  });
});

describe("InstalledSpec", () => {
  const zlib = new InstalledSpec({
    name: "zlib",
    version: "1.2.11",
    variants: { shared: true, pic: true },
    compiler: "gcc@9.3.0",
    hash: "3kq7m2xw5tzvb9rp",
  });

  it("formats as name@version+variants%compiler", () => {
    expect(zlib.format()).toBe("zlib@1.2.11+pic+shared%gcc@9.3.0");
  });

  it("is explicit unless recorded otherwise", () => {
    expect(zlib.explicit).toBe(true);
  });

  it("satisfies matching specs", () => {
    expect(zlib.satisfies(spec("zlib"))).toBe(true);
    expect(zlib.satisfies(spec("zlib@1.2+shared"))).toBe(true);
    expect(zlib.satisfies(spec("%gcc@9"))).toBe(true);
    expect(zlib.satisfies(spec("/3kq7"))).toBe(true);
  });

  it("rejects specs it does not meet", () => {
    expect(zlib.satisfies(spec("openssl"))).toBe(false);
    expect(zlib.satisfies(spec("zlib~shared"))).toBe(false);
    expect(zlib.satisfies(spec("zlib%clang"))).toBe(false);
    expect(zlib.satisfies(spec("zlib%gcc@12"))).toBe(false);
    expect(zlib.satisfies(spec("/h6dn"))).toBe(false);
  });

  it("hashes its content when no hash is recorded", () => {
    const record = { name: "zlib", version: "1.2.11" };
    const pkg = new InstalledSpec(record);

    expect(pkg.hash).toBe(contentHash(record));
    expect(pkg.hash).toMatch(/^[0-9a-f]{32}$/);
    expect(contentHash({ name: "zlib", version: "1.2.13" })).not.toBe(pkg.hash);
  });

  it("orders by name, then version", () => {
    const older = new InstalledSpec({ name: "zlib", version: "1.2.9", hash: "zzzz" });
    const ssl = new InstalledSpec({ name: "openssl", version: "3.0.8", hash: "aaaa" });

    expect(ssl.compare(zlib)).toBeLessThan(0);
    expect(older.compare(zlib)).toBeLessThan(0);
    expect(zlib.compare(zlib)).toBe(0);
  });
});

describe("InstalledDatabase", () => {
  const database = new InstalledDatabase([
    { name: "zlib", version: "1.2.13", tags: ["compression"], hash: "bbb" },
    { name: "zlib", version: "1.2.11", tags: ["compression", "legacy"], hash: "aaa" },
    { name: "cmake", version: "3.26.3", explicit: false, hash: "ccc" },
  ]);

  function hashes(specText?: string, filters: QueryFilters = {}): string[] {
    return database.query(specText ? spec(specText) : undefined, filters).map((p) => p.hash);
  }

  it("returns every package in order for no spec", () => {
    expect(hashes()).toEqual(["ccc", "aaa", "bbb"]);
    expect(database.all().map((p) => p.hash)).toEqual(["ccc", "aaa", "bbb"]);
  });

  it("filters by spec", () => {
    expect(hashes("zlib@1.2.13")).toEqual(["bbb"]);
  });

  it("filters by caller hashes", () => {
    expect(hashes(undefined, { hashes: new Set(["aaa", "ccc"]) })).toEqual(["ccc", "aaa"]);
  });

  it("requires membership in both hash sets", () => {
    expect(
      hashes(undefined, {
        hashes: new Set(["aaa", "ccc"]),
        environmentHashes: new Set(["aaa", "bbb"]),
      }),
    ).toEqual(["aaa"]);
  });

  it("filters by explicit installs", () => {
    expect(hashes(undefined, { explicit: false })).toEqual(["ccc"]);
    expect(hashes(undefined, { explicit: true })).toEqual(["aaa", "bbb"]);
  });

  it("requires every requested tag", () => {
    expect(hashes(undefined, { tags: ["compression"] })).toEqual(["aaa", "bbb"]);
    expect(hashes(undefined, { tags: ["compression", "legacy"] })).toEqual(["aaa"]);
  });
});

describe("loadDatabase", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tmpDir);
  });

  it("reads the index file", () => {
    const database = loadDatabase(path.join(FIXTURE_ROOT, "index.yaml"));

    expect(database.all().map((p) => p.format())).toEqual([
      "cmake@3.26.3%gcc@12.1.0",
      "openssl@3.0.8%gcc@12.1.0",
      "zlib@1.2.11+pic+shared%gcc@9.3.0",
      "zlib@1.2.13~shared%gcc@12.1.0",
    ]);
  });

  it("treats a missing index as an empty database", () => {
    expect(loadDatabase(path.join(tmpDir, "index.yaml")).all()).toEqual([]);
  });

  it("reads numeric versions as strings", () => {
    const file = path.join(tmpDir, "index.yaml");
    fs.writeFileSync(file, "packages:\n  - name: bzip2\n    version: 1.5\n    hash: abc\n");

    expect(loadDatabase(file).all()[0]?.version).toBe("1.5");
  });

  it("rejects an index without a packages list", () => {
    const file = path.join(tmpDir, "index.yaml");
    fs.writeFileSync(file, "installed: []\n");

    expect(() => loadDatabase(file)).toThrow(`Invalid configuration at ${file}: expected a 'packages' list`);
  });

  it("rejects a malformed record", () => {
    const file = path.join(tmpDir, "index.yaml");
    fs.writeFileSync(file, "packages:\n  - name: zlib\n    version: '1.2'\n    hash: NOT-A-HASH\n");

    expect(() => loadDatabase(file)).toThrow(ConfigError);
    expect(() => loadDatabase(file)).toThrow("'packages[0].hash' must be lowercase alphanumeric");
  });
});
