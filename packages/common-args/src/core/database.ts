import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as yaml from "js-yaml";

import { ConfigError } from "./errors.js";

import type {
  InstalledRecord,
  PackageDatabase,
  QueryFilters,
  ResolvedPackage,
  UnresolvedSpec,
  VariantValue,
} from "../types/index.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Versions ──────────────────────────────────────────────────

function versionSegments(version: string): (number | string)[] {
  return version
    .split(/[._-]/)
    .filter((s) => s.length > 0)
    .map((s) => (/^\d+$/.test(s) ? Number(s) : s));
}

/** Segment-wise comparison; numbers sort after words, `1.2` before `1.2.1`. */
export function compareVersions(a: string, b: string): number {
  const left = versionSegments(a);
  const right = versionSegments(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const l = left[i];
    const r = right[i];
    if (l === r || l === undefined || r === undefined) continue;
    if (typeof l === "number" && typeof r === "number") return l - r;
    if (typeof l === "number") return 1;
    if (typeof r === "number") return -1;
    return l < r ? -1 : 1;
  }
  return left.length - right.length;
}

function versionPrefixMatches(version: string, prefix: string): boolean {
  return version === prefix || version.startsWith(`${prefix}.`);
}

/** `1.2` matches 1.2 and 1.2.x; `1.2:1.4` is inclusive and open at an empty end. */
export function versionSatisfies(version: string, constraint: string): boolean {
  const colon = constraint.indexOf(":");
  if (colon === -1) return versionPrefixMatches(version, constraint);

  const low = constraint.slice(0, colon);
  const high = constraint.slice(colon + 1);
  if (low && compareVersions(version, low) < 0) return false;
  if (high && compareVersions(version, high) > 0 && !versionPrefixMatches(version, high)) {
    return false;
  }
  return true;
}

// ── Installed specs ───────────────────────────────────────────

function variantString(variants: Record<string, VariantValue>): string {
  return Object.keys(variants)
    .sort()
    .map((name) => {
      const value = variants[name];
      if (value === true) return `+${name}`;
      if (value === false) return `~${name}`;
      return ` ${name}=${String(value)}`;
    })
    .join("");
}

/** sha256 over the canonical form of a record, first 32 hex characters */
export function contentHash(record: InstalledRecord): string {
  const canonical = JSON.stringify({
    name: record.name,
    version: record.version,
    variants: variantString(record.variants ?? {}),
    compiler: record.compiler ?? null,
  });
  return crypto.createHash("sha256").update(canonical).digest("hex").slice(0, 32);
}

export class InstalledSpec implements ResolvedPackage {
  readonly name: string;
  readonly version: string;
  readonly variants: Readonly<Record<string, VariantValue>>;
  readonly compiler: string | undefined;
  readonly tags: readonly string[];
  readonly explicit: boolean;
  readonly hash: string;

  constructor(record: InstalledRecord) {
    this.name = record.name;
    this.version = record.version;
    this.variants = { ...(record.variants ?? {}) };
    this.compiler = record.compiler;
    this.tags = [...(record.tags ?? [])];
    this.explicit = record.explicit ?? true;
    this.hash = record.hash ?? contentHash(record);
  }

  compare(other: ResolvedPackage): number {
    if (!(other instanceof InstalledSpec)) {
      return this.hash < other.hash ? -1 : this.hash > other.hash ? 1 : 0;
    }
    if (this.name !== other.name) return this.name < other.name ? -1 : 1;
    const byVersion = compareVersions(this.version, other.version);
    if (byVersion !== 0) return byVersion;
    const mine = variantString(this.variants);
    const theirs = variantString(other.variants);
    if (mine !== theirs) return mine < theirs ? -1 : 1;
    if (this.hash === other.hash) return 0;
    return this.hash < other.hash ? -1 : 1;
  }

  satisfies(spec: UnresolvedSpec): boolean {
    if (spec.name !== undefined && spec.name !== this.name) return false;
    if (spec.versions !== undefined && !versionSatisfies(this.version, spec.versions)) {
      return false;
    }
    for (const [name, value] of Object.entries(spec.variants)) {
      if (this.variants[name] !== value) return false;
    }
    if (spec.compiler !== undefined && !this.compilerSatisfies(spec.compiler)) return false;
    if (spec.hash !== undefined && !this.hash.startsWith(spec.hash)) return false;
    return true;
  }

  /** `name@version+variants%compiler` */
  format(): string {
    let out = `${this.name}@${this.version}${variantString(this.variants)}`;
    if (this.compiler) out += `%${this.compiler}`;
    return out;
  }

  private compilerSatisfies(wanted: string): boolean {
    if (!this.compiler) return false;
    const [wantedName = "", wantedVersion] = wanted.split("@");
    const [name = "", version = ""] = this.compiler.split("@");
    if (wantedName !== name) return false;
    return wantedVersion === undefined || versionSatisfies(version, wantedVersion);
  }
}

// ── Database ──────────────────────────────────────────────────

function passesFilters(pkg: InstalledSpec, filters: QueryFilters): boolean {
  if (filters.hashes && !filters.hashes.has(pkg.hash)) return false;
  if (filters.environmentHashes && !filters.environmentHashes.has(pkg.hash)) return false;
  if (filters.explicit !== undefined && pkg.explicit !== filters.explicit) return false;
  if (filters.tags && !filters.tags.every((tag) => pkg.tags.includes(tag))) return false;
  return true;
}

/**
 * Installed packages read from an index file. Caller hashes and
 * environment hashes both restrict the result: a package must be in
 * every set given.
 */
export class InstalledDatabase implements PackageDatabase {
  private readonly packages: InstalledSpec[];

  constructor(records: readonly InstalledRecord[]) {
    this.packages = records.map((record) => new InstalledSpec(record));
  }

  query(spec: UnresolvedSpec | undefined, filters: QueryFilters = {}): InstalledSpec[] {
    return this.packages
      .filter((pkg) => (spec ? pkg.satisfies(spec) : true))
      .filter((pkg) => passesFilters(pkg, filters))
      .sort((a, b) => a.compare(b));
  }

  all(): InstalledSpec[] {
    return this.query(undefined);
  }
}

function validateRecord(entry: unknown, filePath: string, index: number): InstalledRecord {
  const where = `packages[${String(index)}]`;
  if (!isRecord(entry)) {
    throw new ConfigError(`'${where}' must be a mapping`, filePath);
  }
  if (typeof entry.name !== "string" || !entry.name) {
    throw new ConfigError(`'${where}.name' must be a non-empty string`, filePath);
  }
  // YAML reads 1.2 as a number
  if (typeof entry.version !== "string" && typeof entry.version !== "number") {
    throw new ConfigError(`'${where}.version' is required`, filePath);
  }

  const record: InstalledRecord = { name: entry.name, version: String(entry.version) };

  if (entry.variants != null) {
    if (!isRecord(entry.variants)) {
      throw new ConfigError(`'${where}.variants' must be a mapping`, filePath);
    }
    const variants: Record<string, VariantValue> = {};
    for (const [name, value] of Object.entries(entry.variants)) {
      variants[name] = typeof value === "boolean" ? value : String(value);
    }
    record.variants = variants;
  }
  if (entry.compiler != null) {
    if (typeof entry.compiler !== "string") {
      throw new ConfigError(`'${where}.compiler' must be a string`, filePath);
    }
    record.compiler = entry.compiler;
  }
  if (entry.tags != null) {
    if (!Array.isArray(entry.tags) || !entry.tags.every((t) => typeof t === "string")) {
      throw new ConfigError(`'${where}.tags' must be a list of strings`, filePath);
    }
    record.tags = entry.tags.map(String);
  }
  if (entry.explicit != null) {
    if (typeof entry.explicit !== "boolean") {
      throw new ConfigError(`'${where}.explicit' must be a boolean`, filePath);
    }
    record.explicit = entry.explicit;
  }
  if (entry.hash != null) {
    if (typeof entry.hash !== "string" || !/^[a-z0-9]+$/.test(entry.hash)) {
      throw new ConfigError(`'${where}.hash' must be lowercase alphanumeric`, filePath);
    }
    record.hash = entry.hash;
  }
  return record;
}

/** Read the index file. A missing file is an empty database. */
export function loadDatabase(indexPath: string): InstalledDatabase {
  if (!fs.existsSync(indexPath)) return new InstalledDatabase([]);

  const parsed: unknown = yaml.load(fs.readFileSync(indexPath, "utf8"));
  if (parsed === undefined || parsed === null) return new InstalledDatabase([]);
  if (!isRecord(parsed) || !Array.isArray(parsed.packages)) {
    throw new ConfigError("expected a 'packages' list", indexPath);
  }

  const records = parsed.packages.map((entry: unknown, i: number) =>
    validateRecord(entry, indexPath, i),
  );
  return new InstalledDatabase(records);
}
