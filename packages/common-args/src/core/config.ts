import * as fs from "node:fs";
import * as yaml from "js-yaml";

import { ConfigError } from "./errors.js";

import type { ConfigScopeName, ConfigScopes, DebugLogger } from "../types/index.js";

/** Lowest priority first. */
export const SCOPE_ORDER: readonly ConfigScopeName[] = [
  "defaults",
  "site",
  "user",
  "command_line",
];

const BUILTIN_DEFAULTS = {
  config: {
    dirty: false,
  },
};

type ScopeData = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScopeName(value: string): value is ConfigScopeName {
  return SCOPE_ORDER.some((scope) => scope === value);
}

function splitKey(key: string): string[] {
  const parts = key.split(":").filter((p) => p.length > 0);
  if (parts.length === 0) {
    throw new ConfigError(`invalid configuration key "${key}"`);
  }
  return parts;
}

function lookup(data: ScopeData, path: readonly string[]): { found: boolean; value: unknown } {
  let current: unknown = data;
  for (const part of path) {
    if (!isRecord(current) || !(part in current)) {
      return { found: false, value: undefined };
    }
    current = current[part];
  }
  return { found: true, value: current };
}

function deepMerge(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(over)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Priority-ordered configuration scopes. Keys are colon paths such as
 * `config:build_jobs`; the highest scope holding a key wins, and object
 * values present in several scopes are merged.
 */
export class ConfigStore implements ConfigScopes {
  private readonly scopes = new Map<ConfigScopeName, ScopeData>();

  constructor(initial: Partial<Record<ConfigScopeName, ScopeData>> = {}) {
    for (const scope of SCOPE_ORDER) {
      this.scopes.set(scope, clone(initial[scope] ?? {}));
    }
  }

  get(key: string, defaultValue?: unknown, scope?: ConfigScopeName): unknown {
    const path = splitKey(key);

    if (scope) {
      const hit = lookup(this.scopeOf(scope), path);
      return hit.found ? clone(hit.value) : defaultValue;
    }

    const hits: unknown[] = [];
    for (const name of SCOPE_ORDER) {
      const hit = lookup(this.scopeOf(name), path);
      if (hit.found) hits.push(hit.value);
    }
    if (hits.length === 0) return defaultValue;

    const top = hits[hits.length - 1];
    if (!isRecord(top)) return clone(top);

    // merge only the run of object values directly beneath the winner
    let merged: Record<string, unknown> = {};
    let start = hits.length - 1;
    while (start > 0 && isRecord(hits[start - 1])) start--;
    for (const value of hits.slice(start)) {
      if (isRecord(value)) merged = deepMerge(merged, value);
    }
    return clone(merged);
  }

  set(key: string, value: unknown, scope: ConfigScopeName): void {
    if (!isScopeName(scope)) {
      throw new ConfigError(`unknown configuration scope "${String(scope)}"`);
    }
    const path = splitKey(key);
    const leaf = path[path.length - 1] ?? "";
    let current = this.scopeOf(scope);
    for (const part of path.slice(0, -1)) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }
    current[leaf] = clone(value);
  }

  /** Copy of everything one scope holds. */
  scopeData(scope: ConfigScopeName): ScopeData {
    return clone(this.scopeOf(scope));
  }

  private scopeOf(scope: ConfigScopeName): ScopeData {
    const data = this.scopes.get(scope);
    if (!data) {
      throw new ConfigError(`unknown configuration scope "${String(scope)}"`);
    }
    return data;
  }
}

/** Parse one scope file. A missing file is an empty scope. */
export function loadScopeFile(filePath: string): ScopeData {
  if (!fs.existsSync(filePath)) return {};

  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(reason, filePath);
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError("expected a mapping at the top level", filePath);
  }
  return parsed;
}

export interface ConfigFiles {
  site?: string;
  user?: string;
}

export function loadConfig(files: ConfigFiles, logger?: DebugLogger): ConfigStore {
  const site = files.site ? loadScopeFile(files.site) : {};
  const user = files.user ? loadScopeFile(files.user) : {};
  logger?.log("config", "configuration loaded", { site: files.site, user: files.user });
  return new ConfigStore({ defaults: BUILTIN_DEFAULTS, site, user });
}
