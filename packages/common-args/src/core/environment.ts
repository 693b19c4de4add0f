import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";

import { ConfigError } from "./errors.js";

import type { Environment, EnvironmentAccessor } from "../types/index.js";

export class NamedEnvironment implements Environment {
  readonly name: string;
  private readonly hashes: ReadonlySet<string>;

  constructor(name: string, hashes: Iterable<string>) {
    this.name = name;
    this.hashes = new Set(hashes);
  }

  installedHashes(): ReadonlySet<string> {
    return this.hashes;
  }
}

export function environmentPath(environmentsDir: string, name: string): string {
  return path.join(environmentsDir, `${name}.yaml`);
}

/** Load `<dir>/<name>.yaml`, whose `installed` key lists package hashes. */
export function loadEnvironment(environmentsDir: string, name: string): NamedEnvironment {
  if (!/^[A-Za-z0-9_.-]+$/.test(name)) {
    throw new ConfigError(`invalid environment name "${name}"`);
  }
  const filePath = environmentPath(environmentsDir, name);
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`no environment named "${name}" in ${environmentsDir}`);
  }

  const parsed: unknown = yaml.load(fs.readFileSync(filePath, "utf8"));
  if (typeof parsed !== "object" || parsed === null || !("installed" in parsed)) {
    throw new ConfigError("expected an 'installed' list", filePath);
  }
  const installed = parsed.installed;
  if (!Array.isArray(installed) || !installed.every((h) => typeof h === "string")) {
    throw new ConfigError("'installed' must be a list of hashes", filePath);
  }
  return new NamedEnvironment(name, installed.map(String));
}

/**
 * Holds the active environment, if any. Commands activate one before
 * running; deferred queries read it when they are invoked.
 */
export class EnvironmentTracker implements EnvironmentAccessor {
  private active: Environment | null = null;

  constructor(private readonly environmentsDir: string) {}

  current(): Environment | null {
    return this.active;
  }

  activate(env: Environment | string): Environment {
    this.active = typeof env === "string" ? loadEnvironment(this.environmentsDir, env) : env;
    return this.active;
  }

  deactivate(): void {
    this.active = null;
  }
}
