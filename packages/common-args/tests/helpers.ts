/**
 * Shared test utilities for common-args tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { Command } from "commander";

import { ConfigStore } from "../src/core/config.js";
import { createNoopLogger } from "../src/core/debug-logger.js";
import { deptypeVocabulary } from "../src/core/deptypes.js";
import { InstalledDatabase } from "../src/core/database.js";
import { EnvironmentTracker } from "../src/core/environment.js";
import { specParser } from "../src/core/spec-parser.js";

import type { ArgumentServices, HardwareInfo, ResolvedPackage } from "../src/types/index.js";

export const FIXTURE_ROOT = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures", "root");

export function createTempDir(prefix = "common-args-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(tmpDir: string): void {
  fs.rmSync(tmpDir, { recursive: true, force: true });
}

export function fixedHardware(cores: number): HardwareInfo {
  return { availableParallelism: () => cores };
}

/** Services backed by in-memory collaborators; 8 cores unless overridden. */
export function fakeServices(overrides: Partial<ArgumentServices> = {}): ArgumentServices {
  return {
    config: new ConfigStore(),
    specParser,
    database: new InstalledDatabase([]),
    environments: new EnvironmentTracker(path.join(FIXTURE_ROOT, "environments")),
    hardware: fixedHardware(8),
    deptypes: deptypeVocabulary,
    logger: createNoopLogger(),
    ...overrides,
  };
}

/**
 * A command that throws instead of exiting and runs a no-op action, so
 * preAction hooks fire.
 */
export function testCommand(name = "test"): Command {
  return new Command(name)
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    .action(() => undefined);
}

export function parse(command: Command, argv: string[]): Record<string, unknown> {
  command.parse(argv, { from: "user" });
  return command.opts();
}

export class FakePackage implements ResolvedPackage {
  constructor(
    readonly name: string,
    readonly hash: string,
  ) {}

  compare(other: ResolvedPackage): number {
    if (other instanceof FakePackage && this.name !== other.name) {
      return this.name < other.name ? -1 : 1;
    }
    return this.hash < other.hash ? -1 : this.hash > other.hash ? 1 : 0;
  }
}

export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\u001b\[[0-9;]*m/g, "");
}
