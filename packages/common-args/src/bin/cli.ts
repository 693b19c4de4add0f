#!/usr/bin/env node
import { readFile } from "fs/promises";
import { join } from "path";

import { exitCodeOf } from "../core/errors.js";
import { getPackageRoot } from "../core/paths.js";
import { createProgram } from "../program.js";

const packageJsonContent = await readFile(
  join(getPackageRoot(), "package.json"),
  "utf8",
);
const packageJson: unknown = JSON.parse(packageJsonContent);
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : undefined;

const program = createProgram({ version });

try {
  await program.parseAsync();
} catch (err) {
  const chalk = (await import("chalk")).default;
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${message}`));
  process.exit(exitCodeOf(err));
}
