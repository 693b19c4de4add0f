import type { FindResult } from "../commands/find.js";
import type { SettingsResult } from "../commands/settings.js";

const SHORT_HASH_LENGTH = 7;

export interface FindDisplay {
  long?: boolean;
  veryLong?: boolean;
}

export async function formatFindHuman(result: FindResult, display: FindDisplay = {}): Promise<string> {
  const chalk = (await import("chalk")).default;
  const lines: string[] = [];

  if (result.environment) {
    lines.push(chalk.dim(`==> In environment ${result.environment}`));
  }

  if (result.packages.length === 0) {
    lines.push(chalk.yellow("==> No package matches the query"));
    return lines.join("\n");
  }

  const noun = result.packages.length === 1 ? "package" : "packages";
  lines.push(chalk.bold(`==> ${result.packages.length} installed ${noun}`));

  for (const pkg of result.packages) {
    let hash = "";
    if (display.veryLong) hash = pkg.hash;
    else if (display.long) hash = pkg.hash.slice(0, SHORT_HASH_LENGTH);
    lines.push(hash ? `${chalk.dim(hash)} ${pkg.spec}` : pkg.spec);
  }

  return lines.join("\n");
}

function describeValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function flattenScope(data: Record<string, unknown>, prefix = ""): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    const path = prefix ? `${prefix}:${key}` : key;
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      lines.push(...flattenScope(Object.fromEntries(Object.entries(value)), path));
    } else {
      lines.push(`${path} = ${describeValue(value)}`);
    }
  }
  return lines;
}

export async function formatSettingsHuman(result: SettingsResult): Promise<string> {
  const chalk = (await import("chalk")).default;
  const lines: string[] = [];

  lines.push(chalk.bold("Build settings"));
  lines.push(`  jobs:        ${chalk.green(String(result.jobs))}`);
  lines.push(`  dirty:       ${result.dirty ? chalk.red("yes") : "no"}`);
  lines.push(`  deptype:     ${result.deptype.join(",")}`);
  lines.push(`  yes-to-all:  ${result.yesToAll ? "yes" : "no"}`);
  lines.push(`  no-checksum: ${result.noChecksum ? chalk.red("yes") : "no"}`);

  const scopeLines = flattenScope(result.commandLine);
  lines.push("");
  lines.push(chalk.bold("command_line scope"));
  if (scopeLines.length === 0) {
    lines.push(chalk.dim("  (empty)"));
  } else {
    for (const line of scopeLines) lines.push(`  ${line}`);
  }

  return lines.join("\n");
}
