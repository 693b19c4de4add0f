import { destinationOf, isPositional } from "../core/attach.js";

import type { ArgumentRegistry } from "../core/registry.js";
import type { ArgumentServices } from "../types/index.js";

export interface ArgumentSummary {
  name: string;
  flags: string[];
  dest: string;
  positional: boolean;
  help: string;
}

export function describeArguments(
  registry: ArgumentRegistry,
  services: ArgumentServices,
): ArgumentSummary[] {
  return registry.names().map((name) => {
    const built = registry.build(name, services);
    return {
      name,
      flags: [...built.flags],
      dest: destinationOf(built),
      positional: isPositional(built),
      help: built.options.help ?? "",
    };
  });
}

export function formatArgs(entries: ArgumentSummary[]): string {
  const lines: string[] = [];

  lines.push("Common Arguments\n");

  const positionals = entries.filter((e) => e.positional);
  const options = entries.filter((e) => !e.positional);

  for (const [title, group] of [
    ["Positional", positionals],
    ["Options", options],
  ] as const) {
    if (group.length === 0) continue;

    lines.push(`${title} (${group.length}):`);
    for (const e of group) {
      lines.push(`  ${e.name}`);
      lines.push(`    ${e.flags.join(", ")} -> ${e.dest}`);
      if (e.help) lines.push(`    ${e.help}`);
      lines.push("");
    }
  }

  lines.push(`Total: ${entries.length} arguments`);

  return lines.join("\n");
}

export async function argsCommand(
  registry: ArgumentRegistry,
  services: ArgumentServices,
  format: "human" | "json" = "human",
): Promise<number> {
  const entries = describeArguments(registry, services);

  if (format === "json") {
    console.log(JSON.stringify(entries, null, 2));
    return 0;
  }

  const chalk = (await import("chalk")).default;
  const plain = formatArgs(entries);

  // bold header, underlined group titles, green names
  const colored = plain
    .replace(/^Common Arguments/m, chalk.bold("Common Arguments"))
    .replace(/^(\w+ \(\d+\):)$/gm, (match) => chalk.underline(match))
    .replace(/^ {2}(\w+)$/gm, (_match, name: string) => `  ${chalk.green(name)}`);

  console.log(colored);
  return 0;
}
