import { formatSettingsHuman } from "../formatters/human.js";
import { formatSettingsJson } from "../formatters/json.js";

import type { ConfigStore } from "../core/config.js";
import type { SettingsOptions } from "../types/index.js";

export const SETTINGS_ARGUMENTS = [
  "jobs",
  "dirty",
  "clean",
  "deptype",
  "yes_to_all",
  "no_checksum",
] as const;

export interface SettingsResult {
  jobs: number;
  dirty: boolean;
  deptype: string[];
  yesToAll: boolean;
  noChecksum: boolean;
  /** what the flags wrote into the command_line configuration scope */
  commandLine: Record<string, unknown>;
}

export function collectSettings(options: SettingsOptions, config: ConfigStore): SettingsResult {
  return {
    jobs: options.jobs,
    dirty: options.dirty,
    deptype: [...options.deptype],
    yesToAll: options.yesToAll,
    noChecksum: options.noChecksum,
    commandLine: config.scopeData("command_line"),
  };
}

export async function settingsCommand(
  options: SettingsOptions,
  config: ConfigStore,
  format: "human" | "json" = "human",
): Promise<number> {
  const result = collectSettings(options, config);

  if (format === "json") {
    console.log(formatSettingsJson(result));
  } else {
    console.log(await formatSettingsHuman(result));
  }
  return 0;
}
