import type { FindResult } from "../commands/find.js";
import type { SettingsResult } from "../commands/settings.js";

export function formatFindJson(result: FindResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatSettingsJson(result: SettingsResult): string {
  return JSON.stringify(result, null, 2);
}
