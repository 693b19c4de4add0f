import type { DeferredQuery } from "./arguments.js";

export interface GlobalOptions {
  root?: string;
  env?: string;
  debug?: boolean;
  format?: "human" | "json";
}

export interface FindOptions {
  long: boolean;
  veryLong: boolean;
  tags?: string[];
  constraint: string[];
  specs: DeferredQuery;
}

export interface SettingsOptions {
  jobs: number;
  dirty: boolean;
  deptype: readonly string[];
  yesToAll: boolean;
  noChecksum: boolean;
}
