import { InstalledSpec } from "../core/database.js";
import { SpecParseError } from "../core/errors.js";
import { formatFindHuman } from "../formatters/human.js";
import { formatFindJson } from "../formatters/json.js";

import type { FindOptions, ResolvedPackage } from "../types/index.js";

export const FIND_ARGUMENTS = ["long", "very_long", "tags", "constraint"] as const;

export interface PackageSummary {
  name: string;
  version: string;
  spec: string;
  hash: string;
}

export interface FindResult {
  constraint: string[];
  environment: string | null;
  packages: PackageSummary[];
}

function summarize(pkg: ResolvedPackage): PackageSummary {
  if (pkg instanceof InstalledSpec) {
    return { name: pkg.name, version: pkg.version, spec: pkg.format(), hash: pkg.hash };
  }
  return { name: pkg.hash, version: "", spec: pkg.hash, hash: pkg.hash };
}

export function runFind(options: FindOptions, environment: string | null): FindResult {
  const packages = options.specs(options.tags?.length ? { tags: options.tags } : {});
  return {
    constraint: [...options.constraint],
    environment,
    packages: packages.map(summarize),
  };
}

export async function findCommand(
  options: FindOptions,
  environment: string | null,
  format: "human" | "json" = "human",
): Promise<number> {
  let result: FindResult;
  try {
    result = runFind(options, environment);
  } catch (err) {
    // constraint tokens are only parsed now, when the query runs
    if (err instanceof SpecParseError) {
      console.error(`Error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }

  if (format === "json") {
    console.log(formatFindJson(result));
  } else {
    console.log(await formatFindHuman(result, { long: options.long, veryLong: options.veryLong }));
  }
  return 0;
}
