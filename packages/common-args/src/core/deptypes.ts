import { InvalidDeptypeError } from "./errors.js";

import type { DeptypeVocabulary } from "../types/index.js";

export const ALL_DEPTYPES = ["build", "link", "run", "test"] as const;

export type Deptype = (typeof ALL_DEPTYPES)[number];

/** Sentinel accepted by `--deptype` meaning every known dependency type. */
export const ALL_DEPTYPES_MARKER = "all";

const KNOWN_DEPTYPES: ReadonlySet<string> = new Set(ALL_DEPTYPES);

function isDeptype(value: string): value is Deptype {
  return KNOWN_DEPTYPES.has(value);
}

/**
 * Validate a deptype selection and return it as a sorted, duplicate-free
 * tuple. `"all"` expands to every known type.
 */
export function canonicalDeptype(deptype: readonly string[] | "all"): readonly Deptype[] {
  if (deptype === ALL_DEPTYPES_MARKER) return ALL_DEPTYPES;

  const seen = new Set<Deptype>();
  for (const token of deptype) {
    if (!isDeptype(token)) {
      throw new InvalidDeptypeError(token);
    }
    seen.add(token);
  }
  return [...seen].sort();
}

export const deptypeVocabulary: DeptypeVocabulary = {
  allTypes: () => ALL_DEPTYPES,
  canonicalize: canonicalDeptype,
};
