import type { ResolvedPackage, UnresolvedSpec } from "./packages.js";

export type ConfigScopeName = "defaults" | "site" | "user" | "command_line";

export interface ConfigScopes {
  get(key: string, defaultValue?: unknown, scope?: ConfigScopeName): unknown;
  set(key: string, value: unknown, scope: ConfigScopeName): void;
}

export interface SpecParser {
  /** Throws SpecParseError on malformed input. */
  parse(tokens: readonly string[]): UnresolvedSpec[];
}

export interface QueryFilters {
  /** hashes requested by the caller */
  hashes?: ReadonlySet<string>;
  /** hashes installed in the active environment, added by the constraint query */
  environmentHashes?: ReadonlySet<string>;
  explicit?: boolean;
  tags?: readonly string[];
}

export interface PackageDatabase {
  query(spec: UnresolvedSpec | undefined, filters: QueryFilters): ResolvedPackage[];
}

export interface Environment {
  readonly name: string;
  installedHashes(): ReadonlySet<string>;
}

export interface EnvironmentAccessor {
  current(): Environment | null;
}

export interface HardwareInfo {
  availableParallelism(): number;
}

export interface DeptypeVocabulary {
  allTypes(): readonly string[];
  canonicalize(deptype: readonly string[] | "all"): readonly string[];
}

export type LogCategory = "registry" | "action" | "config" | "query" | "error";

export interface DebugLogger {
  log(category: LogCategory, message: string, data?: object): void;
}

/**
 * Everything argument builders and parsing actions may consult.
 * Passed explicitly so tests can swap any collaborator.
 */
export interface ArgumentServices {
  config: ConfigScopes;
  specParser: SpecParser;
  database: PackageDatabase;
  environments: EnvironmentAccessor;
  hardware: HardwareInfo;
  deptypes: DeptypeVocabulary;
  logger: DebugLogger;
}
