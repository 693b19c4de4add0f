import type { ArgumentServices, ConfigScopeName, QueryFilters } from "./services.js";
import type { ResolvedPackage } from "./packages.js";

export type ParsingAction =
  | { kind: "constraint" }
  | { kind: "jobs" }
  | { kind: "deptype" };

export type StandardAction = "store" | "store_true" | "store_false" | "append";

export type Nargs = "?" | "+" | "remainder";

export interface ArgumentOptions {
  action?: StandardAction | ParsingAction;
  nargs?: Nargs;
  type?: "int";
  default?: unknown;
  /**
   * evaluated on every parse that leaves the destination unset; never stored.
   * Per command instance: commander keeps values from an earlier parse of
   * the same command, so a reparse without the flag sees the old value.
   */
  computeDefault?: () => unknown;
  help?: string;
  metavar?: string;
  dest?: string;
}

/**
 * Flags and keyword options for one argument. Flags starting with `-`
 * describe an option (`["-j", "--jobs"]`), a single bare name a
 * positional (`["constraint"]`).
 */
export interface ArgumentBuilder {
  readonly flags: readonly string[];
  readonly options: Readonly<ArgumentOptions>;
}

export type ArgumentBuilderFn = (services: ArgumentServices) => ArgumentBuilder;

export interface ActionContext {
  /** destination the action writes its primary value to */
  dest: string;
  /** flag as shown to the user, e.g. `--jobs`; the positional name otherwise */
  flag: string;
  services: ArgumentServices;
}

export type SideEffect = {
  kind: "config-set";
  key: string;
  value: unknown;
  scope: ConfigScopeName;
};

export interface ActionResult {
  updates: Record<string, unknown>;
  effects: SideEffect[];
}

/**
 * Deferred query installed under `specs` by the constraint action.
 * Throws SpecParseError when invoked if a constraint token is malformed.
 */
export type DeferredQuery = (filters?: QueryFilters) => ResolvedPackage[];
