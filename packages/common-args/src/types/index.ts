export type {
  ActionContext,
  ActionResult,
  ArgumentBuilder,
  ArgumentBuilderFn,
  ArgumentOptions,
  DeferredQuery,
  Nargs,
  ParsingAction,
  SideEffect,
  StandardAction,
} from "./arguments.js";

export type {
  ArgumentServices,
  ConfigScopeName,
  ConfigScopes,
  DebugLogger,
  DeptypeVocabulary,
  Environment,
  EnvironmentAccessor,
  HardwareInfo,
  LogCategory,
  PackageDatabase,
  QueryFilters,
  SpecParser,
} from "./services.js";

export type {
  InstalledRecord,
  ResolvedPackage,
  UnresolvedSpec,
  VariantValue,
} from "./packages.js";

export type {
  FindOptions,
  GlobalOptions,
  SettingsOptions,
} from "./cli-options.js";
