// primary public API
export { ArgumentRegistry, createArgumentRegistry } from "./core/registry.js";
export { commonArguments, registerCommonArguments } from "./core/common-arguments.js";
export { attachArgument, destinationOf, isPositional } from "./core/attach.js";
export {
  ConstraintQuery,
  applyEffects,
  defaultJobCount,
  onConstraint,
  onDeptype,
  onJobCount,
  runAction,
  BUILD_JOBS_KEY,
  FALLBACK_BUILD_JOBS,
} from "./core/actions/index.js";
export { createProgram } from "./program.js";

// errors
export {
  ConfigError,
  InvalidDeptypeError,
  InvalidJobCountError,
  SpecParseError,
  UnknownArgumentError,
} from "./core/errors.js";

// bundled collaborators
export { ConfigStore, SCOPE_ORDER, loadConfig, loadScopeFile } from "./core/config.js";
export { ALL_DEPTYPES, canonicalDeptype, deptypeVocabulary } from "./core/deptypes.js";
export { InstalledDatabase, InstalledSpec, loadDatabase } from "./core/database.js";
export { EnvironmentTracker, NamedEnvironment, loadEnvironment } from "./core/environment.js";
export { formatSpec, parseSpecs, specParser } from "./core/spec-parser.js";
export { createLogger, createNoopLogger } from "./core/debug-logger.js";
export { createRuntime } from "./core/services.js";
export type { Runtime, ServiceOptions } from "./core/services.js";

// primary types
export type {
  ActionContext,
  ActionResult,
  ArgumentBuilder,
  ArgumentBuilderFn,
  ArgumentOptions,
  ArgumentServices,
  ConfigScopeName,
  ConfigScopes,
  DebugLogger,
  DeferredQuery,
  DeptypeVocabulary,
  Environment,
  EnvironmentAccessor,
  HardwareInfo,
  PackageDatabase,
  ParsingAction,
  QueryFilters,
  ResolvedPackage,
  SideEffect,
  SpecParser,
  UnresolvedSpec,
} from "./types/index.js";
