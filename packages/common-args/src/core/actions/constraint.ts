import type {
  ActionContext,
  ActionResult,
  ArgumentServices,
  DeferredQuery,
  QueryFilters,
  ResolvedPackage,
} from "../../types/index.js";

/**
 * Constraint tokens captured at parse time. Nothing is parsed or queried
 * until `resolve` runs: the active environment is only settled once the
 * command starts executing.
 */
export class ConstraintQuery {
  readonly tokens: readonly string[];

  constructor(tokens: readonly string[]) {
    this.tokens = [...tokens];
  }

  /**
   * Installed packages matching any of the constraint specs, each once,
   * in the packages' own order. No tokens means every package the
   * database returns for `filters`.
   *
   * Throws SpecParseError if a token is not a valid spec.
   */
  resolve(services: ArgumentServices, filters: QueryFilters = {}): ResolvedPackage[] {
    const { database, environments, logger } = services;
    const qspecs = services.specParser.parse(this.tokens);

    // the environment narrows the search; caller hashes travel alongside
    const env = environments.current();
    const effective: QueryFilters = env
      ? { ...filters, environmentHashes: env.installedHashes() }
      : filters;

    logger.log("query", "resolving constraint", {
      tokens: this.tokens,
      environment: env?.name ?? null,
    });

    if (qspecs.length === 0) {
      return database.query(undefined, effective);
    }

    const matches = new Map<string, ResolvedPackage>();
    for (const spec of qspecs) {
      for (const pkg of database.query(spec, effective)) {
        matches.set(pkg.hash, pkg);
      }
    }

    return [...matches.values()].sort((a, b) => a.compare(b));
  }

  bind(services: ArgumentServices): DeferredQuery {
    return (filters?: QueryFilters) => this.resolve(services, filters);
  }
}

export function onConstraint(context: ActionContext, tokens: readonly string[]): ActionResult {
  const query = new ConstraintQuery(tokens);
  return {
    updates: {
      constraint: query.tokens,
      specs: query.bind(context.services),
    },
    effects: [],
  };
}
