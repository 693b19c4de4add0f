import { loadConfig } from "./config.js";
import { loadDatabase } from "./database.js";
import { createLogger } from "./debug-logger.js";
import { deptypeVocabulary } from "./deptypes.js";
import { EnvironmentTracker } from "./environment.js";
import { hostHardware } from "./hardware.js";
import { getUserConfigPath, resolveRoot, rootLayout } from "./paths.js";
import { specParser } from "./spec-parser.js";

import type { ConfigStore } from "./config.js";
import type { InstalledDatabase } from "./database.js";
import type { ArgumentServices } from "../types/index.js";

export interface ServiceOptions {
  root?: string;
  env?: string;
  debug?: boolean;
  environ?: NodeJS.ProcessEnv;
}

export interface Runtime {
  root: string;
  services: ArgumentServices;
  config: ConfigStore;
  database: InstalledDatabase;
  environments: EnvironmentTracker;
}

/**
 * Wire the collaborators for one process. The active environment comes
 * from `env` or PKGARGS_ENV.
 */
export function createRuntime(options: ServiceOptions = {}): Runtime {
  const environ = options.environ ?? process.env;
  const root = resolveRoot(options.root, environ);
  const layout = rootLayout(root);

  const logger = createLogger(root, options.debug === true || environ.PKGARGS_DEBUG === "1");
  const config = loadConfig(
    { site: layout.siteConfig, user: getUserConfigPath(environ) },
    logger,
  );
  const database = loadDatabase(layout.index);
  const environments = new EnvironmentTracker(layout.environments);

  const envName = options.env ?? environ.PKGARGS_ENV;
  if (envName) {
    environments.activate(envName);
    logger.log("config", "environment activated", { environment: envName });
  }

  return {
    root,
    config,
    database,
    environments,
    services: {
      config,
      specParser,
      database,
      environments,
      hardware: hostHardware,
      deptypes: deptypeVocabulary,
      logger,
    },
  };
}
