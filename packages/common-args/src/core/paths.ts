import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "common-args";

let _packageRoot: string | null = null;

// walk up from this module's location to find the package root
// works regardless of build output structure (dist/src/core/, dist/core/, etc.)
export function getPackageRoot(): string {
  if (_packageRoot) return _packageRoot;

  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    const pkgJsonPath = path.join(dir, "package.json");
    if (fs.existsSync(pkgJsonPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgJsonPath, "utf8"));
      if (typeof pkg === "object" && pkg !== null && "name" in pkg && pkg.name === PACKAGE_NAME) {
        _packageRoot = dir;
        return dir;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new Error(`Could not find ${PACKAGE_NAME} package root`);
}

/** Root holding index.yaml, config.yaml, environments/ and logs/. */
export function resolveRoot(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return path.resolve(explicit);
  if (env.PKGARGS_ROOT) return path.resolve(env.PKGARGS_ROOT);
  return path.join(os.homedir(), ".pkgargs");
}

export function getUserConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.PKGARGS_USER_CONFIG ?? path.join(os.homedir(), ".config", "pkgargs", "config.yaml");
}

export interface RootLayout {
  root: string;
  index: string;
  siteConfig: string;
  environments: string;
}

export function rootLayout(root: string): RootLayout {
  return {
    root,
    index: path.join(root, "index.yaml"),
    siteConfig: path.join(root, "config.yaml"),
    environments: path.join(root, "environments"),
  };
}
