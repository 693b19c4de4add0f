import { defaultJobCount } from "./actions/index.js";
import { ArgumentRegistry } from "./registry.js";

import type { ArgumentBuilder, ArgumentOptions } from "../types/index.js";

function args(flags: string | string[], options: ArgumentOptions = {}): ArgumentBuilder {
  return { flags: typeof flags === "string" ? [flags] : flags, options };
}

function dirtyDefault(value: unknown): boolean {
  return value === true;
}

/**
 * Register the arguments commands share. Specs take the rest of the
 * command line because one spec may span several words.
 */
export function registerCommonArguments(registry: ArgumentRegistry): ArgumentRegistry {
  return registry
    .register("constraint", () =>
      args("constraint", {
        nargs: "remainder",
        action: { kind: "constraint" },
        help: "constraint to select a subset of installed packages",
        metavar: "installed_specs",
      }),
    )
    .register("package", () => args("package", { help: "package name" }))
    .register("packages", () =>
      args("packages", { nargs: "+", help: "one or more package names", metavar: "package" }),
    )
    .register("spec", () => args("spec", { nargs: "remainder", help: "package spec" }))
    .register("specs", () =>
      args("specs", { nargs: "remainder", help: "one or more package specs" }),
    )
    .register("installed_spec", () =>
      args("spec", {
        nargs: "remainder",
        help: "installed package spec",
        metavar: "installed_spec",
      }),
    )
    .register("installed_specs", () =>
      args("specs", {
        nargs: "remainder",
        help: "one or more installed package specs",
        metavar: "installed_specs",
      }),
    )
    .register("yes_to_all", () =>
      args(["-y", "--yes-to-all"], {
        action: "store_true",
        dest: "yesToAll",
        help: 'assume "yes" is the answer to every confirmation request excluding --no-checksum',
      }),
    )
    .register("recurse_dependencies", () =>
      args(["-r", "--dependencies"], {
        action: "store_true",
        dest: "recurseDependencies",
        help: "recursively traverse spec dependencies",
      }),
    )
    .register("recurse_dependents", () =>
      args(["-R", "--dependents"], {
        action: "store_true",
        dest: "dependents",
        help: "also uninstall any packages that depend on the ones given via command line",
      }),
    )
    .register("clean", ({ config }) =>
      args("--clean", {
        action: "store_false",
        default: dirtyDefault(config.get("config:dirty")),
        dest: "dirty",
        help: "unset harmful variables in the build environment (default)",
      }),
    )
    .register("dirty", ({ config }) =>
      args("--dirty", {
        action: "store_true",
        default: dirtyDefault(config.get("config:dirty")),
        dest: "dirty",
        help: "preserve user environment in the build environment (danger!)",
      }),
    )
    .register("deptype", ({ deptypes }) =>
      args("--deptype", {
        action: { kind: "deptype" },
        default: deptypes.allTypes(),
        help: `comma-separated list of deptypes to traverse (default=${deptypes.allTypes().join(",")})`,
      }),
    )
    .register("long", () =>
      args(["-l", "--long"], {
        action: "store_true",
        help: "show dependency hashes as well as versions",
      }),
    )
    .register("very_long", () =>
      args(["-L", "--very-long"], {
        action: "store_true",
        help: "show full dependency hashes as well as versions",
      }),
    )
    .register("tags", () =>
      args(["-t", "--tags"], {
        action: "append",
        help: "filter a package query by tags",
      }),
    )
    .register("jobs", ({ config, hardware }) =>
      args(["-j", "--jobs"], {
        action: { kind: "jobs" },
        type: "int",
        dest: "jobs",
        computeDefault: () => defaultJobCount(config, hardware),
        help: "explicitly set number of parallel jobs",
      }),
    )
    .register("install_status", () =>
      args(["-I", "--install-status"], {
        action: "store_true",
        default: false,
        help:
          "show install status of packages. packages can be: installed [+], " +
          "missing and needed by an installed package [-], or not installed (no annotation)",
      }),
    )
    .register("no_checksum", () =>
      args(["-n", "--no-checksum"], {
        action: "store_true",
        default: false,
        help: "do not use checksums to verify downloaded files (unsafe)",
      }),
    );
}

/** Process-wide registry, filled once when this module loads. */
export const commonArguments = registerCommonArguments(new ArgumentRegistry());
