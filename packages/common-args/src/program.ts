import { Command, Option } from "commander";

import { argsCommand } from "./commands/args.js";
import { FIND_ARGUMENTS, findCommand } from "./commands/find.js";
import { SETTINGS_ARGUMENTS, settingsCommand } from "./commands/settings.js";
import { commonArguments } from "./core/common-arguments.js";
import { createRuntime } from "./core/services.js";

import type { Runtime, ServiceOptions } from "./core/services.js";
import type { ArgumentRegistry } from "./core/registry.js";
import type { FindOptions, GlobalOptions, SettingsOptions } from "./types/index.js";

export interface ProgramOptions {
  version?: string;
  registry?: ArgumentRegistry;
  createRuntime?: (options: ServiceOptions) => Runtime;
  onExit?: (code: number) => void;
}

/** Common arguments each subcommand pulls from the registry. */
export const COMMAND_ARGUMENTS: Readonly<Record<string, readonly string[]>> = {
  find: FIND_ARGUMENTS,
  settings: SETTINGS_ARGUMENTS,
  args: [],
};

/**
 * Build the `pkgargs` program. Subcommand arguments are attached just
 * before a subcommand runs, once the global options say where
 * configuration lives.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const registry = options.registry ?? commonArguments;
  const makeRuntime = options.createRuntime ?? createRuntime;
  const exit = options.onExit ?? ((code: number) => process.exit(code));

  let runtime: Runtime | undefined;
  const requireRuntime = (): Runtime => {
    if (!runtime) throw new Error("runtime used before a subcommand was selected");
    return runtime;
  };

  const program = new Command();

  program
    .name("pkgargs")
    .description("Shared argument definitions for package-manager commands")
    .version(options.version ?? "0.0.0")
    .option("--root <dir>", "Directory holding index.yaml, config.yaml and environments/")
    .option("-e, --env <name>", "Activate an environment before running")
    .option("-d, --debug", "Write debug logs to <root>/logs/debug.log")
    .addOption(
      new Option("-f, --format <format>", "Output format")
        .choices(["human", "json"])
        .default("human"),
    );

  program.hook("preSubcommand", (thisCommand, subcommand) => {
    const globals = thisCommand.opts<GlobalOptions>();
    runtime = makeRuntime({ root: globals.root, env: globals.env, debug: globals.debug });
    registry.attach(subcommand, COMMAND_ARGUMENTS[subcommand.name()] ?? [], runtime.services);
  });

  const format = (): "human" | "json" => program.opts<GlobalOptions>().format ?? "human";

  program
    .command("find")
    .description("List installed packages matching a constraint")
    .action(async (_installedSpecs: string[], opts: FindOptions) => {
      const env = requireRuntime().environments.current();
      exit(await findCommand(opts, env?.name ?? null, format()));
    });

  program
    .command("settings")
    .description("Show the build settings the given flags resolve to")
    .action(async (opts: SettingsOptions) => {
      exit(await settingsCommand(opts, requireRuntime().config, format()));
    });

  program
    .command("args")
    .description("List every registered common argument")
    .action(async () => {
      exit(await argsCommand(registry, requireRuntime().services, format()));
    });

  return program;
}
