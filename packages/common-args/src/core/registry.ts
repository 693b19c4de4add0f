import { attachArgument } from "./attach.js";
import { UnknownArgumentError } from "./errors.js";

import type { Command } from "commander";
import type {
  ArgumentBuilder,
  ArgumentBuilderFn,
  ArgumentServices,
} from "../types/index.js";

/**
 * Named argument definitions shared between commands.
 *
 * Builders are stored, not their results: every lookup runs the builder
 * again, so defaults read from configuration reflect the current state.
 * Populate once at startup and only read afterwards; registration is not
 * guarded against concurrent writers.
 */
export class ArgumentRegistry {
  private readonly builders = new Map<string, ArgumentBuilderFn>();

  /** Last registration under a name wins. */
  register(name: string, builder: ArgumentBuilderFn): this {
    this.builders.set(name, builder);
    return this;
  }

  has(name: string): boolean {
    return this.builders.has(name);
  }

  names(): string[] {
    return [...this.builders.keys()];
  }

  build(name: string, services: ArgumentServices, commandName = "<unknown>"): ArgumentBuilder {
    const builder = this.builders.get(name);
    if (!builder) {
      throw new UnknownArgumentError(name, commandName);
    }
    return builder(services);
  }

  /**
   * Add the named arguments to `command`, in order. An unregistered name
   * fails the whole call before the command is touched.
   */
  attach(command: Command, names: readonly string[], services: ArgumentServices): void {
    const missing = names.find((name) => !this.builders.has(name));
    if (missing !== undefined) {
      throw new UnknownArgumentError(missing, command.name());
    }

    for (const name of names) {
      const built = this.build(name, services, command.name());
      attachArgument(command, built, services);
      services.logger.log("registry", "attached argument", {
        argument: name,
        command: command.name(),
        flags: built.flags,
      });
    }
  }
}

export function createArgumentRegistry(): ArgumentRegistry {
  return new ArgumentRegistry();
}
