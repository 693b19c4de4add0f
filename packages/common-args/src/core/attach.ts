import { Argument, InvalidArgumentError, Option } from "commander";

import { applyEffects, runAction } from "./actions/index.js";

import type { Command } from "commander";
import type {
  ActionContext,
  ArgumentBuilder,
  ArgumentOptions,
  ArgumentServices,
  ParsingAction,
} from "../types/index.js";

/** value source recorded for defaults computed at parse time */
const COMPUTED_SOURCE = "computed";

/**
 * Option stored under an explicit destination instead of the name
 * commander derives from the long flag.
 */
class DestOption extends Option {
  private readonly dest: string;

  constructor(flags: string, description: string | undefined, dest: string) {
    super(flags, description);
    this.dest = dest;
  }

  override attributeName(): string {
    return this.dest;
  }
}

interface PositionalBinding {
  argument: Argument;
  dest: string;
  action: ParsingAction | undefined;
  services: ArgumentServices;
}

interface ComputedDefault {
  dest: string;
  compute: () => unknown;
}

interface CommandBindings {
  positionals: PositionalBinding[];
  computed: ComputedDefault[];
}

const bindingsByCommand = new WeakMap<Command, CommandBindings>();

function isParsingAction(action: ArgumentOptions["action"]): action is ParsingAction {
  return typeof action === "object";
}

function camelCase(flag: string): string {
  return flag
    .replace(/^-+/, "")
    .split("-")
    .map((word, i) => (i === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join("");
}

export function isPositional(builder: ArgumentBuilder): boolean {
  const first = builder.flags[0];
  return first !== undefined && !first.startsWith("-");
}

function displayFlag(builder: ArgumentBuilder): string {
  return builder.flags.find((f) => f.startsWith("--")) ?? builder.flags[0] ?? "";
}

/** Namespace key an argument writes to. */
export function destinationOf(builder: ArgumentBuilder): string {
  if (builder.options.dest) return builder.options.dest;
  if (isPositional(builder)) return builder.flags[0] ?? "";
  return camelCase(displayFlag(builder));
}

function parseInteger(raw: string): number {
  const text = raw.trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number(text);
}

function writeUpdates(
  command: Command,
  updates: Record<string, unknown>,
  skip?: string,
): void {
  for (const [key, value] of Object.entries(updates)) {
    if (key === skip) continue;
    command.setOptionValueWithSource(key, value, "cli");
  }
}

function finalizeNamespace(command: Command, actionCommand: Command): void {
  const bindings = bindingsByCommand.get(command);
  if (!bindings) return;

  for (const { dest, compute } of bindings.computed) {
    const source = command.getOptionValueSource(dest);
    if (source === undefined || source === COMPUTED_SOURCE) {
      command.setOptionValueWithSource(dest, compute(), COMPUTED_SOURCE);
    }
  }

  // positional values only exist on the command being run
  if (actionCommand !== command) return;

  for (const binding of bindings.positionals) {
    const index = command.registeredArguments.indexOf(binding.argument);
    const value: unknown = command.processedArgs[index];
    if (!binding.action) {
      command.setOptionValueWithSource(binding.dest, value, "cli");
      continue;
    }
    const context: ActionContext = {
      dest: binding.dest,
      flag: binding.argument.name(),
      services: binding.services,
    };
    const result = runAction(binding.action, context, value);
    applyEffects(result.effects, binding.services.config);
    writeUpdates(command, result.updates);
  }
}

function bindingsFor(command: Command): CommandBindings {
  let bindings = bindingsByCommand.get(command);
  if (!bindings) {
    bindings = { positionals: [], computed: [] };
    bindingsByCommand.set(command, bindings);
    command.hook("preAction", (thisCommand, actionCommand) => {
      finalizeNamespace(thisCommand, actionCommand);
    });
  }
  return bindings;
}

function positionalSpec(name: string, nargs: ArgumentOptions["nargs"]): string {
  switch (nargs) {
    case "+":
      return `<${name}...>`;
    case "remainder":
      return `[${name}...]`;
    case "?":
      return `[${name}]`;
    default:
      return `<${name}>`;
  }
}

function attachPositional(
  command: Command,
  builder: ArgumentBuilder,
  services: ArgumentServices,
): void {
  const { options } = builder;
  const dest = destinationOf(builder);
  const argument = new Argument(
    positionalSpec(options.metavar ?? dest, options.nargs),
    options.help,
  );
  if (options.default !== undefined) {
    argument.default(options.default);
  }
  command.addArgument(argument);

  const action = isParsingAction(options.action) ? options.action : undefined;
  bindingsFor(command).positionals.push({ argument, dest, action, services });
}

function attachOption(
  command: Command,
  builder: ArgumentBuilder,
  services: ArgumentServices,
): void {
  const { options } = builder;
  const dest = destinationOf(builder);
  const action = options.action ?? "store";
  const isFlag = action === "store_true" || action === "store_false";

  const metavar = options.metavar ?? dest;
  const flags = builder.flags.join(", ") + (isFlag ? "" : ` <${metavar}>`);
  const option = new DestOption(flags, options.help, dest);

  if (isFlag) {
    const present = action === "store_true";
    // a long flag spelled --no-x is a plain flag here, not commander's negation
    option.negate = false;
    option.preset(present);
    option.default(options.default ?? !present);
  } else {
    if (options.default !== undefined) {
      option.default(options.default);
    }
    const context: ActionContext = { dest, flag: displayFlag(builder), services };
    option.argParser((raw: string, previous: unknown): unknown => {
      const value: unknown = options.type === "int" ? parseInteger(raw) : raw;
      if (action === "append") {
        return [...(Array.isArray(previous) ? previous : []), value];
      }
      if (isParsingAction(action)) {
        const result = runAction(action, context, value);
        applyEffects(result.effects, services.config);
        writeUpdates(command, result.updates, dest);
        return result.updates[dest];
      }
      return value;
    });
  }

  command.addOption(option);

  if (options.computeDefault) {
    bindingsFor(command).computed.push({ dest, compute: options.computeDefault });
  }
}

/** Apply one built argument to a commander command. */
export function attachArgument(
  command: Command,
  builder: ArgumentBuilder,
  services: ArgumentServices,
): void {
  if (isPositional(builder)) {
    attachPositional(command, builder, services);
  } else {
    attachOption(command, builder, services);
  }
}
