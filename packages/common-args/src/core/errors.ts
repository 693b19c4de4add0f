// ── Exit codes ────────────────────────────────────────────────

export const EXIT_RUNTIME = 1;
export const EXIT_USAGE = 2;

// ── Errors ────────────────────────────────────────────────────

export class UnknownArgumentError extends Error {
  readonly exitCode = EXIT_RUNTIME;
  readonly argument: string;
  readonly command: string;

  constructor(argument: string, command: string) {
    super(`Trying to add non existing argument "${argument}" to command "${command}"`);
    this.name = "UnknownArgumentError";
    this.argument = argument;
    this.command = command;
  }
}

export class InvalidJobCountError extends Error {
  readonly exitCode = EXIT_USAGE;
  readonly flag: string;
  readonly value: number;

  constructor(flag: string, value: number) {
    super(
      `invalid value for argument "${flag}" [expected a positive integer, got "${String(value)}"]`,
    );
    this.name = "InvalidJobCountError";
    this.flag = flag;
    this.value = value;
  }
}

export class SpecParseError extends Error {
  readonly exitCode = EXIT_USAGE;
  readonly token: string;

  constructor(token: string, reason: string) {
    super(`Invalid spec "${token}": ${reason}`);
    this.name = "SpecParseError";
    this.token = token;
  }
}

export class InvalidDeptypeError extends Error {
  readonly exitCode = EXIT_USAGE;
  readonly deptype: string;

  constructor(deptype: string) {
    super(`Invalid dependency type: ${deptype}`);
    this.name = "InvalidDeptypeError";
    this.deptype = deptype;
  }
}

export class ConfigError extends Error {
  readonly exitCode = EXIT_RUNTIME;
  readonly file: string | undefined;

  constructor(reason: string, file?: string) {
    super(file ? `Invalid configuration at ${file}: ${reason}` : reason);
    this.name = "ConfigError";
    this.file = file;
  }
}

export function exitCodeOf(error: unknown): number {
  if (
    error instanceof Error &&
    "exitCode" in error &&
    typeof error.exitCode === "number"
  ) {
    return error.exitCode;
  }
  return EXIT_RUNTIME;
}
