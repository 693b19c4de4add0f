import { SpecParseError } from "./errors.js";

import type { SpecParser, UnresolvedSpec } from "../types/index.js";

const NAME = /[A-Za-z_][A-Za-z0-9_-]*/y;
const VERSION = /@([A-Za-z0-9_.-]*(?::[A-Za-z0-9_.-]*)?)/y;
const VARIANT = /([+~-])([A-Za-z_][A-Za-z0-9_-]*)/y;
const COMPILER = /%([A-Za-z_][A-Za-z0-9_.-]*(?:@[A-Za-z0-9_.:-]+)?)/y;
const HASH = /\/([a-z0-9]+)/y;
const KEY_VALUE = /^([A-Za-z_][A-Za-z0-9_-]*)=(\S+)$/;

function match(re: RegExp, word: string, pos: number): RegExpExecArray | null {
  re.lastIndex = pos;
  return re.exec(word);
}

function emptySpec(): UnresolvedSpec {
  return { variants: {} };
}

function setVariant(spec: UnresolvedSpec, name: string, value: boolean | string, word: string): void {
  const existing = spec.variants[name];
  if (existing !== undefined && existing !== value) {
    throw new SpecParseError(word, `variant '${name}' specified twice`);
  }
  spec.variants[name] = value;
}

function parseModifiers(spec: UnresolvedSpec, word: string, start: number): void {
  let pos = start;
  while (pos < word.length) {
    const version = match(VERSION, word, pos);
    if (version) {
      const versions = version[1] ?? "";
      if (versions === "" || versions === ":") {
        throw new SpecParseError(word, "empty version after '@'");
      }
      if (spec.versions !== undefined) {
        throw new SpecParseError(word, "version specified twice");
      }
      spec.versions = versions;
      pos += version[0].length;
      continue;
    }

    const variant = match(VARIANT, word, pos);
    if (variant) {
      setVariant(spec, variant[2] ?? "", variant[1] === "+", word);
      pos += variant[0].length;
      continue;
    }

    const compiler = match(COMPILER, word, pos);
    if (compiler) {
      if (spec.compiler !== undefined) {
        throw new SpecParseError(word, "compiler specified twice");
      }
      spec.compiler = compiler[1];
      pos += compiler[0].length;
      continue;
    }

    const hash = match(HASH, word, pos);
    if (hash) {
      if (spec.hash !== undefined) {
        throw new SpecParseError(word, "hash specified twice");
      }
      spec.hash = hash[1];
      pos += hash[0].length;
      continue;
    }

    throw new SpecParseError(word, `unexpected character '${word.charAt(pos)}'`);
  }
}

/**
 * Parse command-line words into specs. A word starting with a package
 * name opens a new spec; `@`, `+`, `~`, `%`, `/` and `key=value` words
 * refine the open one, or an anonymous spec if none is open.
 *
 * `-name` disables a variant like `~name`, but only where no name,
 * version or compiler can absorb the dash: at the start of a word or
 * after a hash. Such words reach the parser only after `--`.
 */
export function parseSpecs(tokens: readonly string[]): UnresolvedSpec[] {
  const words = tokens.join(" ").split(/\s+/).filter((w) => w.length > 0);
  const specs: UnresolvedSpec[] = [];
  let current: UnresolvedSpec | undefined;

  const open = (): UnresolvedSpec => {
    const spec = emptySpec();
    specs.push(spec);
    return spec;
  };

  for (const word of words) {
    const keyValue = KEY_VALUE.exec(word);
    if (keyValue) {
      current ??= open();
      setVariant(current, keyValue[1] ?? "", keyValue[2] ?? "", word);
      continue;
    }

    const name = match(NAME, word, 0);
    if (name) {
      current = open();
      current.name = name[0];
      parseModifiers(current, word, name[0].length);
      continue;
    }

    // a second hash cannot refine the same spec: `/abc /def` is two specs
    if (word.startsWith("/") && current?.hash !== undefined) {
      current = open();
    }
    current ??= open();
    parseModifiers(current, word, 0);
  }

  return specs;
}

export const specParser: SpecParser = {
  parse: parseSpecs,
};

/** Render a spec back to its command-line form. */
export function formatSpec(spec: UnresolvedSpec): string {
  let out = spec.name ?? "";
  if (spec.versions) out += `@${spec.versions}`;
  for (const name of Object.keys(spec.variants).sort()) {
    const value = spec.variants[name];
    if (value === true) out += `+${name}`;
    else if (value === false) out += `~${name}`;
    else out += ` ${name}=${String(value)}`;
  }
  if (spec.compiler) out += `%${spec.compiler}`;
  if (spec.hash) out += `/${spec.hash}`;
  return out.trim();
}
