import { onConstraint } from "./constraint.js";
import { onDeptype } from "./deptype.js";
import { onJobCount } from "./jobs.js";

import type {
  ActionContext,
  ActionResult,
  ConfigScopes,
  ParsingAction,
  SideEffect,
} from "../../types/index.js";

export { ConstraintQuery, onConstraint } from "./constraint.js";
export { onDeptype } from "./deptype.js";
export { BUILD_JOBS_KEY, FALLBACK_BUILD_JOBS, defaultJobCount, onJobCount } from "./jobs.js";

function toTokens(value: unknown): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

/**
 * Run a parsing action on the value the parser consumed. The caller
 * writes `updates` into the namespace and applies `effects`.
 */
export function runAction(
  action: ParsingAction,
  context: ActionContext,
  value: unknown,
): ActionResult {
  switch (action.kind) {
    case "constraint":
      return onConstraint(context, toTokens(value));
    case "jobs":
      if (typeof value !== "number") {
        throw new TypeError(`${context.flag} expects an integer, got ${typeof value}`);
      }
      return onJobCount(context, value);
    case "deptype":
      return onDeptype(context, value === undefined ? undefined : String(value));
  }
}

export function applyEffects(effects: readonly SideEffect[], config: ConfigScopes): void {
  for (const effect of effects) {
    config.set(effect.key, effect.value, effect.scope);
  }
}
