import { ALL_DEPTYPES_MARKER } from "../deptypes.js";

import type { ActionContext, ActionResult } from "../../types/index.js";

/**
 * Turn a `--deptype` value into a canonical deptype tuple.
 *
 * No value selects every known type. `all` on its own is passed to the
 * vocabulary as the symbolic marker rather than as a one-token list.
 * Unknown tokens fail here, at parse time, with whatever the vocabulary
 * throws.
 */
export function onDeptype(context: ActionContext, value: string | undefined): ActionResult {
  const { deptypes } = context.services;

  let deptype = deptypes.allTypes();
  if (value) {
    const tokens = value.split(",").map((s) => s.trim());
    deptype =
      tokens.length === 1 && tokens[0] === ALL_DEPTYPES_MARKER
        ? deptypes.canonicalize(ALL_DEPTYPES_MARKER)
        : deptypes.canonicalize(tokens);
  }

  context.services.logger.log("action", "deptype resolved", { flag: context.flag, deptype });
  return { updates: { [context.dest]: deptype }, effects: [] };
}
