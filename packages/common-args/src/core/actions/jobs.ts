import { InvalidJobCountError } from "../errors.js";

import type {
  ActionContext,
  ActionResult,
  ConfigScopes,
  HardwareInfo,
} from "../../types/index.js";

export const BUILD_JOBS_KEY = "config:build_jobs";
export const FALLBACK_BUILD_JOBS = 16;

/**
 * Accept an explicit job count, clamp it to what the machine offers and
 * record it in the `command_line` scope so later configuration reads see
 * the user's choice.
 */
export function onJobCount(context: ActionContext, jobs: number): ActionResult {
  if (jobs < 1) {
    throw new InvalidJobCountError(context.flag, jobs);
  }

  const available = context.services.hardware.availableParallelism();
  const clamped = Math.min(jobs, available);
  if (clamped !== jobs) {
    context.services.logger.log("action", "job count clamped", {
      requested: jobs,
      available,
    });
  }

  return {
    updates: { [context.dest]: clamped },
    effects: [{ kind: "config-set", key: BUILD_JOBS_KEY, value: clamped, scope: "command_line" }],
  };
}

/**
 * Job count used when `-j` is absent. Read fresh on every call: both the
 * configuration and the available parallelism may change between parses.
 */
export function defaultJobCount(config: ConfigScopes, hardware: HardwareInfo): number {
  const configured = config.get(BUILD_JOBS_KEY, FALLBACK_BUILD_JOBS);
  const jobs =
    typeof configured === "number" && Number.isInteger(configured) && configured >= 1
      ? configured
      : FALLBACK_BUILD_JOBS;
  return Math.min(jobs, hardware.availableParallelism());
}
