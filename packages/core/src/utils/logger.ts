// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Process-wide structured logger.
 *
 * PRIVACY: callers log metadata only (request id, venue, strategy, costs).
 * Request content and anonymization mappings are never passed to the logger.
 */

import { pino, type Logger } from "pino";
import { z } from "zod";

import { envVar } from "./security.js";

export type { Logger };

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/** TOLLGATE_LOG_LEVEL when it names a pino level. */
function pinnedLevel(): z.infer<typeof LogLevelSchema> | undefined {
  const parsed = LogLevelSchema.safeParse(envVar("TOLLGATE_LOG_LEVEL"));
  return parsed.success ? parsed.data : undefined;
}

export const logger: Logger = pino({
  name: "tollgate",
  level: pinnedLevel() ?? "info",
});

const rawLevel = envVar("TOLLGATE_LOG_LEVEL");
if (rawLevel !== undefined && pinnedLevel() === undefined) {
  logger.warn({ value: rawLevel }, "ignoring unknown TOLLGATE_LOG_LEVEL");
}

const children: Logger[] = [];

/** Child logger tagged with the component name. */
export function componentLogger(component: string): Logger {
  const child = logger.child({ component });
  children.push(child);
  return child;
}

/**
 * Apply the configured level unless a valid TOLLGATE_LOG_LEVEL pins it.
 * Called once by the config loader.
 */
export function applyLogLevel(level: string): void {
  if (pinnedLevel() === undefined) {
    logger.level = level;
    // pino children copy the level at creation
    for (const child of children) child.level = level;
  }
}
