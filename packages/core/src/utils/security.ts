// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Security utilities — key masking, environment access, frozen tables. */

import { ConfigurationError } from "../exceptions.js";

/**
 * Mask an API key for safe display in logs or CLI output.
 * Preserves the prefix (up to 10 chars) and replaces the rest with ***.
 *
 * @example
 *   maskKey("test-secret-key") → "test-***"
 */
export function maskKey(key: string): string {
  if (key.length === 0) return "(empty)";
  const prefixLen = Math.min(10, Math.floor(key.length / 3));
  return `${key.slice(0, prefixLen)}***`;
}

/**
 * Safely read an environment variable.
 * Returns undefined (not an empty string) if not set.
 */
export function envVar(name: string): string | undefined {
  const val = process.env[name];
  return val && val.trim().length > 0 ? val.trim() : undefined;
}

/** Read a required environment variable or fail with a ConfigurationError. */
export function requireEnvVar(name: string): string {
  const val = envVar(name);
  if (!val) {
    throw new ConfigurationError(
      `Required environment variable '${name}' is not set. ` +
        `See tollgate.example.yaml for setup instructions.`,
    );
  }
  return val;
}

/** Recursively freeze a plain data structure in place and return it. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
