// ─── Engine Config Loader ────────────────────────────────────────────────────
//
// Reads a JSON config file, validates it with Zod and merges overrides.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { ConfigError, InvalidInputError, type ConfigIssue } from "../errors.js";
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from "./schema.js";

/**
 * Resolve a partial config against the defaults.
 *
 * @throws ConfigError listing every failed field
 */
export function resolveEngineConfig(input: unknown = {}, source = "config"): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (result.success) return result.data;

  const issues: ConfigIssue[] = result.error.issues.map((i) => ({
    field: i.path.join(".") || "root",
    message: i.message,
  }));
  const detail = issues.map((i) => `  ${i.field}: ${i.message}`).join("\n");
  throw new ConfigError(`Invalid ${source}:\n${detail}`, issues);
}

/**
 * Load and validate a config file. Overrides (e.g. from CLI flags) are
 * merged over the file before validation.
 */
export function loadEngineConfig(path: string, overrides: EngineConfigInput = {}): EngineConfig {
  if (!existsSync(path)) {
    throw new InvalidInputError(`Config not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Config is not valid JSON: ${path}`, [{ field: "root", message: "invalid JSON" }], { cause: err });
  }

  return resolveEngineConfig(mergeConfig(raw, overrides), path);
}

/**
 * Shallow-merge overrides over a raw config, one level deep for the
 * nested `timing` and `hands` objects.
 */
export function mergeConfig(base: unknown, overrides: EngineConfigInput): unknown {
  if (!isRecord(base)) return base;

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
