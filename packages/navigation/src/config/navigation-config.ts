/**
 * Layered JSON config for the navigation runtime.
 *
 * Hardcoded defaults, then `configs/navigation/default.json`, then caller
 * overrides (environment or tests), merged leaf by leaf and validated.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import { findConfigsRoot } from "./configs-root.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const navigationConfigSchema = z.object({
  /** Identical scans closer together than this are one scan */
  debounceMs: z.number().int().nonnegative(),
  /** GPS samples implying a faster walk are sensor noise */
  maxSpeedMetersPerSecond: z.number().positive(),
  /** No scan for this long while moving raises a timeout re-prompt */
  idleScanMs: z.number().int().positive(),
  /** Movement needed within the idle window to count as "still walking" */
  minMovementMeters: z.number().nonnegative(),
  /** How often the watchdog checks for an idle timeout */
  watchdogIntervalMs: z.number().int().positive(),
  /** Distance the walker must close before another "getting closer" */
  approachStepMeters: z.number().positive(),
  /** Spoken messages kept per device for monitoring */
  speechHistoryLimit: z.number().int().positive(),
  /** Topology name under configs/topology/, or a path to a JSON file */
  topology: z.string().min(1),
});

export type NavigationConfig = z.infer<typeof navigationConfigSchema>;

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export function getHardcodedDefaults(): NavigationConfig {
  return {
    debounceMs: 2000,
    maxSpeedMetersPerSecond: 3,
    idleScanMs: 60_000,
    minMovementMeters: 10,
    watchdogIntervalMs: 5000,
    approachStepMeters: 5,
    speechHistoryLimit: 100,
    topology: "default",
  };
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Leaf-level deep merge: source values override target values. */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Read the JSON layer. A missing file contributes nothing. */
function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch {
    console.warn(`[config] ${filePath} not found, using built-in defaults`);
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  if (!isPlainObject(parsed)) {
    throw new Error(`[config] ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load the navigation config, merging overrides on top of the file and
 * built-in defaults. Throws a ZodError if the result is invalid.
 */
export function loadNavigationConfig(
  overrides: DeepPartial<NavigationConfig> = {},
  filePath: string = join(findConfigsRoot(), "navigation", "default.json"),
): NavigationConfig {
  const merged = deepMerge(
    deepMerge(getHardcodedDefaults(), readConfigFile(filePath)),
    overrides,
  );
  return navigationConfigSchema.parse(merged);
}

/** Overrides taken from the process environment */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DeepPartial<NavigationConfig> {
  const overrides: DeepPartial<NavigationConfig> = {};
  const topology = env["WAYMARK_TOPOLOGY"];
  if (topology) overrides.topology = topology;
  const debounce = env["WAYMARK_DEBOUNCE_MS"];
  if (debounce) overrides.debounceMs = Number(debounce);
  return overrides;
}
