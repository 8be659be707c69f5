/**
 * Layered fleet configuration.
 *
 * `configs/fleet/base.json` holds the full configuration; a named profile in
 * `configs/fleet/profiles/<name>.json` carries partial overrides that are
 * deep-merged on top. The merged result is validated before use.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { NotFoundError, ValidationError, describeError } from "@skyroute/routing";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const CoordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

const BoundingBoxSchema = z
  .object({
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
    minLng: z.number().min(-180).max(180),
    maxLng: z.number().min(-180).max(180),
  })
  .refine((box) => box.minLat <= box.maxLat && box.minLng <= box.maxLng, {
    message: "min bounds must not exceed max bounds",
  });

export const FleetConfigSchema = z.object({
  base: CoordinateSchema,
  serviceArea: BoundingBoxSchema,
  vehicles: z.array(z.string().min(1)).min(1),
  costWeights: z.object({
    distance: z.number().nonnegative(),
    time: z.number().nonnegative(),
    risk: z.number().nonnegative(),
  }),
  risk: z.object({
    learningRate: z.number().gt(0).max(1),
    explorationNoise: z.number().nonnegative(),
    minRiskFactor: z.number().positive(),
    /** Seed for reproducible exploration noise; random when absent */
    seed: z.number().int().optional(),
  }),
  planner: z.object({
    maxElevationMeters: z.number(),
    zoneBufferMeters: z.number().nonnegative(),
    collaboratorTimeoutMs: z.number().int().positive(),
    failurePolicy: z.enum(["fail-closed", "fail-open"]),
    heuristicScale: z.number().nonnegative(),
  }),
  scheduler: z.object({
    tickIntervalMs: z.number().int().positive(),
    speedMetersPerSecond: z.number().positive(),
    /** Give every vehicle a task when the fleet starts */
    dispatchOnStart: z.boolean(),
  }),
  weather: z.object({
    pollIntervalMs: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
  }),
});

export type FleetConfig = z.infer<typeof FleetConfigSchema>;

const ProfileSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  overrides: z.record(z.unknown()).default({}),
});

export interface ProfileInfo {
  name: string;
  description: string;
}

/** Used when no base.json is found */
export const DEFAULT_FLEET_CONFIG: FleetConfig = {
  base: { lat: 37.644249, lng: -122.401533 },
  serviceArea: { minLat: 37.7, maxLat: 37.82, minLng: -122.52, maxLng: -122.36 },
  vehicles: ["drone-1"],
  costWeights: { distance: 0.4, time: 0.3, risk: 0.3 },
  risk: { learningRate: 0.3, explorationNoise: 0.05, minRiskFactor: 0.1 },
  planner: {
    maxElevationMeters: 500,
    zoneBufferMeters: 11,
    collaboratorTimeoutMs: 2000,
    failurePolicy: "fail-closed",
    heuristicScale: 1,
  },
  scheduler: { tickIntervalMs: 2000, speedMetersPerSecond: 10, dispatchOnStart: true },
  weather: { pollIntervalMs: 10_000, timeoutMs: 2000 },
};

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Leaf-level deep merge: source values override target values; arrays are replaced. */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
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
// Config directory resolution
// ---------------------------------------------------------------------------

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Walk up directories to find `configs/fleet/`.
 * Works from both source (packages/fleet/src/config/) and compiled paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "fleet");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/fleet/src/config
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs", "fleet");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ValidationError(`cannot read ${filePath}: ${describeError(err)}`);
  }
}

function parseConfig(value: unknown, source: string): FleetConfig {
  const parsed = FleetConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`invalid fleet config (${source}): ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/**
 * Load base.json, merge the named profile over it and validate.
 * Falls back to the built-in defaults when base.json is absent.
 */
export function loadFleetConfig(profileName?: string, configsRoot: string = findConfigsRoot()): FleetConfig {
  const basePath = join(configsRoot, "base.json");
  const base: Record<string, unknown> = existsSync(basePath)
    ? z.record(z.unknown()).parse(readJson(basePath))
    : { ...DEFAULT_FLEET_CONFIG };

  if (!profileName) return parseConfig(base, "base");

  const profilePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(profilePath)) {
    throw new NotFoundError(`profile ${profileName}`);
  }
  const profile = ProfileSchema.parse(readJson(profilePath));
  return parseConfig(deepMerge(base, profile.overrides), `profile ${profileName}`);
}

/** List all available profiles from the profiles directory. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: ProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    const parsed = ProfileSchema.safeParse(safeReadJson(join(profilesDir, file)));
    if (!parsed.success) {
      console.warn(`[config] Skipping malformed profile ${file}`);
      continue;
    }
    profiles.push({ name: parsed.data.name, description: parsed.data.description });
  }
  return profiles;
}

function safeReadJson(filePath: string): unknown {
  try {
    return readJson(filePath);
  } catch (err) {
    console.warn(`[config] ${describeError(err)}`);
    return undefined;
  }
}
