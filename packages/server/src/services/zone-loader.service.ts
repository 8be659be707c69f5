/**
 * Restricted zones from GeoJSON.
 *
 * Accepts a FeatureCollection (or a bare array of features) whose geometries
 * are Polygon or MultiPolygon; anything else is skipped with a warning.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Coordinate, RestrictedZone } from "@skyroute/types";
import { ValidationError, describeError } from "@skyroute/routing";

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema);

const GeometrySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Polygon"), coordinates: z.array(RingSchema) }),
  z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(z.array(RingSchema)) }),
]);

const FeatureSchema = z.object({
  type: z.literal("Feature").optional(),
  id: z.union([z.string(), z.number()]).optional(),
  properties: z.record(z.unknown()).nullable().optional(),
  geometry: z.unknown(),
});

const CollectionSchema = z.union([
  z.object({ type: z.literal("FeatureCollection"), features: z.array(FeatureSchema) }),
  z.array(FeatureSchema),
]);

type Feature = z.infer<typeof FeatureSchema>;

/** GeoJSON positions are [lng, lat] */
function toRing(ring: number[][]): Coordinate[] {
  const coords: Coordinate[] = [];
  for (const [lng, lat] of ring) {
    if (lng === undefined || lat === undefined) continue;
    coords.push({ lat, lng });
  }
  return coords;
}

function zoneId(feature: Feature, index: number): string {
  const fromProps = feature.properties?.["id"];
  if (typeof fromProps === "string" || typeof fromProps === "number") return String(fromProps);
  if (feature.id !== undefined) return String(feature.id);
  return `zone-${index + 1}`;
}

export function parseZones(raw: unknown): RestrictedZone[] {
  const parsed = CollectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("zones must be a GeoJSON FeatureCollection", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  const features = Array.isArray(parsed.data) ? parsed.data : parsed.data.features;

  const zones: RestrictedZone[] = [];
  features.forEach((feature, index) => {
    const geometry = GeometrySchema.safeParse(feature.geometry);
    if (!geometry.success) {
      console.warn(`[zones] Skipping feature ${index}: not a Polygon or MultiPolygon`);
      return;
    }
    const polygons =
      geometry.data.type === "Polygon"
        ? [geometry.data.coordinates.map(toRing)]
        : geometry.data.coordinates.map((polygon) => polygon.map(toRing));

    const name = feature.properties?.["name"];
    zones.push({
      id: zoneId(feature, index),
      ...(typeof name === "string" ? { name } : {}),
      polygons,
    });
  });
  return zones;
}

export function loadZonesFile(path: string): RestrictedZone[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ValidationError(`cannot read zones file ${path}: ${describeError(err)}`);
  }
  const zones = parseZones(raw);
  console.log(`[zones] Loaded ${zones.length} restricted zones from ${path}`);
  return zones;
}
