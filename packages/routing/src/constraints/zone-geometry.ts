/**
 * Planar geometry for restricted zones.
 *
 * Uses a flat-earth approximation around the query point, which is accurate
 * enough at the scale of a zone buffer.
 */

import type { BoundingBox, Coordinate, RestrictedZone } from "@skyroute/types";
import { METERS_PER_DEG_LAT, metersPerDegLng } from "../geo/distance.js";

/**
 * Ray-casting point-in-ring test with lng as x and lat as y.
 * The ring may be open or closed.
 */
export function pointInRing(point: Coordinate, ring: Coordinate[]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (!a || !b) continue;
    const crosses =
      a.lat > point.lat !== b.lat > point.lat &&
      point.lng < ((b.lng - a.lng) * (point.lat - a.lat)) / (b.lat - a.lat) + a.lng;
    if (crosses) inside = !inside;
  }
  return inside;
}

/** Inside the outer ring and outside every hole */
export function pointInPolygon(point: Coordinate, rings: Coordinate[][]): boolean {
  const [outer, ...holes] = rings;
  if (!outer || !pointInRing(point, outer)) return false;
  return !holes.some((hole) => pointInRing(point, hole));
}

/**
 * Perpendicular distance from a point to a line segment (meters).
 */
function segmentDistance(point: Coordinate, start: Coordinate, end: Coordinate): number {
  const perLng = metersPerDegLng(point.lat);
  const px = (point.lng - start.lng) * perLng;
  const py = (point.lat - start.lat) * METERS_PER_DEG_LAT;
  const lx = (end.lng - start.lng) * perLng;
  const ly = (end.lat - start.lat) * METERS_PER_DEG_LAT;

  const lineLenSq = lx * lx + ly * ly;
  if (lineLenSq === 0) return Math.sqrt(px * px + py * py);

  const t = Math.max(0, Math.min(1, (px * lx + py * ly) / lineLenSq));
  const dx = px - t * lx;
  const dy = py - t * ly;
  return Math.sqrt(dx * dx + dy * dy);
}

/** Distance in meters from a point to the nearest edge of a ring */
export function distanceToRing(point: Coordinate, ring: Coordinate[]): number {
  let min = Infinity;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[j];
    const b = ring[i];
    if (!a || !b) continue;
    const dist = segmentDistance(point, a, b);
    if (dist < min) min = dist;
  }
  return min;
}

/**
 * Whether a disc of the given radius around a point overlaps a polygon:
 * the center lies inside it, or any ring boundary is within the radius.
 */
export function discIntersectsPolygon(center: Coordinate, radiusMeters: number, rings: Coordinate[][]): boolean {
  if (pointInPolygon(center, rings)) return true;
  return rings.some((ring) => distanceToRing(center, ring) <= radiusMeters);
}

export function discIntersectsZone(center: Coordinate, radiusMeters: number, zone: RestrictedZone): boolean {
  return zone.polygons.some((rings) => discIntersectsPolygon(center, radiusMeters, rings));
}

/** Bounding box of every outer ring of a zone, or null for an empty zone */
export function zoneBounds(zone: RestrictedZone): BoundingBox | null {
  let box: BoundingBox | null = null;
  for (const [outer] of zone.polygons) {
    for (const coord of outer ?? []) {
      if (!box) {
        box = { minLat: coord.lat, maxLat: coord.lat, minLng: coord.lng, maxLng: coord.lng };
        continue;
      }
      box.minLat = Math.min(box.minLat, coord.lat);
      box.maxLat = Math.max(box.maxLat, coord.lat);
      box.minLng = Math.min(box.minLng, coord.lng);
      box.maxLng = Math.max(box.maxLng, coord.lng);
    }
  }
  return box;
}

export function boxesOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return a.minLat <= b.maxLat && a.maxLat >= b.minLat && a.minLng <= b.maxLng && a.maxLng >= b.minLng;
}
