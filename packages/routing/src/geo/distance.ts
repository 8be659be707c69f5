/**
 * Distance helpers shared by planning, feasibility and motion.
 */

import type { BoundingBox, Coordinate } from "@skyroute/types";

const EARTH_RADIUS_METERS = 6_371_000;

/** Meters per degree of latitude (roughly constant) */
export const METERS_PER_DEG_LAT = 111_320;

/** Meters per degree of longitude at a given latitude */
export function metersPerDegLng(lat: number): number {
  return METERS_PER_DEG_LAT * Math.cos((lat * Math.PI) / 180);
}

/**
 * Haversine distance between two coordinates in meters.
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

/**
 * Straight-line distance in raw degrees over (lng, lat).
 * Used as the A* heuristic; it is not a length in meters.
 */
export function planarDistance(a: Coordinate, b: Coordinate): number {
  return Math.hypot(b.lng - a.lng, b.lat - a.lat);
}

/** Square box (flat-earth) of the given half-width around a point */
export function bboxAroundPoint(center: Coordinate, radiusMeters: number): BoundingBox {
  const dLat = radiusMeters / METERS_PER_DEG_LAT;
  const perLng = metersPerDegLng(center.lat);
  // Near the poles a degree of longitude shrinks toward zero metres
  const dLng = perLng > 0 ? Math.min(180, radiusMeters / perLng) : 180;
  return {
    minLat: center.lat - dLat,
    maxLat: center.lat + dLat,
    minLng: center.lng - dLng,
    maxLng: center.lng + dLng,
  };
}

/** Whether a coordinate has finite values inside WGS84 ranges */
export function isValidCoordinate(coord: Coordinate): boolean {
  return (
    Number.isFinite(coord.lat) &&
    Number.isFinite(coord.lng) &&
    Math.abs(coord.lat) <= 90 &&
    Math.abs(coord.lng) <= 180
  );
}
