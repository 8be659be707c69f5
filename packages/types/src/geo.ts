/**
 * Geographic utility types.
 */

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * A no-fly zone.
 *
 * Rings are closed or open lists of coordinates; the first ring of each
 * polygon is the outer boundary, any further rings are holes.
 */
export interface RestrictedZone {
  id: string;
  name?: string;
  /** One entry per polygon, each a list of rings */
  polygons: Coordinate[][][];
}
