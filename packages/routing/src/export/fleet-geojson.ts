/**
 * GeoJSON export for fleet state.
 *
 * Vehicles become Point features, the unflown part of each active route a
 * LineString starting at the vehicle, and open tasks Point features at
 * their destination. Useful for a live map or geojson.io.
 */

import type { Coordinate, RestrictedZone, Task, VehicleSnapshot } from "@skyroute/types";

/** GeoJSON types (subset we need) */
export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonPoint | GeoJsonLineString | GeoJsonMultiPolygon;
  properties: Record<string, unknown>;
}

interface GeoJsonPoint {
  type: "Point";
  coordinates: [number, number];
}

interface GeoJsonLineString {
  type: "LineString";
  coordinates: [number, number][];
}

interface GeoJsonMultiPolygon {
  type: "MultiPolygon";
  coordinates: [number, number][][][];
}

export interface FleetGeoJsonOptions {
  /** Include remaining route lines for moving vehicles (default true) */
  includeRoutes?: boolean;
  /** Include undelivered tasks with outcome pending (default true) */
  includeOpenTasks?: boolean;
  /** Restricted zones to draw as MultiPolygon features */
  zones?: RestrictedZone[];
}

/** GeoJSON positions are [lng, lat] */
function toPosition(coord: Coordinate): [number, number] {
  return [coord.lng, coord.lat];
}

export function fleetToGeoJson(
  vehicles: VehicleSnapshot[],
  tasks: Task[] = [],
  options: FleetGeoJsonOptions = {}
): GeoJsonFeatureCollection {
  const { includeRoutes = true, includeOpenTasks = true, zones = [] } = options;
  const features: GeoJsonFeature[] = [];

  for (const zone of zones) {
    features.push({
      type: "Feature",
      geometry: {
        type: "MultiPolygon",
        coordinates: zone.polygons.map((rings) => rings.map((ring) => ring.map(toPosition))),
      },
      properties: { kind: "zone", id: zone.id, name: zone.name ?? null },
    });
  }

  for (const vehicle of vehicles) {
    features.push({
      type: "Feature",
      geometry: { type: "Point", coordinates: toPosition(vehicle.position) },
      properties: {
        kind: "vehicle",
        id: vehicle.id,
        phase: vehicle.phase,
        moving: vehicle.moving,
        currentTaskId: vehicle.currentTaskId,
      },
    });

    if (!includeRoutes || !vehicle.moving) continue;
    const remaining = vehicle.route.slice(vehicle.nextWaypointIndex);
    if (remaining.length === 0) continue;
    features.push({
      type: "Feature",
      geometry: {
        type: "LineString",
        coordinates: [vehicle.position, ...remaining].map(toPosition),
      },
      properties: {
        kind: "route",
        vehicleId: vehicle.id,
        phase: vehicle.phase,
        remainingWaypoints: remaining.length,
      },
    });
  }

  if (includeOpenTasks) {
    for (const task of tasks) {
      if (task.delivered || task.outcome !== "pending") continue;
      features.push({
        type: "Feature",
        geometry: { type: "Point", coordinates: toPosition(task.destination) },
        properties: {
          kind: "task",
          id: task.id,
          assignedVehicleId: task.assignedVehicleId,
        },
      });
    }
  }

  return { type: "FeatureCollection", features };
}
