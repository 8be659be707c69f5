/**
 * Per-tick motion toward a waypoint.
 *
 * Distance is great-circle; the move itself interpolates lat and lng
 * independently, which is close enough over one tick.
 */

import type { Coordinate } from "@skyroute/types";
import { haversineDistance } from "@skyroute/routing";

export interface StepResult {
  position: Coordinate;
  /** True when the step snapped onto the target */
  arrived: boolean;
  /** Distance left to the target before the step, in meters */
  remainingMeters: number;
}

export function stepToward(position: Coordinate, target: Coordinate, stepMeters: number): StepResult {
  const remainingMeters = haversineDistance(position, target);
  if (remainingMeters <= stepMeters) {
    return { position: { lat: target.lat, lng: target.lng }, arrived: true, remainingMeters };
  }
  const fraction = stepMeters / remainingMeters;
  return {
    position: {
      lat: position.lat + (target.lat - position.lat) * fraction,
      lng: position.lng + (target.lng - position.lng) * fraction,
    },
    arrived: false,
    remainingMeters,
  };
}
