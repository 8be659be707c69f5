/**
 * Vehicle phase state machine.
 *
 * IDLE -> OUTBOUND -> RETURN -> IDLE. Forcing a vehicle to IDLE is always
 * allowed and goes through {@link VehicleState.forceIdle}, not this table.
 */

import type { VehiclePhase } from "@skyroute/types";
import { ValidationError } from "@skyroute/routing";

const TRANSITIONS: Record<VehiclePhase, readonly VehiclePhase[]> = {
  IDLE: ["OUTBOUND"],
  OUTBOUND: ["RETURN"],
  RETURN: ["IDLE"],
};

export function canTransition(from: VehiclePhase, to: VehiclePhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: VehiclePhase, to: VehiclePhase): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(`illegal phase transition ${from} -> ${to}`, { from, to });
  }
}
