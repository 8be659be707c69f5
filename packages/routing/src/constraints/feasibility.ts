/**
 * Per-node feasibility checks for a candidate path: restricted zones and the
 * elevation ceiling.
 *
 * Lookups go through collaborators that may be slow or broken. A failed or
 * timed-out lookup is logged and resolved by the failure policy; it never
 * escapes as an exception.
 */

import type { BoundingBox, RestrictedZone, RouteNode } from "@skyroute/types";
import { withTimeout } from "../concurrency/timeout.js";
import { CollaboratorError, describeError } from "../errors.js";
import { bboxAroundPoint } from "../geo/distance.js";
import { discIntersectsZone } from "./zone-geometry.js";

/** Finds restricted zones near a box; absent means no restriction */
export interface SpatialIndex {
  query(bbox: BoundingBox): RestrictedZone[] | Promise<RestrictedZone[]>;
}

/** Ground elevation lookup in meters */
export interface ElevationProvider {
  getElevation(lat: number, lng: number): number | Promise<number>;
}

/**
 * What to do when a lookup fails:
 * - fail-closed: treat the node as violating
 * - fail-open: skip that check for the node
 */
export type CollaboratorFailurePolicy = "fail-closed" | "fail-open";

export type ViolationKind = "restricted-zone" | "elevation" | "lookup-failed";

export interface FeasibilityViolation {
  kind: ViolationKind;
  nodeId: string;
  message: string;
  zoneId?: string;
  elevationMeters?: number;
}

export interface FeasibilityResult {
  feasible: boolean;
  violation?: FeasibilityViolation;
}

export interface FeasibilityOptions {
  maxElevationMeters: number;
  zoneBufferMeters: number;
  collaboratorTimeoutMs: number;
  failurePolicy: CollaboratorFailurePolicy;
}

export const DEFAULT_FEASIBILITY_OPTIONS: FeasibilityOptions = {
  maxElevationMeters: 500,
  // ~0.0001° of latitude
  zoneBufferMeters: 11,
  collaboratorTimeoutMs: 2000,
  failurePolicy: "fail-closed",
};

export interface FeasibilityCollaborators {
  spatialIndex?: SpatialIndex;
  elevationProvider?: ElevationProvider;
}

export class FeasibilityChecker {
  readonly options: FeasibilityOptions;

  constructor(
    private readonly collaborators: FeasibilityCollaborators = {},
    options: Partial<FeasibilityOptions> = {},
  ) {
    this.options = { ...DEFAULT_FEASIBILITY_OPTIONS, ...options };
  }

  /**
   * Check nodes in order and stop at the first violation.
   */
  async checkPath(nodes: readonly RouteNode[]): Promise<FeasibilityResult> {
    for (const node of nodes) {
      const violation = await this.checkNode(node);
      if (violation) return { feasible: false, violation };
    }
    return { feasible: true };
  }

  async checkNode(node: RouteNode): Promise<FeasibilityViolation | null> {
    return (await this.checkZones(node)) ?? (await this.checkElevation(node));
  }

  private async checkZones(node: RouteNode): Promise<FeasibilityViolation | null> {
    const { spatialIndex } = this.collaborators;
    if (!spatialIndex) return null;

    const buffer = this.options.zoneBufferMeters;
    let zones: RestrictedZone[];
    try {
      zones = await withTimeout(
        "spatial-index",
        () => spatialIndex.query(bboxAroundPoint(node.coordinate, buffer)),
        this.options.collaboratorTimeoutMs,
      );
    } catch (err) {
      return this.lookupFailed(node, "zone", err);
    }

    const hit = zones.find((zone) => discIntersectsZone(node.coordinate, buffer, zone));
    if (!hit) return null;
    return {
      kind: "restricted-zone",
      nodeId: node.id,
      zoneId: hit.id,
      message: `node ${node.id} is within ${buffer}m of restricted zone ${hit.name ?? hit.id}`,
    };
  }

  private async checkElevation(node: RouteNode): Promise<FeasibilityViolation | null> {
    let elevation = node.elevationMeters;
    const { elevationProvider } = this.collaborators;

    if (elevation === undefined) {
      if (!elevationProvider) return null;
      try {
        elevation = await withTimeout(
          "elevation",
          async () => {
            const meters = await elevationProvider.getElevation(node.coordinate.lat, node.coordinate.lng);
            if (!Number.isFinite(meters)) {
              throw new CollaboratorError("elevation", `non-numeric elevation ${meters}`);
            }
            return meters;
          },
          this.options.collaboratorTimeoutMs,
        );
      } catch (err) {
        return this.lookupFailed(node, "elevation", err);
      }
    }

    const ceiling = this.options.maxElevationMeters;
    if (elevation <= ceiling) return null;
    return {
      kind: "elevation",
      nodeId: node.id,
      elevationMeters: elevation,
      message: `node ${node.id} at ${elevation}m exceeds the ${ceiling}m ceiling`,
    };
  }

  private lookupFailed(node: RouteNode, what: string, err: unknown): FeasibilityViolation | null {
    const policy = this.options.failurePolicy;
    console.warn(`[feasibility] ${what} lookup failed for node ${node.id} (${policy}): ${describeError(err)}`);
    if (policy === "fail-open") return null;
    return {
      kind: "lookup-failed",
      nodeId: node.id,
      message: `${what} lookup failed for node ${node.id}: ${describeError(err)}`,
    };
  }
}
