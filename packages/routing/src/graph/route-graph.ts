/**
 * In-memory undirected route graph.
 *
 * Stores base weights computed once by the cost model at insertion; the
 * search scales them by the risk factor locally and never writes them back.
 */

import type { Coordinate, RouteEdge, RouteNode } from "@skyroute/types";
import { CostModel } from "../cost/cost-model.js";
import { ValidationError } from "../errors.js";
import { isValidCoordinate } from "../geo/distance.js";

/** A neighbor reachable over one edge */
export interface Neighbor {
  nodeId: string;
  edge: RouteEdge;
}

/** Canonical key for an unordered node pair */
export function edgeKey(a: string, b: string): string {
  return JSON.stringify(a < b ? [a, b] : [b, a]);
}

export class RouteGraph {
  private readonly nodes = new Map<string, RouteNode>();
  private readonly edges = new Map<string, RouteEdge>();
  /** nodeId -> neighbor nodeId -> edge key */
  private readonly adjacency = new Map<string, Map<string, string>>();

  constructor(private readonly costModel: CostModel = new CostModel()) {}

  /**
   * Add or overwrite a node. Re-adding keeps the stored elevation unless a
   * new one is given.
   */
  addNode(id: string, coordinate: Coordinate, elevationMeters?: number): RouteNode {
    if (id.length === 0) {
      throw new ValidationError("node id must be a non-empty string");
    }
    if (!isValidCoordinate(coordinate)) {
      throw new ValidationError(`invalid coordinate for node ${id}`, { ...coordinate });
    }
    if (elevationMeters !== undefined && !Number.isFinite(elevationMeters)) {
      throw new ValidationError(`invalid elevation for node ${id}`, { elevationMeters });
    }

    const existing = this.nodes.get(id);
    const node: RouteNode = { id, coordinate: { lat: coordinate.lat, lng: coordinate.lng } };
    const elevation = elevationMeters ?? existing?.elevationMeters;
    if (elevation !== undefined) node.elevationMeters = elevation;

    this.nodes.set(id, node);
    if (!this.adjacency.has(id)) this.adjacency.set(id, new Map());
    return node;
  }

  /**
   * Add or overwrite the undirected edge between two existing nodes.
   */
  addEdge(a: string, b: string, distanceMeters: number, timeSeconds: number, baseRisk = 1.0): RouteEdge {
    if (a === b) {
      throw new ValidationError(`self-loop on node ${a} is not allowed`);
    }
    for (const id of [a, b]) {
      if (!this.nodes.has(id)) {
        throw new ValidationError(`unknown node ${id}`, { nodeId: id });
      }
    }

    const baseWeight = this.costModel.computeEdgeCost(distanceMeters, timeSeconds, baseRisk);
    const key = edgeKey(a, b);
    const edge: RouteEdge = {
      key,
      nodeA: a,
      nodeB: b,
      distanceMeters,
      timeSeconds,
      baseRisk,
      baseWeight,
    };

    this.edges.set(key, edge);
    this.adjacency.get(a)?.set(b, key);
    this.adjacency.get(b)?.set(a, key);
    return edge;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): RouteNode | undefined {
    return this.nodes.get(id);
  }

  getEdge(a: string, b: string): RouteEdge | undefined {
    return this.edges.get(edgeKey(a, b));
  }

  /** Neighbors in insertion order */
  neighbors(id: string): Neighbor[] {
    const links = this.adjacency.get(id);
    if (!links) return [];
    const result: Neighbor[] = [];
    for (const [nodeId, key] of links) {
      const edge = this.edges.get(key);
      if (edge) result.push({ nodeId, edge });
    }
    return result;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }
}
