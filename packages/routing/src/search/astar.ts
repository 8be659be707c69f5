/**
 * A* over the route graph.
 *
 * Synchronous on purpose: it reads stored base weights only, and the
 * risk-scaled weight of each edge lives in this call's local state.
 */

import type { RouteGraph } from "../graph/route-graph.js";
import { planarDistance } from "../geo/distance.js";
import { MinHeap } from "./min-heap.js";

export interface AStarOptions {
  /** Multiplier on every stored edge weight for this search */
  riskFactor?: number;
  /** Multiplier on the straight-line heuristic (0 turns A* into Dijkstra) */
  heuristicScale?: number;
}

export interface AStarResult {
  path: string[];
  /** Sum of risk-scaled edge weights along the path */
  cost: number;
  /** Nodes popped from the open set */
  expanded: number;
}

/**
 * Cheapest path from start to goal, or null when the goal is unreachable.
 * Both ids must exist in the graph.
 */
export function aStar(
  graph: RouteGraph,
  startId: string,
  goalId: string,
  options: AStarOptions = {},
): AStarResult | null {
  const riskFactor = options.riskFactor ?? 1;
  const heuristicScale = options.heuristicScale ?? 1;

  const goal = graph.getNode(goalId);
  if (!goal || !graph.hasNode(startId)) return null;

  const heuristic = (nodeId: string): number => {
    const node = graph.getNode(nodeId);
    return node ? planarDistance(node.coordinate, goal.coordinate) * heuristicScale : 0;
  };

  const gScore = new Map<string, number>([[startId, 0]]);
  const cameFrom = new Map<string, string>();
  const closed = new Set<string>();
  const open = new MinHeap<string>();
  open.push(startId, heuristic(startId));
  let expanded = 0;

  while (open.size > 0) {
    const current = open.pop();
    if (current === undefined) break;
    if (closed.has(current)) continue;
    closed.add(current);
    expanded++;

    if (current === goalId) {
      return { path: reconstruct(cameFrom, goalId), cost: gScore.get(goalId) ?? 0, expanded };
    }

    const currentScore = gScore.get(current) ?? Infinity;
    for (const { nodeId, edge } of graph.neighbors(current)) {
      if (closed.has(nodeId)) continue;
      const tentative = currentScore + edge.baseWeight * riskFactor;
      if (tentative < (gScore.get(nodeId) ?? Infinity)) {
        gScore.set(nodeId, tentative);
        cameFrom.set(nodeId, current);
        open.push(nodeId, tentative + heuristic(nodeId));
      }
    }
  }

  return null;
}

function reconstruct(cameFrom: Map<string, string>, goalId: string): string[] {
  const path = [goalId];
  let node = cameFrom.get(goalId);
  while (node !== undefined) {
    path.push(node);
    node = cameFrom.get(node);
  }
  return path.reverse();
}
