/**
 * Minimum-cost routing over the waypoint graph.
 *
 * Dijkstra over non-negative edge costs where every tentative label carries
 * its full path. Labels are ordered by (total cost, hop count, waypoint id
 * sequence), which makes the chosen route deterministic among equal-cost
 * alternatives. The order is preserved when a common edge is appended to two
 * labels ending at the same waypoint, so settling by it stays correct.
 *
 * The frontier is a plain map scanned for its minimum.
 */

import type { Route, WaypointEdge, WaypointId } from "@waymark/types";
import { NoPathExistsError, UnknownWaypointError } from "../domain/errors.js";
import type { WaypointGraph } from "../graph/waypoint-graph.js";

interface Label {
  cost: number;
  path: WaypointId[];
  legs: WaypointEdge[];
}

/** Compare two waypoint id sequences element by element, then by length */
export function compareIdSequences(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i];
    const y = b[i];
    if (x === y || x === undefined || y === undefined) continue;
    return x < y ? -1 : 1;
  }
  return a.length - b.length;
}

function compareLabels(a: Label, b: Label): number {
  if (a.cost !== b.cost) return a.cost < b.cost ? -1 : 1;
  if (a.path.length !== b.path.length) return a.path.length - b.path.length;
  return compareIdSequences(a.path, b.path);
}

/**
 * Find the minimum-cost route between two waypoints.
 *
 * Ties on cost go to the route with fewer hops, then to the lexicographically
 * smaller id sequence. Any waypoint can be the origin, so this is also the
 * re-routing entry point after a deviation.
 *
 * @throws UnknownWaypointError if either endpoint is not in the graph
 * @throws NoPathExistsError if the destination is unreachable
 */
export function findRoute(graph: WaypointGraph, origin: string, destination: string): Route {
  if (!graph.has(origin)) throw new UnknownWaypointError(origin);
  if (!graph.has(destination)) throw new UnknownWaypointError(destination);

  const frontier = new Map<WaypointId, Label>([[origin, { cost: 0, path: [origin], legs: [] }]]);
  const settled = new Set<WaypointId>();

  for (;;) {
    let currentId: WaypointId | undefined;
    let current: Label | undefined;
    for (const [id, label] of frontier) {
      if (!current || compareLabels(label, current) < 0) {
        currentId = id;
        current = label;
      }
    }

    if (currentId === undefined || current === undefined) {
      throw new NoPathExistsError(origin, destination);
    }

    if (currentId === destination) {
      console.log(
        `[pathfinder] ${origin} -> ${destination}: ${current.path.join(" > ")} (cost ${current.cost})`,
      );
      return { waypoints: current.path, legs: current.legs, totalCost: current.cost };
    }

    frontier.delete(currentId);
    settled.add(currentId);

    for (const neighbor of graph.neighbors(currentId)) {
      if (settled.has(neighbor.id)) continue;
      const edge = graph.edge(currentId, neighbor.id);
      if (!edge) continue;
      const candidate: Label = {
        cost: current.cost + neighbor.cost,
        path: [...current.path, neighbor.id],
        legs: [...current.legs, edge],
      };
      const existing = frontier.get(neighbor.id);
      if (!existing || compareLabels(candidate, existing) < 0) {
        frontier.set(neighbor.id, candidate);
      }
    }
  }
}

/** Sum of the costs of legs from `fromIndex` (a waypoint index) to the end */
export function remainingCost(route: Route, fromIndex: number): number {
  let cost = 0;
  for (const leg of route.legs.slice(Math.max(fromIndex, 0))) cost += leg.cost;
  return cost;
}
