/**
 * Immutable waypoint graph.
 *
 * Built once from a topology description and shared by reference between
 * all sessions. There are no mutation operations after load.
 */

import type {
  Coordinate,
  NearestWaypoint,
  TurnHint,
  Waypoint,
  WaypointEdge,
  WaypointId,
} from "@waymark/types";
import { InvalidTopologyError, UnknownWaypointError } from "../domain/errors.js";
import { isWaypointId } from "../domain/waypoint-id.js";
import { haversineDistance } from "./geo.js";
import { parseTopology } from "./topology.js";

/** A directly connected waypoint, as returned by `neighbors` */
export interface Neighbor {
  id: WaypointId;
  cost: number;
  hint?: TurnHint;
}

export class WaypointGraph {
  readonly name: string;
  private readonly nodes: ReadonlyMap<WaypointId, Waypoint>;
  /** waypointId -> outgoing edges, in declaration order */
  private readonly adjacency: ReadonlyMap<WaypointId, readonly WaypointEdge[]>;

  private constructor(
    name: string,
    nodes: ReadonlyMap<WaypointId, Waypoint>,
    adjacency: ReadonlyMap<WaypointId, readonly WaypointEdge[]>,
  ) {
    this.name = name;
    this.nodes = nodes;
    this.adjacency = adjacency;
  }

  /**
   * Build a graph from a declarative topology (typed or freshly parsed JSON).
   *
   * Throws InvalidTopologyError on schema violations, duplicate waypoint
   * ids, edges to undeclared waypoints, self-loops and repeated connections.
   * All problems are collected before throwing.
   */
  static load(topology: unknown): WaypointGraph {
    const parsed = parseTopology(topology);
    const issues: string[] = [];
    const nodes = new Map<WaypointId, Waypoint>();
    const adjacency = new Map<WaypointId, WaypointEdge[]>();

    for (const declared of parsed.waypoints) {
      if (!isWaypointId(declared.id)) {
        issues.push(`malformed waypoint id ${declared.id}`);
        continue;
      }
      if (nodes.has(declared.id)) {
        issues.push(`duplicate waypoint ${declared.id}`);
        continue;
      }
      const waypoint: Waypoint = declared.coordinate
        ? {
            id: declared.id,
            label: declared.label,
            coordinate: Object.freeze({ ...declared.coordinate }),
          }
        : { id: declared.id, label: declared.label };
      nodes.set(declared.id, Object.freeze(waypoint));
      adjacency.set(declared.id, []);
    }

    function addArc(from: WaypointId, to: WaypointId, cost: number, hint?: TurnHint): void {
      const edges = adjacency.get(from);
      if (!edges) return;
      if (edges.some((e) => e.to === to)) {
        issues.push(`duplicate connection ${from} -> ${to}`);
        return;
      }
      const edge: WaypointEdge = hint ? { from, to, cost, hint } : { from, to, cost };
      edges.push(Object.freeze(edge));
    }

    for (const [index, declared] of parsed.edges.entries()) {
      const { from, to } = declared;
      if (!isWaypointId(from) || !nodes.has(from)) {
        issues.push(`edge ${index} references unknown waypoint ${from}`);
        continue;
      }
      if (!isWaypointId(to) || !nodes.has(to)) {
        issues.push(`edge ${index} references unknown waypoint ${to}`);
        continue;
      }
      if (from === to) {
        issues.push(`edge ${index} connects ${from} to itself`);
        continue;
      }
      const cost = declared.cost ?? 1;
      addArc(from, to, cost, declared.hint);
      if (!declared.directed) {
        addArc(to, from, cost, declared.reverseHint);
      }
    }

    if (issues.length > 0) {
      throw new InvalidTopologyError(issues);
    }

    const frozen = new Map<WaypointId, readonly WaypointEdge[]>();
    for (const [id, edges] of adjacency) {
      frozen.set(id, Object.freeze(edges));
    }

    const graph = new WaypointGraph(parsed.name ?? "unnamed", nodes, frozen);
    const components = graph.components();
    console.log(
      `[graph] Loaded "${graph.name}": ${graph.size} waypoints, ${graph.edgeCount} directed edges, ${components.length} component(s)`,
    );
    if (components.length > 1) {
      console.warn(
        `[graph] Topology is disconnected; unreachable groups: ${components.map((c) => c.join(",")).join(" | ")}`,
      );
    }
    return graph;
  }

  get size(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const edges of this.adjacency.values()) count += edges.length;
    return count;
  }

  has(id: string): id is WaypointId {
    return isWaypointId(id) && this.nodes.has(id);
  }

  get(id: string): Waypoint {
    const waypoint = isWaypointId(id) ? this.nodes.get(id) : undefined;
    if (!waypoint) throw new UnknownWaypointError(id);
    return waypoint;
  }

  /** Spoken name of a waypoint, falling back to its code */
  label(id: WaypointId): string {
    return this.nodes.get(id)?.label ?? id;
  }

  /** All waypoints in declaration order */
  waypoints(): Waypoint[] {
    return [...this.nodes.values()];
  }

  /** Directly reachable waypoints with their edge cost */
  neighbors(id: string): Neighbor[] {
    const edges = isWaypointId(id) ? this.adjacency.get(id) : undefined;
    if (!edges) throw new UnknownWaypointError(id);
    return edges.map((e) => (e.hint ? { id: e.to, cost: e.cost, hint: e.hint } : { id: e.to, cost: e.cost }));
  }

  /** The edge walked from `from` to `to`, or undefined if not adjacent */
  edge(from: WaypointId, to: WaypointId): WaypointEdge | undefined {
    return this.adjacency.get(from)?.find((e) => e.to === to);
  }

  /**
   * Connected components, treating every edge as undirected.
   * Each component is sorted; components are ordered by their first id.
   */
  components(): WaypointId[][] {
    const undirected = new Map<WaypointId, Set<WaypointId>>();
    for (const id of this.nodes.keys()) undirected.set(id, new Set());
    for (const edges of this.adjacency.values()) {
      for (const e of edges) {
        undirected.get(e.from)?.add(e.to);
        undirected.get(e.to)?.add(e.from);
      }
    }

    const seen = new Set<WaypointId>();
    const components: WaypointId[][] = [];
    for (const start of this.nodes.keys()) {
      if (seen.has(start)) continue;
      const component: WaypointId[] = [];
      const stack: WaypointId[] = [start];
      seen.add(start);
      for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
        component.push(current);
        for (const next of undirected.get(current) ?? []) {
          if (!seen.has(next)) {
            seen.add(next);
            stack.push(next);
          }
        }
      }
      components.push(component.sort());
    }
    return components.sort((a, b) => compareIds(a[0], b[0]));
  }

  /** Closest waypoint with a surveyed coordinate, or null if none has one */
  nearest(coordinate: Coordinate): NearestWaypoint | null {
    let best: NearestWaypoint | null = null;
    for (const waypoint of this.nodes.values()) {
      if (!waypoint.coordinate) continue;
      const distanceMeters = haversineDistance(coordinate, waypoint.coordinate);
      if (!best || distanceMeters < best.distanceMeters) {
        best = { waypointId: waypoint.id, distanceMeters };
      }
    }
    return best;
  }
}

function compareIds(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a < b ? -1 : 1;
}
