/**
 * Waypoints and the static topology they are loaded from.
 *
 * A waypoint is a physical location marked by a QR code. Identifiers are a
 * series tag followed by a positive index: `A` codes mark rooms and
 * landmarks, `B` codes mark intermediate points along corridors.
 */

import type { Coordinate } from "./geo.js";

/** Series tag of a waypoint code */
export type WaypointSeries = "A" | "B";

/** Waypoint identifier, e.g. "A7" or "B12" */
export type WaypointId = `${WaypointSeries}${number}`;

/** A location marked by a QR code. Immutable once loaded. */
export interface Waypoint {
  id: WaypointId;
  /** Human-readable name spoken to the walker */
  label: string;
  /** Position for GPS correlation (outdoor or surveyed markers only) */
  coordinate?: Coordinate;
}

/** Direction hint spoken before walking an edge */
export type TurnHint =
  | "straight"
  | "left"
  | "right"
  | "around"
  | "stairs-up"
  | "stairs-down"
  | "lift";

/** A traversable connection as seen from its source waypoint */
export interface WaypointEdge {
  from: WaypointId;
  to: WaypointId;
  /** Traversal cost (distance or estimated time), never negative */
  cost: number;
  hint?: TurnHint;
}

/** One declared waypoint in a topology description */
export interface TopologyWaypoint {
  id: string;
  label: string;
  coordinate?: Coordinate;
}

/** One declared connection in a topology description */
export interface TopologyEdge {
  from: string;
  to: string;
  /** Defaults to 1 (hop count) */
  cost?: number;
  /** Only walkable from `from` to `to` */
  directed?: boolean;
  /** Hint for walking from `from` to `to` */
  hint?: TurnHint;
  /** Hint for walking from `to` back to `from` */
  reverseHint?: TurnHint;
}

/** Declarative waypoint/edge list a graph is built from */
export interface Topology {
  name?: string;
  waypoints: TopologyWaypoint[];
  edges: TopologyEdge[];
}
