/**
 * Route results - the output of the pathfinder.
 */

import type { WaypointEdge, WaypointId } from "./waypoint.js";

/** An ordered path of waypoints from an origin to a destination */
export interface Route {
  /** Waypoints in walking order; first is the origin, last the destination */
  waypoints: WaypointId[];
  /** Edges between consecutive waypoints (length = waypoints.length - 1) */
  legs: WaypointEdge[];
  /** Sum of leg costs */
  totalCost: number;
}
