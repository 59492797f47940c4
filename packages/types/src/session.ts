/**
 * Navigation session types shared by the engine, the server and its clients.
 */

import type { Coordinate, GpsStatus } from "./geo.js";
import type { Route } from "./route.js";
import type { WaypointId } from "./waypoint.js";

/**
 * Lifecycle of one trip.
 *
 * idle -> awaiting-destination -> navigating <-> deviated -> arrived | aborted
 */
export type SessionStatus =
  | "idle"
  | "awaiting-destination"
  | "navigating"
  | "deviated"
  | "arrived"
  | "aborted";

/** Why a trip ended in `aborted` */
export type AbortReason = "cancelled" | "no-path";

/** Normalized input consumed by a session, one at a time */
export type NavigationEvent =
  | { type: "waypoint-scanned"; waypointId: string }
  | { type: "destination-chosen"; waypointId: string }
  | { type: "position-sample"; coordinate: Coordinate; timestamp: number; altitude?: number }
  | { type: "timeout" }
  | { type: "cancel" };

/** How far along the active route the walker is */
export interface RouteProgress {
  /** Route waypoints already confirmed by a scan */
  completed: number;
  /** Route waypoints in total, origin included */
  total: number;
  /** Cost of the legs not yet walked */
  remainingCost: number;
}

/** Nearest waypoint to the last GPS fix */
export interface NearestWaypoint {
  waypointId: WaypointId;
  distanceMeters: number;
}

/** Read-only copy of a session for monitoring */
export interface SessionSnapshot {
  deviceId: string;
  tripNumber: number;
  state: SessionStatus;
  currentWaypoint: WaypointId | null;
  destination: WaypointId | null;
  route: WaypointId[] | null;
  /** Next waypoint the walker is expected to scan */
  nextWaypoint: WaypointId | null;
  routeProgress: RouteProgress | null;
  deviationCount: number;
  lastPosition: Coordinate | null;
  /** Altitude of the last GPS fix, if the receiver reported one */
  lastAltitude: number | null;
  gpsStatus: GpsStatus;
  nearestWaypoint: NearestWaypoint | null;
  abortReason: AbortReason | null;
}

/** Category of a spoken instruction */
export type GuidanceKind =
  | "prompt-destination"
  | "proceed"
  | "off-route"
  | "arrived"
  | "aborted"
  | "error"
  | "progress"
  | "reprompt";

/** One instruction handed to the voice output */
export interface GuidanceMessage {
  kind: GuidanceKind;
  text: string;
  /** Waypoint the instruction is about, if any */
  waypointId: WaypointId | null;
  /** ISO timestamp of emission */
  at: string;
}

/** Event router counters (diagnostics only) */
export interface RouterStats {
  forwarded: number;
  duplicateScans: number;
  outOfOrder: number;
  invalidPositions: number;
  implausiblePositions: number;
  timeouts: number;
}
