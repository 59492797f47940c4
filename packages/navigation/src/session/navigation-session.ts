/**
 * Per-device navigation state machine.
 *
 * Consumes one NavigationEvent at a time and never performs I/O. QR scans
 * are the authoritative position signal; GPS samples are advisory and only
 * produce "getting closer" guidance between scans.
 */

import type {
  AbortReason,
  Coordinate,
  GpsStatus,
  NavigationEvent,
  Route,
  SessionSnapshot,
  SessionStatus,
  WaypointId,
} from "@waymark/types";
import { NoPathExistsError } from "../domain/errors.js";
import { haversineDistance } from "../graph/geo.js";
import type { WaypointGraph } from "../graph/waypoint-graph.js";
import { findRoute, remainingCost } from "../search/pathfinder.js";
import type { HandleResult, SessionObserver, UpdateCause } from "./types.js";

export interface NavigationSessionOptions {
  deviceId: string;
  graph: WaypointGraph;
  /** Distance the walker must close before the next "getting closer" (default 5) */
  approachStepMeters?: number;
  observers?: SessionObserver[];
}

export class NavigationSession {
  readonly deviceId: string;
  private readonly graph: WaypointGraph;
  private readonly approachStepMeters: number;
  private readonly observers = new Set<SessionObserver>();

  private status: SessionStatus = "idle";
  private tripNumber = 1;
  private current: WaypointId | null = null;
  private destination: WaypointId | null = null;
  private route: Route | null = null;
  /** Index into route.waypoints of the next expected scan */
  private nextIndex = 0;
  private deviationCount = 0;
  private abortReason: AbortReason | null = null;
  private lastPosition: Coordinate | null = null;
  private lastAltitude: number | null = null;
  private gpsStatus: GpsStatus = "waiting-for-fix";
  /** Distance to the next waypoint at the last progress announcement */
  private announcedDistance: number | null = null;

  constructor(options: NavigationSessionOptions) {
    this.deviceId = options.deviceId;
    this.graph = options.graph;
    this.approachStepMeters = options.approachStepMeters ?? 5;
    for (const observer of options.observers ?? []) this.observers.add(observer);
  }

  get state(): SessionStatus {
    return this.status;
  }

  /** Register an observer; returns an unsubscribe function */
  subscribe(observer: SessionObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /** Apply one event. Synchronous and total over the event union. */
  handle(event: NavigationEvent): HandleResult {
    switch (event.type) {
      case "waypoint-scanned":
        return this.onScan(event.waypointId);
      case "destination-chosen":
        return this.onDestination(event.waypointId);
      case "position-sample":
        return this.onPosition(event.coordinate, event.altitude);
      case "timeout":
        return this.onTimeout();
      case "cancel":
        if (this.status === "aborted") return this.ignore("already aborted");
        return this.abort("cancelled");
    }
  }

  /** Consistent copy of the session for monitoring; never shares mutable state */
  snapshot(): SessionSnapshot {
    const route = this.route;
    return {
      deviceId: this.deviceId,
      tripNumber: this.tripNumber,
      state: this.status,
      currentWaypoint: this.current,
      destination: this.destination,
      route: route ? [...route.waypoints] : null,
      nextWaypoint: this.expectedWaypoint(),
      routeProgress: route
        ? {
            completed: Math.min(this.nextIndex, route.waypoints.length),
            total: route.waypoints.length,
            remainingCost: remainingCost(route, this.nextIndex - 1),
          }
        : null,
      deviationCount: this.deviationCount,
      lastPosition: this.lastPosition ? { ...this.lastPosition } : null,
      lastAltitude: this.lastAltitude,
      gpsStatus: this.gpsStatus,
      nearestWaypoint: this.lastPosition ? this.graph.nearest(this.lastPosition) : null,
      abortReason: this.abortReason,
    };
  }

  // ---------------------------------------------------------------------------
  // Event handlers
  // ---------------------------------------------------------------------------

  private onScan(waypointId: string): HandleResult {
    if (!this.graph.has(waypointId)) {
      return this.ignore(`unknown waypoint ${waypointId}`);
    }
    const from = this.status;

    switch (from) {
      case "arrived":
      case "aborted":
        this.resetTrip();
        return this.startTrip(from, waypointId);
      case "idle":
      case "awaiting-destination":
        return this.startTrip(from, waypointId);
      case "navigating":
        return this.onRouteScan(waypointId);
      case "deviated":
        return this.reroute(waypointId);
    }
  }

  private startTrip(from: SessionStatus, waypointId: WaypointId): HandleResult {
    this.current = waypointId;
    this.status = "awaiting-destination";
    return this.apply(from, { kind: "origin-scanned", waypointId });
  }

  private onRouteScan(waypointId: WaypointId): HandleResult {
    const route = this.route;
    const expected = this.expectedWaypoint();
    if (!route || !expected) return this.ignore("no active route");

    if (waypointId === expected) {
      this.current = waypointId;
      this.nextIndex++;
      this.announcedDistance = null;
      const next = route.waypoints[this.nextIndex];
      if (next === undefined) {
        this.status = "arrived";
        return this.apply("navigating", { kind: "arrived", waypointId });
      }
      const hint = route.legs[this.nextIndex - 1]?.hint;
      return this.apply(
        "navigating",
        hint ? { kind: "advanced", waypointId, next, hint } : { kind: "advanced", waypointId, next },
      );
    }

    if (waypointId === this.current) {
      return { outcome: "noted", state: this.status, reason: `rescan of current waypoint ${waypointId}` };
    }

    this.current = waypointId;
    this.deviationCount++;
    this.status = "deviated";
    return this.apply("navigating", { kind: "deviated", waypointId, expected });
  }

  private reroute(waypointId: WaypointId): HandleResult {
    const destination = this.destination;
    if (!destination) return this.ignore("no destination to re-route to");
    this.current = waypointId;

    let route: Route;
    try {
      route = findRoute(this.graph, waypointId, destination);
    } catch (err) {
      if (err instanceof NoPathExistsError) return this.abort("no-path");
      throw err;
    }

    this.route = route;
    this.nextIndex = 1;
    this.announcedDistance = null;
    if (route.waypoints.length <= 1) {
      this.status = "arrived";
      return this.apply("deviated", { kind: "arrived", waypointId });
    }
    this.status = "navigating";
    return this.apply("deviated", { kind: "rerouted", route });
  }

  private onDestination(waypointId: string): HandleResult {
    if (this.status !== "awaiting-destination") {
      return this.ignore(`destination-chosen while ${this.status}`);
    }
    if (!this.graph.has(waypointId)) {
      return this.ignore(`unknown waypoint ${waypointId}`);
    }
    const origin = this.current;
    if (!origin) return this.ignore("no origin scanned");

    if (waypointId === origin) {
      return this.reject({ kind: "destination-rejected", destination: waypointId, reason: "same-as-origin" });
    }

    let route: Route;
    try {
      route = findRoute(this.graph, origin, waypointId);
    } catch (err) {
      if (err instanceof NoPathExistsError) {
        return this.reject({ kind: "destination-rejected", destination: waypointId, reason: "no-path" });
      }
      throw err;
    }

    this.destination = waypointId;
    this.route = route;
    this.nextIndex = 1;
    this.announcedDistance = null;
    this.status = "navigating";
    return this.apply("awaiting-destination", { kind: "route-computed", route });
  }

  private onPosition(coordinate: Coordinate, altitude?: number): HandleResult {
    this.lastPosition = { ...coordinate };
    this.lastAltitude = altitude ?? null;
    this.gpsStatus = "fix-acquired";
    const expected = this.expectedWaypoint();
    const target = expected ? this.graph.get(expected).coordinate : undefined;
    if (!expected || !target) {
      return { outcome: "noted", state: this.status, reason: "position recorded" };
    }

    const distance = haversineDistance(coordinate, target);
    if (this.announcedDistance === null) {
      this.announcedDistance = distance;
      return { outcome: "noted", state: this.status, reason: "approach baseline recorded" };
    }
    if (distance > this.announcedDistance - this.approachStepMeters) {
      return { outcome: "noted", state: this.status, reason: "no meaningful progress" };
    }

    this.announcedDistance = distance;
    return this.apply(this.status, {
      kind: "approaching",
      waypointId: expected,
      distanceMeters: Math.round(distance),
    });
  }

  private onTimeout(): HandleResult {
    if (this.status !== "navigating" && this.status !== "deviated") {
      return this.ignore(`timeout while ${this.status}`);
    }
    return this.apply(this.status, { kind: "reprompt", expected: this.expectedWaypoint() });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Next waypoint to scan; only meaningful while navigating */
  private expectedWaypoint(): WaypointId | null {
    if (this.status !== "navigating" || !this.route) return null;
    return this.route.waypoints[this.nextIndex] ?? null;
  }

  private abort(reason: AbortReason): HandleResult {
    const from = this.status;
    this.status = "aborted";
    this.abortReason = reason;
    return this.apply(from, {
      kind: "aborted",
      reason,
      waypointId: this.current,
      destination: this.destination,
    });
  }

  private resetTrip(): void {
    this.tripNumber++;
    this.status = "idle";
    this.destination = null;
    this.route = null;
    this.nextIndex = 0;
    this.deviationCount = 0;
    this.abortReason = null;
    this.announcedDistance = null;
  }

  private apply(from: SessionStatus, cause: UpdateCause): HandleResult {
    console.log(`[session] ${this.deviceId}: ${from} -> ${this.status} (${cause.kind})`);
    this.notify(from, cause);
    return { outcome: "applied", from, to: this.status, cause };
  }

  private reject(cause: UpdateCause): HandleResult {
    console.log(`[session] ${this.deviceId}: ${this.status} rejected (${cause.kind})`);
    this.notify(this.status, cause);
    return { outcome: "rejected", from: this.status, to: this.status, cause };
  }

  private ignore(reason: string): HandleResult {
    console.warn(`[session] ${this.deviceId}: ignored event in ${this.status}: ${reason}`);
    return { outcome: "ignored", state: this.status, reason };
  }

  private notify(from: SessionStatus, cause: UpdateCause): void {
    const context = { cause, snapshot: this.snapshot() };
    for (const observer of this.observers) {
      try {
        observer.onTransition(from, this.status, context);
      } catch (err) {
        console.error(`[session] ${this.deviceId}: observer failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
