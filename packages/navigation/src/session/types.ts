/**
 * Session update vocabulary shared by the state machine and its observers.
 */

import type {
  AbortReason,
  Route,
  SessionSnapshot,
  SessionStatus,
  TurnHint,
  WaypointId,
} from "@waymark/types";

/** What caused a session update; drives the guidance phrasing */
export type UpdateCause =
  | { kind: "origin-scanned"; waypointId: WaypointId }
  | { kind: "route-computed"; route: Route }
  | {
      kind: "destination-rejected";
      destination: WaypointId;
      reason: "no-path" | "same-as-origin";
    }
  | { kind: "advanced"; waypointId: WaypointId; next: WaypointId; hint?: TurnHint }
  | { kind: "arrived"; waypointId: WaypointId }
  | { kind: "deviated"; waypointId: WaypointId; expected: WaypointId }
  | { kind: "rerouted"; route: Route }
  | { kind: "aborted"; reason: AbortReason; waypointId: WaypointId | null; destination: WaypointId | null }
  | { kind: "approaching"; waypointId: WaypointId; distanceMeters: number }
  | { kind: "reprompt"; expected: WaypointId | null };

export interface TransitionContext {
  cause: UpdateCause;
  /** Session state after the update */
  snapshot: SessionSnapshot;
}

/** Notified synchronously after every applied or rejected update */
export interface SessionObserver {
  onTransition(from: SessionStatus, to: SessionStatus, context: TransitionContext): void;
}

/**
 * Outcome of handling one event. Nothing is thrown across the session
 * boundary; recoverable conditions come back as `rejected`.
 *
 * - applied: state changed, or an advisory was produced (guidance emitted)
 * - rejected: the event was understood but could not be honored (guidance emitted)
 * - noted: accepted without guidance (e.g. a GPS fix recorded)
 * - ignored: not applicable in the current state, or an unknown waypoint (logged)
 */
export type HandleResult =
  | {
      outcome: "applied" | "rejected";
      from: SessionStatus;
      to: SessionStatus;
      cause: UpdateCause;
    }
  | { outcome: "noted" | "ignored"; state: SessionStatus; reason: string };
