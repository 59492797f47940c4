/**
 * API request/response types for the Waymark navigation server.
 *
 * Domain shapes come from @waymark/types; the envelopes below mirror the
 * server's models.
 */

import type {
  GuidanceMessage,
  RouterStats,
  SessionSnapshot,
  SessionStatus,
  Waypoint,
} from "@waymark/types";

export type {
  Coordinate,
  GuidanceKind,
  GpsStatus,
  GuidanceMessage,
  RouteProgress,
  RouterStats,
  SessionSnapshot,
  SessionStatus,
  TurnHint,
  Waypoint,
  WaypointId,
} from "@waymark/types";

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  sessions: number;
  waypoints: number;
  topology: string;
}

// ---------------------------------------------------------------------------
// Waypoints
// ---------------------------------------------------------------------------

export interface WaypointListResponse {
  topology: string;
  waypoints: Waypoint[];
}

// ---------------------------------------------------------------------------
// Devices
// ---------------------------------------------------------------------------

export interface ScanRequest {
  waypointId: string;
  /** Sensor time in ms; the server clock is used when omitted */
  timestamp?: number;
}

export interface PositionRequest {
  lat: number;
  lng: number;
  timestamp?: number;
  /** Metres above sea level */
  altitude?: number;
}

export type DestinationRequest = { waypointId: string } | { spoken: string };

export interface IngestResponse {
  accepted: boolean;
  state: SessionStatus;
}

export type SessionResponse = SessionSnapshot;

export interface GuidanceListResponse {
  deviceId: string;
  messages: GuidanceMessage[];
}

export interface DiagnosticsResponse {
  deviceId: string;
  router: RouterStats;
  speech: {
    pending: number;
    failures: number;
  };
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
