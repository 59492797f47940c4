import type {
  GuidanceMessage,
  RouterStats,
  SessionSnapshot,
  SessionStatus,
  Waypoint,
} from "@waymark/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  /** Devices with a live session */
  sessions: number;
  /** Waypoints in the loaded topology */
  waypoints: number;
  topology: string;
}

export interface WaypointListResponse {
  topology: string;
  waypoints: Waypoint[];
}

export type WaypointResponse = Waypoint;

/** Answer to every ingestion endpoint (202) */
export interface IngestResponse {
  /** False when the event was dropped or not applicable */
  accepted: boolean;
  /** Session state after the event was consumed */
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

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
