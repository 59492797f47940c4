// Base
export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

// Domain clients
export { DeviceClient } from "./deviceClient.js";
export { WaypointClient } from "./waypointClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Domain
  Coordinate,
  GuidanceKind,
  GuidanceMessage,
  RouteProgress,
  RouterStats,
  SessionSnapshot,
  SessionStatus,
  TurnHint,
  Waypoint,
  WaypointId,
  // Health
  HealthResponse,
  // Waypoints
  WaypointListResponse,
  // Devices
  ScanRequest,
  PositionRequest,
  DestinationRequest,
  IngestResponse,
  SessionResponse,
  GuidanceListResponse,
  DiagnosticsResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
