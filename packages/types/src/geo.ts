/**
 * Geographic utility types.
 */

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** A GPS fix accepted by the event router */
export interface PositionFix {
  coordinate: Coordinate;
  /** Monotonic sensor timestamp in milliseconds */
  timestamp: number;
  /** Meters above sea level, when the receiver reports it */
  altitude?: number;
}

/** Receiver state as last seen by a session */
export type GpsStatus = "waiting-for-fix" | "fix-acquired";
