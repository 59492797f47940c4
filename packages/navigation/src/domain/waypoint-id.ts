import type { WaypointId } from "@waymark/types";

const WAYPOINT_ID_PATTERN = /^[AB][1-9]\d*$/;

/** True for a well-formed code such as "A7" (no leading zeros, index >= 1) */
export function isWaypointId(value: string): value is WaypointId {
  return WAYPOINT_ID_PATTERN.test(value);
}

