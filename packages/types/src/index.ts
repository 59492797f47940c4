/**
 * @waymark/types
 *
 * Shared domain types for the indoor navigation engine.
 *
 * - Waypoint: a QR-marked location and the topology it is loaded from
 * - Route: the result of pathfinding
 * - Session: trip state, events, snapshots and guidance
 */

export * from "./geo.js";
export * from "./waypoint.js";
export * from "./route.js";
export * from "./session.js";
