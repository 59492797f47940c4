/**
 * @waymark/navigation
 *
 * Indoor navigation engine for QR-marked waypoints.
 *
 * Key concepts:
 * - Graph: immutable waypoints and walkable connections
 * - Pathfinder: deterministic minimum-cost routes
 * - Session: per-device state machine driven by scans and GPS hints
 * - Guidance: one spoken instruction per session update
 *
 * Pipeline:
 * 1. Load topology -> WaypointGraph
 * 2. Adapters report scans/positions -> EventRouter -> EventChannel
 * 3. NavigationSession consumes events, consulting the pathfinder
 * 4. GuidanceEmitter -> SpeechQueue -> voice output
 */

export * from "./domain/index.js";
export * from "./graph/index.js";
export * from "./search/index.js";
export * from "./session/index.js";
export * from "./guidance/index.js";
export * from "./events/index.js";
export * from "./voice/index.js";
export * from "./runtime/index.js";
export * from "./config/index.js";
