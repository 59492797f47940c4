/**
 * Route search module.
 *
 * Point-to-point shortest paths over the waypoint graph, used both for the
 * initial route and for re-routing after a deviation.
 */

export * from "./pathfinder.js";
