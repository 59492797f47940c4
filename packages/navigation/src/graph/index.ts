export * from "./geo.js";
export * from "./topology.js";
export * from "./waypoint-graph.js";
