export * from "./errors.js";
export * from "./waypoint-id.js";
