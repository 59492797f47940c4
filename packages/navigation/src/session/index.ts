export * from "./types.js";
export * from "./navigation-session.js";
