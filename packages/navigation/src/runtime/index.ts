export * from "./navigation-runtime.js";
export * from "./session-registry.js";
