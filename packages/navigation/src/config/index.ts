export * from "./configs-root.js";
export * from "./navigation-config.js";
