export * from "./guidance-emitter.js";
export * from "./phrases.js";
