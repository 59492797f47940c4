export * from "./event-channel.js";
export * from "./event-router.js";
export * from "./idle-watchdog.js";
