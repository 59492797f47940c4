export * from "./voice-output.js";
export * from "./speech-queue.js";
export * from "./destination-command.js";
