export * from "./errors";
export * from "./logging";
export * from "./controller";
export * from "./config/defaults";
export * from "./config/gameConfig";
export * from "./config/campaign";
export * from "./rpc/agentClient";
export * from "./rpc/contracts";
export * from "./rpc/visionClient";
export * from "./runtime/clock";
export * from "./runtime/engine";
export * from "./runtime/previewPoller";
export * from "./runtime/screenshotCache";
export * from "./runtime/traces";
export * from "./scheduler/campaignScheduler";
export * from "./types/campaign";
export * from "./types/game";
export * from "./types/session";
export * from "./worker/supervisor";
export * from "./worker/sutWorker";
