export * from "./errors";
export * from "./config";
export * from "./integrity";
export * from "./retry";
export { logger, createSilentLogger } from "./logger";
export type { Logger } from "./logger";
export { measure } from "./measure";
