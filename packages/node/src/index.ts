/**
 * @exposure/node — Local node process: control API over ExposureService.
 */

export { ExposureService } from "./services/exposure-service.js";
export type { ExposureServiceConfig, ReconcileResult } from "./services/exposure-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { createNodeService } from "./bootstrap.js";
export * from "./types/index.js";
