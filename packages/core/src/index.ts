export { TravelGateway } from "./gateway.js";
export type { TravelGatewayOptions } from "./gateway.js";
export { InMemoryEventBus } from "./bus.js";
export { createLogger, JsonLogger } from "./logger.js";
export type { LogSink } from "./logger.js";
export { loadAppConfig, missingApiKeys, AppConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createEvent, createTraceContext } from "@wayfarer/runtime";
