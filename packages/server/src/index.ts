export { WebSocketBus, WaitAbortedError } from "./adapters/WebSocketBus.js";
export type { BusSocket } from "./adapters/WebSocketBus.js";
export { createServerApp } from "./app.js";
export type { CreateServerAppOptions } from "./app.js";
export { CommandQueue } from "./CommandQueue.js";
export { loadServerConfig, ServerConfigError } from "./config.js";
export type { ServerConfig } from "./config.js";
export { GameSession, UNSUPPORTED_DATA } from "./GameSession.js";
export type { SessionSocket } from "./GameSession.js";
export { handleRequest } from "./handleRequest.js";
export { createConsoleLogger } from "./logger.js";
export { startServer } from "./server.js";
export type { RunningServer } from "./server.js";
