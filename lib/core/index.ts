export * from "./types";
export * from "./errors";
export * from "./config";
export { createLogger, setLogLevel, type Logger } from "./logger";
export * from "./document-loader";
export * from "./extraction-client";
export * from "./response-normalizer";
export * from "./extraction-pipeline";
