export * from "./types";
export { StructuredLogger, noopLogger, type StructuredLoggerOptions } from "./structuredLogger";
export { createConsoleSink, formatLogLine, type ConsoleFormat } from "./sinks/consoleSink";
export { createFileSink } from "./sinks/fileSink";
export { createWebhookSink } from "./sinks/webhookSink";
