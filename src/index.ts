/**
 * hybrid-retrieval
 *
 * BM25 + dense vector retrieval fused with reciprocal rank and weighted
 * normalized scores.
 */

export * from "./core/index.js";
export { Logger, logger, parseLogLevel, type LogEvent, type LogLevel, type LogSink } from "./observability/logger.js";
