/**
 * Metrics and Observability Module
 *
 * Prometheus metrics for task flow and loop health, plus structured JSON
 * logging with correlation IDs.
 */

// Prometheus metrics
export { OrchestratorMetrics, DEFAULT_METRICS_CONFIG } from './prometheus';
export type { MetricsConfig, CycleOutcome } from './prometheus';

// Structured logger
export { StructuredLogger, DEFAULT_LOGGER_CONFIG, isLogLevel, errorFields } from './logger';
export type { LogLevel, LogEntry, LoggerConfig } from './logger';
