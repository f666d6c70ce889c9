export { loadConfig, getConfig, resetConfigCache, ConfigSchema } from "./config";
export type { Config, ConfigOverrides, AnalysisOptions, LoadConfigOptions } from "./config";
export { createLogger } from "./logging";
export type { AppLogger, CreateLoggerOptions } from "./logging";
export { createAppContainer, createAnalyzer, createServices } from "./container";
export type { AppContainer, CreateContainerOptions } from "./container";
export { loadQueryLog, parseQueryLog, parseQueryRecordLine } from "./ingest/log-ingestor";
export type { LoadQueryLogOptions, ParseQueryLogOptions } from "./ingest/log-ingestor";
export { LogLoadError, MalformedRecordError, isLogLoadError } from "./ingest/errors";
export type { LogLoadErrorCode } from "./ingest/errors";
export { QueryRecordLineSchema, parseTimestamp, toQueryRecord } from "./schemas/query-record";
export type { QueryLog, QueryRecord, QueryRecordLine } from "./schemas/query-record";
export {
  SummaryReportSchema,
  SummaryResultSchema,
  HourlyTrendBucketSchema,
  OptimizationFindingSchema,
} from "./schemas/report";
export type {
  SummaryReport,
  SummaryResult,
  HourlyTrendBucket,
  OptimizationFinding,
  OptimizationFindingKind,
} from "./schemas/report";
export { DefaultSummaryService } from "./services/summary-service";
export { DefaultTrendService } from "./services/trend-service";
export { DefaultOptimizationService } from "./services/optimization-service";
export type { QueryStatsAnalyzer, ServiceRegistry } from "./services/types";
export { renderSummary, renderTrends, renderFindings } from "./report/format";
export { writeJsonSchemas } from "./report/json-schemas";
