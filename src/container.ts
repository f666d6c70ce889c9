import { loadConfig, type Config } from "./config";
import { createLogger, type AppLogger } from "./logging";
import { loadQueryLog } from "./ingest/log-ingestor";
import type { QueryLog } from "./schemas/query-record";
import { DefaultSummaryService } from "./services/summary-service";
import { DefaultTrendService } from "./services/trend-service";
import { DefaultOptimizationService } from "./services/optimization-service";
import type { QueryStatsAnalyzer, ServiceRegistry } from "./services/types";

export interface AppContainer {
  config: Config;
  logger: AppLogger;
  records: QueryLog;
  services: ServiceRegistry;
  analyzer: QueryStatsAnalyzer;
}

export interface CreateContainerOptions {
  config?: Config;
  logger?: AppLogger;
  /**
   * Already-parsed records. When omitted the log at `config.logFile` is loaded.
   */
  records?: QueryLog;
}

export function createServices(records: QueryLog, config: Config): ServiceRegistry {
  return {
    summary: new DefaultSummaryService({
      records,
      topDocumentCounts: config.analysis.topDocumentCounts,
    }),
    trends: new DefaultTrendService({
      records,
      window: config.analysis.trendWindow,
    }),
    optimization: new DefaultOptimizationService({
      records,
      slowQueryQuantile: config.analysis.slowQueryQuantile,
      generationQuantile: config.analysis.generationQuantile,
    }),
  };
}

export function createAnalyzer(services: ServiceRegistry): QueryStatsAnalyzer {
  return {
    summary: () => services.summary.generateReport(),
    trends: () => services.trends.hourlyTrends(),
    optimize: () => services.optimization.findOpportunities(),
  };
}

/**
 * Loads the query log and wires the analysis services over it. Rejects with a
 * `LogLoadError` when the log is missing or malformed.
 */
export async function createAppContainer(
  options: CreateContainerOptions = {},
): Promise<AppContainer> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);

  const records =
    options.records ?? (await loadQueryLog(config.logFile, { logger }));

  const services = createServices(records, config);

  return {
    config,
    logger,
    records,
    services,
    analyzer: createAnalyzer(services),
  };
}
