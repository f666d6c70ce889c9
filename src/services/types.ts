import type {
  HourlyTrendBucket,
  OptimizationFinding,
  SummaryResult,
} from "../schemas/report";

export interface SummaryService {
  generateReport(): SummaryResult;
}

export interface TrendService {
  hourlyTrends(): HourlyTrendBucket[];
}

export interface OptimizationService {
  findOpportunities(): OptimizationFinding[];
}

export interface ServiceRegistry {
  summary: SummaryService;
  trends: TrendService;
  optimization: OptimizationService;
}

/**
 * The three read-only operations offered over one loaded query log.
 */
export interface QueryStatsAnalyzer {
  summary(): SummaryResult;
  trends(): HourlyTrendBucket[];
  optimize(): OptimizationFinding[];
}
