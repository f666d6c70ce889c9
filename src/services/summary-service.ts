import {
  groupBy,
  isNonEmpty,
  max,
  mean,
  meanOfDefined,
  median,
  min,
  percentage,
  pluck,
  quantile,
  valueCounts,
} from "../analysis/statistics";
import type { QueryLog, QueryRecord } from "../schemas/query-record";
import type { SummaryReport, SummaryResult } from "../schemas/report";
import type { SummaryService } from "./types";

const RESPONSE_TIME_PERCENTILE = 0.95;

export interface SummaryServiceDependencies {
  records: QueryLog;
  /**
   * How many entries the most-common documents-retrieved table keeps.
   */
  topDocumentCounts?: number;
}

export class DefaultSummaryService implements SummaryService {
  #records: QueryLog;
  #topDocumentCounts: number;

  constructor(deps: SummaryServiceDependencies) {
    this.#records = deps.records;
    this.#topDocumentCounts = deps.topDocumentCounts ?? 5;
  }

  generateReport(): SummaryResult {
    const records = this.#records;
    if (!isNonEmpty(records)) {
      return { status: "no-data" };
    }

    const total = records.length;
    const sessions = groupBy(records, (record) => record.sessionId);
    const timestamps = pluck(records, (record) => record.timestamp.getTime());
    const responseTimes = pluck(records, (record) => record.totalResponseTime);
    const successCount = records.filter((record) => record.success).length;
    const cachedCount = records.filter((record) => record.cached).length;
    const failed = records.filter((record) => !record.success);

    const report: SummaryReport = {
      overview: {
        totalQueries: total,
        uniqueSessions: sessions.size,
        dateRange: {
          start: new Date(min(timestamps)).toISOString(),
          end: new Date(max(timestamps)).toISOString(),
        },
        successRate: percentage(successCount, total),
        cacheHitRate: percentage(cachedCount, total),
      },
      performance: {
        avgResponseTime: mean(responseTimes),
        medianResponseTime: median(responseTimes),
        p95ResponseTime: quantile(responseTimes, RESPONSE_TIME_PERCENTILE),
        avgSearchTime: mean(pluck(records, (record) => record.vectorSearchTime)),
        avgGenerationTime: mean(pluck(records, (record) => record.generationTime)),
        fastestQuery: min(responseTimes),
        slowestQuery: max(responseTimes),
      },
      contentAnalysis: {
        avgQueryLength: mean(pluck(records, (record) => record.queryLength)),
        avgAnswerLength: mean(pluck(records, (record) => record.answerLength)),
        avgDocumentsRetrieved: mean(pluck(records, (record) => record.documentsRetrieved)),
        avgUniqueSources: mean(pluck(records, (record) => record.uniqueSources)),
        mostCommonDocumentCounts: valueCounts(records.map((record) => record.documentsRetrieved))
          .slice(0, this.#topDocumentCounts)
          .map(({ value, count }) => ({ documentsRetrieved: value, count })),
      },
      userBehavior: {
        avgSessionDuration: meanOfDefined(
          Array.from(sessions.values(), longestSessionDuration),
        ),
        avgQueriesPerSession: total / sessions.size,
        avgQuerySimilarity: meanOfDefined(
          records.map((record) => record.querySimilarityToPrevious),
        ),
        avgTimeBetweenQueries: meanOfDefined(
          records.map((record) => record.timeSinceLastQuery),
        ),
      },
      errorAnalysis: {
        errorRate: percentage(failed.length, total),
        errorTypes: valueCounts(
          failed.flatMap((record) => (record.errorType === undefined ? [] : [record.errorType])),
        ).map(({ value, count }) => ({ errorType: value, count })),
      },
    };

    return { status: "ok", report };
  }
}

// Sessions whose records all lack a duration contribute nothing.
function longestSessionDuration(session: readonly QueryRecord[]): number | undefined {
  const durations = session.flatMap((record) =>
    record.sessionDurationSeconds === undefined ? [] : [record.sessionDurationSeconds],
  );
  return isNonEmpty(durations) ? max(durations) : undefined;
}
