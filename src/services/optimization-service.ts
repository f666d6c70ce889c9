import {
  groupBy,
  isNonEmpty,
  mean,
  percentage,
  pluck,
  quantile,
  type NonEmptyArray,
} from "../analysis/statistics";
import type { QueryLog, QueryRecord } from "../schemas/query-record";
import type { OptimizationFinding } from "../schemas/report";
import type { OptimizationService } from "./types";

export interface OptimizationServiceDependencies {
  records: QueryLog;
  slowQueryQuantile?: number;
  generationQuantile?: number;
}

/**
 * Flags slow queries, repeated uncached queries, retrievals that found
 * nothing and slow generations. Every check runs over the full record set.
 */
export class DefaultOptimizationService implements OptimizationService {
  #records: QueryLog;
  #slowQueryQuantile: number;
  #generationQuantile: number;

  constructor(deps: OptimizationServiceDependencies) {
    this.#records = deps.records;
    this.#slowQueryQuantile = deps.slowQueryQuantile ?? 0.9;
    this.#generationQuantile = deps.generationQuantile ?? 0.9;
  }

  findOpportunities(): OptimizationFinding[] {
    const records = this.#records;
    if (!isNonEmpty(records)) {
      return [];
    }

    const checks = [
      this.#slowQueries(records),
      this.#cacheOpportunities(records),
      this.#retrievalMisses(records),
      this.#generationBottlenecks(records),
    ];

    return checks.filter((finding): finding is OptimizationFinding => finding !== undefined);
  }

  #slowQueries(records: NonEmptyArray<QueryRecord>): OptimizationFinding | undefined {
    const threshold = quantile(
      pluck(records, (record) => record.totalResponseTime),
      this.#slowQueryQuantile,
    );
    const slow = records.filter((record) => record.totalResponseTime > threshold);
    if (!isNonEmpty(slow)) {
      return undefined;
    }

    return {
      kind: "slow-queries",
      count: slow.length,
      percentage: percentage(slow.length, records.length),
      avgResponseTime: mean(pluck(slow, (record) => record.totalResponseTime)),
      threshold,
    };
  }

  #cacheOpportunities(records: NonEmptyArray<QueryRecord>): OptimizationFinding | undefined {
    const uncached = records.filter((record) => !record.cached);
    const repeated = Array.from(
      groupBy(uncached, (record) => record.queryHash).values(),
    ).filter((group) => group.length > 1);
    if (!repeated.length) {
      return undefined;
    }

    return {
      kind: "cache-opportunities",
      repeatedPatterns: repeated.length,
      affectedQueries: repeated.reduce((total, group) => total + group.length, 0),
    };
  }

  #retrievalMisses(records: NonEmptyArray<QueryRecord>): OptimizationFinding | undefined {
    const misses = records.filter((record) => record.documentsRetrieved === 0);
    if (!misses.length) {
      return undefined;
    }

    return {
      kind: "retrieval-misses",
      count: misses.length,
      percentage: percentage(misses.length, records.length),
    };
  }

  #generationBottlenecks(records: NonEmptyArray<QueryRecord>): OptimizationFinding | undefined {
    const threshold = quantile(
      pluck(records, (record) => record.generationTime),
      this.#generationQuantile,
    );
    const slow = records.filter((record) => record.generationTime > threshold);
    if (!isNonEmpty(slow)) {
      return undefined;
    }

    return {
      kind: "generation-bottlenecks",
      count: slow.length,
      avgGenerationTime: mean(pluck(slow, (record) => record.generationTime)),
      threshold,
    };
  }
}
