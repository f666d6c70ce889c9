import { groupBy, isNonEmpty, mean, pluck } from "../analysis/statistics";
import type { QueryLog } from "../schemas/query-record";
import type { HourlyTrendBucket } from "../schemas/report";
import type { TrendService } from "./types";

const HOUR_MS = 3_600_000;

export interface TrendServiceDependencies {
  records: QueryLog;
  /**
   * Number of most recent hourly buckets to return.
   */
  window?: number;
}

export function floorToHour(timestamp: Date): number {
  return Math.floor(timestamp.getTime() / HOUR_MS) * HOUR_MS;
}

export class DefaultTrendService implements TrendService {
  #records: QueryLog;
  #window: number;

  constructor(deps: TrendServiceDependencies) {
    this.#records = deps.records;
    this.#window = deps.window ?? 10;
    if (!Number.isInteger(this.#window) || this.#window < 1) {
      throw new RangeError(`Trend window must be a positive integer, received ${this.#window}`);
    }
  }

  hourlyTrends(): HourlyTrendBucket[] {
    const buckets = groupBy(this.#records, (record) => floorToHour(record.timestamp));
    const hours = Array.from(buckets.keys()).sort((a, b) => a - b);

    const trends: HourlyTrendBucket[] = [];
    for (const hour of hours.slice(-this.#window)) {
      const records = buckets.get(hour) ?? [];
      if (!isNonEmpty(records)) {
        continue;
      }
      trends.push({
        hour: new Date(hour).toISOString(),
        queryCount: records.length,
        avgResponseTime: mean(pluck(records, (record) => record.totalResponseTime)),
        successRate: mean(pluck(records, (record) => (record.success ? 1 : 0))),
        cacheHitRate: mean(pluck(records, (record) => (record.cached ? 1 : 0))),
      });
    }

    return trends;
  }
}
