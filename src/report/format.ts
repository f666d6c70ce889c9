/**
 * Plain-text rendering of analyzer results for terminal output.
 */
import type {
  HourlyTrendBucket,
  OptimizationFinding,
  SummaryResult,
} from "../schemas/report";

const RULE = "=".repeat(60);

function section(title: string, lines: string[]): string[] {
  return ["", title, "-".repeat(30), ...lines];
}

function fixed(value: number | null, digits: number, suffix = ""): string {
  return value === null ? "n/a" : `${value.toFixed(digits)}${suffix}`;
}

function count(value: number): string {
  return value.toLocaleString("en-US");
}

export function renderSummary(result: SummaryResult): string {
  if (result.status === "no-data") {
    return "No data available";
  }

  const { overview, performance, contentAnalysis, userBehavior, errorAnalysis } = result.report;

  const lines = [
    RULE,
    "QUERY STATISTICS REPORT",
    RULE,
    ...section("OVERVIEW", [
      `Total Queries: ${count(overview.totalQueries)}`,
      `Unique Sessions: ${count(overview.uniqueSessions)}`,
      `Date Range: ${overview.dateRange.start.slice(0, 10)} to ${overview.dateRange.end.slice(0, 10)}`,
      `Success Rate: ${fixed(overview.successRate, 1, "%")}`,
      `Cache Hit Rate: ${fixed(overview.cacheHitRate, 1, "%")}`,
    ]),
    ...section("PERFORMANCE METRICS", [
      `Average Response Time: ${fixed(performance.avgResponseTime, 2, "s")}`,
      `Median Response Time: ${fixed(performance.medianResponseTime, 2, "s")}`,
      `95th Percentile: ${fixed(performance.p95ResponseTime, 2, "s")}`,
      `Average Search Time: ${fixed(performance.avgSearchTime, 2, "s")}`,
      `Average Generation Time: ${fixed(performance.avgGenerationTime, 2, "s")}`,
      `Fastest Query: ${fixed(performance.fastestQuery, 2, "s")}`,
      `Slowest Query: ${fixed(performance.slowestQuery, 2, "s")}`,
    ]),
    ...section("CONTENT ANALYSIS", [
      `Average Query Length: ${fixed(contentAnalysis.avgQueryLength, 0, " characters")}`,
      `Average Answer Length: ${fixed(contentAnalysis.avgAnswerLength, 0, " characters")}`,
      `Average Documents Retrieved: ${fixed(contentAnalysis.avgDocumentsRetrieved, 1)}`,
      `Average Unique Sources: ${fixed(contentAnalysis.avgUniqueSources, 1)}`,
    ]),
    ...section("USER BEHAVIOR", [
      `Average Session Duration: ${fixed(userBehavior.avgSessionDuration, 0, " seconds")}`,
      `Average Queries per Session: ${fixed(userBehavior.avgQueriesPerSession, 1)}`,
      `Average Query Similarity: ${fixed(userBehavior.avgQuerySimilarity, 2)}`,
      `Average Time Between Queries: ${fixed(userBehavior.avgTimeBetweenQueries, 0, " seconds")}`,
    ]),
    ...section("ERROR ANALYSIS", [
      `Error Rate: ${fixed(errorAnalysis.errorRate, 1, "%")}`,
      ...(errorAnalysis.errorTypes.length
        ? [
            "Error Types:",
            ...errorAnalysis.errorTypes.map(({ errorType, count: n }) => `  - ${errorType}: ${n}`),
          ]
        : []),
    ]),
    "",
    RULE,
  ];

  return lines.join("\n");
}

/**
 * Aligned table of hourly buckets, oldest first.
 */
export function renderTrends(buckets: HourlyTrendBucket[]): string {
  if (!buckets.length) {
    return "No data available for trend analysis";
  }

  const headers = ["Hour (UTC)", "Queries", "Avg Response (s)", "Success", "Cached"];
  const rows = buckets.map((bucket) => [
    bucket.hour.slice(0, 16).replace("T", " "),
    String(bucket.queryCount),
    bucket.avgResponseTime.toFixed(3),
    bucket.successRate.toFixed(3),
    bucket.cacheHitRate.toFixed(3),
  ]);

  const widths = headers.map((header, i) =>
    rows.reduce((widest, row) => Math.max(widest, row[i].length), header.length),
  );
  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd();

  return [
    "HOURLY PERFORMANCE TRENDS",
    "-".repeat(50),
    formatRow(headers),
    ...rows.map(formatRow),
  ].join("\n");
}

export function describeFinding(finding: OptimizationFinding): string {
  switch (finding.kind) {
    case "slow-queries":
      return (
        `• ${finding.count} queries (${finding.percentage.toFixed(1)}%) took longer than the ` +
        `${finding.threshold.toFixed(2)}s threshold\n` +
        `  Average slow query time: ${finding.avgResponseTime.toFixed(2)}s`
      );
    case "cache-opportunities":
      return `• ${finding.repeatedPatterns} query patterns repeated multiple times (cache opportunities)`;
    case "retrieval-misses":
      return `• ${finding.count} queries (${finding.percentage.toFixed(1)}%) found no relevant documents`;
    case "generation-bottlenecks":
      return `• ${finding.count} queries had high generation times (avg: ${finding.avgGenerationTime.toFixed(2)}s)`;
  }
}

export function renderFindings(findings: OptimizationFinding[]): string {
  const body = findings.length
    ? findings.map(describeFinding)
    : ["No optimization opportunities found."];

  return ["OPTIMIZATION OPPORTUNITIES", "-".repeat(40), ...body].join("\n");
}
