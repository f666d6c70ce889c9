import { z } from "zod";

export const SummaryReportSchema = z.object({
  overview: z.object({
    totalQueries: z.number().int().positive(),
    uniqueSessions: z.number().int().positive(),
    dateRange: z.object({
      start: z.string(),
      end: z.string(),
    }),
    successRate: z.number().min(0).max(100),
    cacheHitRate: z.number().min(0).max(100),
  }),
  performance: z.object({
    avgResponseTime: z.number(),
    medianResponseTime: z.number(),
    p95ResponseTime: z.number(),
    avgSearchTime: z.number(),
    avgGenerationTime: z.number(),
    fastestQuery: z.number(),
    slowestQuery: z.number(),
  }),
  contentAnalysis: z.object({
    avgQueryLength: z.number(),
    avgAnswerLength: z.number(),
    avgDocumentsRetrieved: z.number(),
    avgUniqueSources: z.number(),
    mostCommonDocumentCounts: z.array(
      z.object({
        documentsRetrieved: z.number().int().nonnegative(),
        count: z.number().int().positive(),
      }),
    ),
  }),
  userBehavior: z.object({
    avgSessionDuration: z.number().nullable(),
    avgQueriesPerSession: z.number(),
    avgQuerySimilarity: z.number().nullable(),
    avgTimeBetweenQueries: z.number().nullable(),
  }),
  errorAnalysis: z.object({
    errorRate: z.number().min(0).max(100),
    errorTypes: z.array(
      z.object({
        errorType: z.string(),
        count: z.number().int().positive(),
      }),
    ),
  }),
});

export const SummaryResultSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), report: SummaryReportSchema }),
  z.object({ status: z.literal("no-data") }),
]);

export const HourlyTrendBucketSchema = z.object({
  hour: z.string(),
  queryCount: z.number().int().positive(),
  avgResponseTime: z.number(),
  successRate: z.number().min(0).max(1),
  cacheHitRate: z.number().min(0).max(1),
});

export const OptimizationFindingSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("slow-queries"),
    count: z.number().int().positive(),
    percentage: z.number(),
    avgResponseTime: z.number(),
    threshold: z.number(),
  }),
  z.object({
    kind: z.literal("cache-opportunities"),
    repeatedPatterns: z.number().int().positive(),
    affectedQueries: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal("retrieval-misses"),
    count: z.number().int().positive(),
    percentage: z.number(),
  }),
  z.object({
    kind: z.literal("generation-bottlenecks"),
    count: z.number().int().positive(),
    avgGenerationTime: z.number(),
    threshold: z.number(),
  }),
]);

export type SummaryReport = z.infer<typeof SummaryReportSchema>;
export type SummaryResult = z.infer<typeof SummaryResultSchema>;
export type HourlyTrendBucket = z.infer<typeof HourlyTrendBucketSchema>;
export type OptimizationFinding = z.infer<typeof OptimizationFindingSchema>;
export type OptimizationFindingKind = OptimizationFinding["kind"];
