import { z } from "zod";

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Parses an ISO-8601 date or date-time into a UTC instant.
 * Values without an offset are read as UTC. Returns `undefined` for
 * anything that is not a real calendar date-time.
 */
export function parseTimestamp(value: string): Date | undefined {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction, zone] = match;
  const parts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };

  if (parts.month < 1 || parts.month > 12 || parts.hour > 23 || parts.minute > 59 || parts.second > 59) {
    return undefined;
  }

  const millis = fraction ? Number(fraction.padEnd(3, "0").slice(0, 3)) : 0;
  // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
  const instant = new Date(0);
  instant.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  instant.setUTCHours(parts.hour, parts.minute, parts.second, millis);
  if (
    instant.getUTCFullYear() !== parts.year ||
    instant.getUTCMonth() !== parts.month - 1 ||
    instant.getUTCDate() !== parts.day
  ) {
    return undefined;
  }

  return new Date(instant.getTime() - offsetMinutes(zone) * 60_000);
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") {
    return 0;
  }

  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

const TimestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ISO-8601 timestamp "${value}"`,
    });
    return z.NEVER;
  }
  return parsed;
});

const DurationSchema = z.number().nonnegative();
const CountSchema = z.number().int().nonnegative();

/**
 * One line of the query statistics log, as written by the answering service.
 * Keys the analyzer does not use (`query_id`, `query`, `sources`, ...) are stripped.
 */
export const QueryRecordLineSchema = z.object({
  timestamp: TimestampSchema,
  session_id: z.string(),
  success: z.boolean(),
  error_type: z.string().nullish(),
  cached: z.boolean(),
  total_response_time: DurationSchema,
  vector_search_time: DurationSchema,
  generation_time: DurationSchema,
  query_length: CountSchema,
  answer_length: CountSchema,
  documents_retrieved: CountSchema,
  unique_sources: CountSchema,
  session_duration_seconds: DurationSchema.nullish(),
  query_similarity_to_previous: z.number().min(0).max(1).nullish(),
  time_since_last_query: DurationSchema.nullish(),
  query_hash: z.string(),
});

export type QueryRecordLine = z.infer<typeof QueryRecordLineSchema>;

export interface QueryRecord {
  readonly timestamp: Date;
  readonly sessionId: string;
  readonly success: boolean;
  readonly errorType?: string;
  readonly cached: boolean;
  readonly totalResponseTime: number;
  readonly vectorSearchTime: number;
  readonly generationTime: number;
  readonly queryLength: number;
  readonly answerLength: number;
  readonly documentsRetrieved: number;
  readonly uniqueSources: number;
  readonly sessionDurationSeconds?: number;
  readonly querySimilarityToPrevious?: number;
  readonly timeSinceLastQuery?: number;
  readonly queryHash: string;
}

export type QueryLog = ReadonlyArray<QueryRecord>;

export function toQueryRecord(line: QueryRecordLine): QueryRecord {
  return Object.freeze({
    timestamp: line.timestamp,
    sessionId: line.session_id,
    success: line.success,
    errorType: line.error_type ?? undefined,
    cached: line.cached,
    totalResponseTime: line.total_response_time,
    vectorSearchTime: line.vector_search_time,
    generationTime: line.generation_time,
    queryLength: line.query_length,
    answerLength: line.answer_length,
    documentsRetrieved: line.documents_retrieved,
    uniqueSources: line.unique_sources,
    sessionDurationSeconds: line.session_duration_seconds ?? undefined,
    querySimilarityToPrevious: line.query_similarity_to_previous ?? undefined,
    timeSinceLastQuery: line.time_since_last_query ?? undefined,
    queryHash: line.query_hash,
  });
}
