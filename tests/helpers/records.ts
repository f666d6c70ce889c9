import type { z } from "zod";
import { parseQueryLog } from "../../src/ingest/log-ingestor";
import type { QueryLog, QueryRecordLineSchema } from "../../src/schemas/query-record";

export type RecordLineInput = z.input<typeof QueryRecordLineSchema>;

export function recordLine(overrides: Partial<RecordLineInput> = {}): RecordLineInput {
  return {
    timestamp: "2024-05-01T10:15:00+00:00",
    session_id: "session-a",
    success: true,
    error_type: null,
    cached: false,
    total_response_time: 1,
    vector_search_time: 0.2,
    generation_time: 0.6,
    query_length: 40,
    answer_length: 400,
    documents_retrieved: 5,
    unique_sources: 3,
    session_duration_seconds: null,
    query_similarity_to_previous: null,
    time_since_last_query: null,
    query_hash: "hash-1",
    ...overrides,
  };
}

export function toJsonl(lines: RecordLineInput[]): string {
  return lines.map((line) => JSON.stringify(line)).join("\n");
}

export function buildLog(lines: RecordLineInput[]): QueryLog {
  return parseQueryLog(toJsonl(lines));
}
