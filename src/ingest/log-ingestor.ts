import { createReadStream } from "node:fs";
import { createInterface } from "node:readline/promises";
import { pathExists } from "fs-extra";
import type { ZodIssue } from "zod";
import type { AppLogger } from "../logging";
import {
  QueryRecordLineSchema,
  toQueryRecord,
  type QueryLog,
  type QueryRecord,
} from "../schemas/query-record";
import {
  LogLoadError,
  MalformedRecordError,
  normalizeReadError,
  notFoundMessage,
} from "./errors";

export interface LoadQueryLogOptions {
  logger?: AppLogger;
}

export interface ParseQueryLogOptions {
  /**
   * Source recorded on a `MalformedRecordError`.
   */
  filepath?: string;
}

/**
 * Reads a newline-delimited JSON query log into memory.
 *
 * The load is all-or-nothing: a single malformed line rejects with a
 * {@link MalformedRecordError} and no records are returned.
 */
export async function loadQueryLog(
  filepath: string,
  options: LoadQueryLogOptions = {},
): Promise<QueryLog> {
  const { logger } = options;

  if (!(await pathExists(filepath))) {
    throw new LogLoadError(notFoundMessage(filepath), "LOG_NOT_FOUND", { filepath });
  }

  const stream = createReadStream(filepath, "utf8");
  const rl = createInterface({
    input: stream,
    crlfDelay: Infinity,
  });

  const records: QueryRecord[] = [];
  let lineNumber = 0;

  try {
    for await (const line of rl) {
      lineNumber += 1;
      const record = parseQueryRecordLine(line, lineNumber, filepath);
      if (record) {
        records.push(record);
      }
    }
  } catch (error) {
    const normalized = normalizeReadError(error, { filepath });
    logger?.error(
      { filepath, code: normalized.code, lineNumber: normalized.lineNumber },
      "Failed to load query log",
    );
    throw normalized;
  } finally {
    rl.close();
    stream.destroy();
  }

  logger?.info({ filepath, count: records.length }, "Loaded query records");
  return Object.freeze(records);
}

/**
 * Parses query log text that is already in memory, with the same rules as
 * {@link loadQueryLog}.
 */
export function parseQueryLog(content: string, options: ParseQueryLogOptions = {}): QueryLog {
  const records: QueryRecord[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const record = parseQueryRecordLine(line, index + 1, options.filepath);
    if (record) {
      records.push(record);
    }
  });

  return Object.freeze(records);
}

/**
 * Decodes one log line. Blank lines yield `undefined`; anything else must be a
 * valid record or a {@link MalformedRecordError} is thrown.
 */
export function parseQueryRecordLine(
  line: string,
  lineNumber: number,
  filepath?: string,
): QueryRecord | undefined {
  const trimmed = line.trim();
  if (!trimmed) {
    return undefined;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(trimmed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedRecordError(`Line ${lineNumber}: invalid JSON (${reason})`, {
      filepath,
      lineNumber,
      cause: error,
    });
  }

  const parsed = QueryRecordLineSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `Line ${lineNumber}: ${describeIssues(parsed.error.issues)}`,
      { filepath, lineNumber, cause: parsed.error },
    );
  }

  return toQueryRecord(parsed.data);
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length ? issue.path.join(".") : "(record)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}
