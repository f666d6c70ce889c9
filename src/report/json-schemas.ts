import path from "node:path";
import { writeFile } from "node:fs/promises";
import { ensureDir } from "fs-extra";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { AppLogger } from "../logging";
import { QueryRecordLineSchema } from "../schemas/query-record";
import {
  HourlyTrendBucketSchema,
  OptimizationFindingSchema,
  SummaryResultSchema,
} from "../schemas/report";

interface SchemaEntry {
  filename: string;
  schema: Parameters<typeof zodToJsonSchema>[0];
  id: string;
}

const SCHEMA_ENTRIES: SchemaEntry[] = [
  {
    filename: "query-record",
    schema: QueryRecordLineSchema,
    id: "QueryRecord",
  },
  {
    filename: "summary-result",
    schema: SummaryResultSchema,
    id: "SummaryResult",
  },
  {
    filename: "hourly-trend-bucket",
    schema: HourlyTrendBucketSchema,
    id: "HourlyTrendBucket",
  },
  {
    filename: "optimization-finding",
    schema: OptimizationFindingSchema,
    id: "OptimizationFinding",
  },
];

/**
 * Writes one JSON Schema file per log-record and report shape and returns
 * the paths written.
 */
export async function writeJsonSchemas(outputDir: string, logger?: AppLogger): Promise<string[]> {
  await ensureDir(outputDir);
  logger?.info({ outputDir }, "Generating JSON schemas from Zod definitions.");

  const written: string[] = [];
  for (const entry of SCHEMA_ENTRIES) {
    const jsonSchema = zodToJsonSchema(entry.schema, {
      name: entry.id,
      target: "jsonSchema7",
      $refStrategy: "none",
    });
    const filepath = path.join(outputDir, `${entry.filename}.json`);
    await writeFile(filepath, JSON.stringify(jsonSchema, null, 2), "utf8");
    logger?.info({ schema: entry.id, filepath }, "Schema written.");
    written.push(filepath);
  }

  logger?.info({ count: written.length }, "Schema generation completed.");
  return written;
}
