import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createAppContainer } from "../src/container";
import { loadConfig } from "../src/config";
import type { AppLogger } from "../src/logging";
import { buildLog, recordLine, toJsonl } from "./helpers/records";

const logger = {
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
} as unknown as AppLogger;

describe("createAppContainer", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "query-stats-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function configFor(filename: string) {
    return loadConfig({ env: "test", logFile: path.join(tempDir, filename) }, { useDotenv: false });
  }

  it("signals no data from every operation for an empty log", async () => {
    await writeFile(path.join(tempDir, "empty.jsonl"), "", "utf8");

    const { analyzer, records } = await createAppContainer({ config: configFor("empty.jsonl"), logger });

    expect(records).toHaveLength(0);
    expect(analyzer.summary()).toEqual({ status: "no-data" });
    expect(analyzer.trends()).toEqual([]);
    expect(analyzer.optimize()).toEqual([]);
  });

  it("refuses to build an analyzer over a log with one corrupt line", async () => {
    const lines = Array.from({ length: 9 }, (_, index) => JSON.stringify(recordLine({ query_hash: `h${index}` })));
    lines.splice(3, 0, "this is not json");
    await writeFile(path.join(tempDir, "corrupt.jsonl"), lines.join("\n"), "utf8");

    await expect(
      createAppContainer({ config: configFor("corrupt.jsonl"), logger }),
    ).rejects.toMatchObject({ code: "MALFORMED_RECORD", lineNumber: 4 });
  });

  it("wires the configured analysis options into the services", async () => {
    await writeFile(
      path.join(tempDir, "hours.jsonl"),
      toJsonl([
        recordLine({ timestamp: "2024-05-01T08:10:00Z" }),
        recordLine({ timestamp: "2024-05-01T09:10:00Z" }),
        recordLine({ timestamp: "2024-05-01T10:10:00Z" }),
      ]),
      "utf8",
    );
    const config = loadConfig(
      { env: "test", logFile: path.join(tempDir, "hours.jsonl"), analysis: { trendWindow: 1 } },
      { useDotenv: false },
    );

    const { analyzer } = await createAppContainer({ config, logger });

    expect(analyzer.trends().map((bucket) => bucket.hour)).toEqual(["2024-05-01T10:00:00.000Z"]);
  });

  it("accepts records that are already loaded", async () => {
    const records = buildLog([recordLine({ success: false, error_type: "TimeoutError" })]);

    const { analyzer } = await createAppContainer({ config: configFor("unused.jsonl"), logger, records });

    expect(analyzer.summary()).toMatchObject({
      status: "ok",
      report: { errorAnalysis: { errorRate: 100, errorTypes: [{ errorType: "TimeoutError", count: 1 }] } },
    });
  });
});
