import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  getConfig,
  loadConfig,
  resetConfigCache,
  type LoadConfigOptions,
} from "../src/config";

const DEFAULT_OPTIONS: LoadConfigOptions = {
  useDotenv: false,
  envVars: {},
  cwd: path.resolve("/srv/analytics"),
};

afterEach(() => {
  resetConfigCache();
});

describe("loadConfig", () => {
  it("uses sensible defaults when no overrides are provided", () => {
    const config = loadConfig(
      {},
      {
        ...DEFAULT_OPTIONS,
        envVars: {
          NODE_ENV: undefined,
          LOG_LEVEL: undefined,
          QUERY_LOG_FILE: undefined,
          TREND_WINDOW: undefined,
          SLOW_QUERY_QUANTILE: undefined,
          GENERATION_QUANTILE: undefined,
          TOP_DOCUMENT_COUNTS: undefined,
        },
      },
    );

    expect(config.env).toBe("development");
    expect(config.logLevel).toBe("info");
    expect(config.logFile).toBe(path.resolve("/srv/analytics", "query_statistics.jsonl"));
    expect(config.analysis.trendWindow).toBe(10);
    expect(config.analysis.slowQueryQuantile).toBe(0.9);
    expect(config.analysis.generationQuantile).toBe(0.9);
    expect(config.analysis.topDocumentCounts).toBe(5);
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig(
      {},
      {
        ...DEFAULT_OPTIONS,
        envVars: {
          NODE_ENV: "production",
          LOG_LEVEL: "debug",
          QUERY_LOG_FILE: "/var/log/rag/query_statistics.jsonl",
          TREND_WINDOW: "24",
          SLOW_QUERY_QUANTILE: "0.95",
          GENERATION_QUANTILE: "0.8",
          TOP_DOCUMENT_COUNTS: "3",
        },
      },
    );

    expect(config.env).toBe("production");
    expect(config.logLevel).toBe("debug");
    expect(config.logFile).toBe(path.resolve("/var/log/rag/query_statistics.jsonl"));
    expect(config.analysis.trendWindow).toBe(24);
    expect(config.analysis.slowQueryQuantile).toBe(0.95);
    expect(config.analysis.generationQuantile).toBe(0.8);
    expect(config.analysis.topDocumentCounts).toBe(3);
  });

  it("honors explicit override parameters", () => {
    const config = loadConfig(
      {
        env: "test",
        logLevel: "trace",
        logFile: "logs/queries.jsonl",
        analysis: {
          trendWindow: 48,
        },
      },
      { ...DEFAULT_OPTIONS, envVars: { TREND_WINDOW: "12" } },
    );

    expect(config.env).toBe("test");
    expect(config.logLevel).toBe("trace");
    expect(config.logFile).toBe(path.resolve("/srv/analytics", "logs/queries.jsonl"));
    expect(config.analysis.trendWindow).toBe(48);
  });

  it("throws when overrides violate schema constraints", () => {
    expect(() =>
      loadConfig({ analysis: { slowQueryQuantile: 1.5 } }, DEFAULT_OPTIONS),
    ).toThrow();
    expect(() =>
      loadConfig({ analysis: { trendWindow: 0 } }, DEFAULT_OPTIONS),
    ).toThrow();
  });

  it("caches the most recently loaded configuration", () => {
    const loaded = loadConfig({ env: "test" }, DEFAULT_OPTIONS);

    expect(getConfig()).toEqual(loaded);
  });
});
