import { config as loadEnvFile } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const ENVIRONMENTS = ["development", "test", "production"] as const;

const QuantileSchema = z.number().gt(0).lt(1);

export const ConfigSchema = z.object({
  env: z.enum(ENVIRONMENTS),
  logLevel: z.enum(LOG_LEVELS),
  logFile: z.string().min(1),
  analysis: z.object({
    trendWindow: z.number().int().min(1).max(168),
    slowQueryQuantile: QuantileSchema,
    generationQuantile: QuantileSchema,
    topDocumentCounts: z.number().int().min(1).max(50),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
type ConfigInput = z.input<typeof ConfigSchema>;

export type AnalysisOptions = Config["analysis"];

export type ConfigOverrides = Partial<Omit<ConfigInput, "analysis">> & {
  analysis?: Partial<ConfigInput["analysis"]>;
};

export interface LoadConfigOptions {
  /**
   * Explicit .env file location. Pass `false` to skip dotenv entirely.
   */
  envFile?: string | false;
  /**
   * Additional environment variables to overlay (useful for tests).
   */
  envVars?: Record<string, string | undefined>;
  /**
   * Toggle dotenv loading. Defaults to `true`.
   */
  useDotenv?: boolean;
  /**
   * Base directory used when resolving relative paths. Defaults to `process.cwd()`.
   */
  cwd?: string;
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {},
): Config {
  const {
    envFile,
    envVars = {},
    useDotenv = true,
    cwd: baseDir = process.cwd(),
  } = options;

  if (useDotenv) {
    const resolvedEnvPath =
      envFile === undefined
        ? path.resolve(baseDir, ".env")
        : envFile === false
          ? undefined
          : envFile;

    if (resolvedEnvPath && existsSync(resolvedEnvPath)) {
      loadEnvFile({ path: resolvedEnvPath });
    }
  }

  const mergedEnv: Record<string, string | undefined> = {
    ...process.env,
    ...envVars,
  };

  const env =
    overrides.env ??
    (mergedEnv.NODE_ENV as ConfigInput["env"]) ??
    "development";

  const logFile = path.resolve(
    baseDir,
    overrides.logFile ?? mergedEnv.QUERY_LOG_FILE ?? "query_statistics.jsonl",
  );

  const raw: ConfigInput = {
    env,
    logLevel:
      overrides.logLevel ??
      (mergedEnv.LOG_LEVEL as ConfigInput["logLevel"]) ??
      "info",
    logFile,
    analysis: {
      trendWindow:
        overrides.analysis?.trendWindow ??
        coerceInteger(mergedEnv.TREND_WINDOW, 10),
      slowQueryQuantile:
        overrides.analysis?.slowQueryQuantile ??
        coerceNumber(mergedEnv.SLOW_QUERY_QUANTILE, 0.9),
      generationQuantile:
        overrides.analysis?.generationQuantile ??
        coerceNumber(mergedEnv.GENERATION_QUANTILE, 0.9),
      topDocumentCounts:
        overrides.analysis?.topDocumentCounts ??
        coerceInteger(mergedEnv.TOP_DOCUMENT_COUNTS, 5),
    },
  };

  const parsed = ConfigSchema.parse(raw);
  cachedConfig = Object.freeze(parsed);
  return parsed;
}

function coerceInteger(
  value?: string | number | null,
  fallback?: number,
): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length) {
    const parsed = Number.parseInt(value, 10);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  if (typeof fallback === "number") {
    return fallback;
  }

  throw new Error("Unable to coerce integer value from input");
}

function coerceNumber(
  value?: string | number | null,
  fallback?: number,
): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === "string" && value.trim().length) {
    const parsed = Number.parseFloat(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  if (typeof fallback === "number") {
    return fallback;
  }

  throw new Error("Unable to coerce numeric value from input");
}
