/**
 * query-stats — summary, trends and optimization analysis of a query log
 */
import { parseArgs } from "node:util";
import { loadConfig } from "../config";
import { createLogger, type AppLogger } from "../logging";
import { createAppContainer, type AppContainer } from "../container";
import { isLogLoadError } from "../ingest/errors";
import { renderFindings, renderSummary, renderTrends } from "../report/format";

export const HELP = `Usage: query-stats [options]

Analyze the query statistics log written by the answering service.

Options:
  --log-file <path>     Path to the query statistics log (default: query_statistics.jsonl)
  --summary             Summary report
  --trends              Hourly performance trends
  --optimize            Optimization opportunities
  --all                 Run every analysis
  --format <fmt>        Output format: text (default) or json
  -h, --help            Show help

Without a section flag only the summary is produced.`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: AppLogger;
}

export interface CliSelection {
  summary: boolean;
  trends: boolean;
  optimize: boolean;
}

export function selectSections(values: {
  summary?: boolean;
  trends?: boolean;
  optimize?: boolean;
  all?: boolean;
}): CliSelection {
  const all = values.all ?? false;
  const selection = {
    summary: all || (values.summary ?? false),
    trends: all || (values.trends ?? false),
    optimize: all || (values.optimize ?? false),
  };

  if (!selection.summary && !selection.trends && !selection.optimize) {
    return { ...selection, summary: true };
  }
  return selection;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      "log-file": { type: "string" },
      summary: { type: "boolean", default: false },
      trends: { type: "boolean", default: false },
      optimize: { type: "boolean", default: false },
      all: { type: "boolean", default: false },
      format: { type: "string", short: "f", default: "text" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  }).values;
}

type CliValues = ReturnType<typeof parseCliArgs>;

/**
 * Runs the CLI against `argv` and resolves with the process exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let values: CliValues;
  try {
    values = parseCliArgs(argv);
  } catch (error) {
    io.stderr(error instanceof Error ? error.message : String(error));
    io.stderr(HELP);
    return 1;
  }

  if (values.help) {
    io.stdout(HELP);
    return 0;
  }

  if (values.format !== "text" && values.format !== "json") {
    io.stderr(`Unknown format: ${values.format}`);
    return 1;
  }

  const config = loadConfig({ logFile: values["log-file"] });
  const logger = io.logger ?? createLogger(config);

  let container: AppContainer;
  try {
    container = await createAppContainer({ config, logger });
  } catch (error) {
    if (isLogLoadError(error)) {
      io.stderr(`Error loading data: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const { analyzer } = container;
  const selection = selectSections(values);

  if (values.format === "json") {
    io.stdout(
      JSON.stringify(
        {
          ...(selection.summary ? { summary: analyzer.summary() } : {}),
          ...(selection.trends ? { trends: analyzer.trends() } : {}),
          ...(selection.optimize ? { optimizations: analyzer.optimize() } : {}),
        },
        null,
        2,
      ),
    );
    return 0;
  }

  const sections: string[] = [];
  if (selection.summary) {
    sections.push(renderSummary(analyzer.summary()));
  }
  if (selection.trends) {
    sections.push(renderTrends(analyzer.trends()));
  }
  if (selection.optimize) {
    sections.push(renderFindings(analyzer.optimize()));
  }
  io.stdout(sections.join("\n\n"));
  return 0;
}
