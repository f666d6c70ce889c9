import { describe, expect, it } from "vitest";
import type { DestinationStream } from "pino";
import { loadConfig } from "../src/config";
import { createLogger } from "../src/logging";

function captureDestination() {
  const lines: string[] = [];
  const destination: DestinationStream = {
    write: (message: string) => {
      lines.push(message);
    },
  };
  return { destination, lines };
}

describe("createLogger", () => {
  const config = loadConfig({ env: "test", logLevel: "info" }, { useDotenv: false });

  it("writes JSON lines carrying the service and environment", () => {
    const { destination, lines } = captureDestination();
    const logger = createLogger(config, { destination });

    logger.info({ count: 3 }, "Loaded query records");

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "");
    expect(entry).toMatchObject({
      level: 30,
      service: "query-stats-analyzer",
      environment: "test",
      count: 3,
      msg: "Loaded query records",
    });
    expect(typeof entry.time).toBe("string");
  });

  it("respects the configured level and explicit overrides", () => {
    const { destination, lines } = captureDestination();
    const logger = createLogger(config, { destination, level: "warn" });

    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "").msg).toBe("shown");
  });
});
