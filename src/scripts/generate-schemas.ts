import path from "node:path";
import { loadConfig } from "../config";
import { createLogger } from "../logging";
import { writeJsonSchemas } from "../report/json-schemas";

export async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  await writeJsonSchemas(path.resolve(process.cwd(), "generated", "schemas"), logger);
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Schema generation script failed:", error);
    process.exit(1);
  });
}
