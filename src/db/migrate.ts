import path from "node:path";
import { loadConfig } from "../config";
import { logger } from "../utils/logger";
import { createSql } from "./index";

export const SCHEMA_PATH = path.resolve(__dirname, "../../db/schema.sql");

async function migrate(): Promise<void> {
  const config = loadConfig();
  const sql = createSql(config.DATABASE_URL, 1);

  try {
    logger.info({ schema: SCHEMA_PATH }, "Applying schema");
    await sql.file(SCHEMA_PATH);
    logger.info("Schema applied");
  } finally {
    await sql.end();
  }
}

if (require.main === module) {
  migrate().catch((err: unknown) => {
    logger.fatal({ err }, "Migration failed");
    process.exitCode = 1;
  });
}
