import { migrate } from "drizzle-orm/postgres-js/migrator";
import type { Logger } from "../utils/logger.js";
import type { Database } from "./index.js";

export async function runMigrations(
  db: Database,
  logger: Logger,
  migrationsFolder = "./db/migrations"
): Promise<void> {
  logger.info({ migrationsFolder }, "Running database migrations...");
  await migrate(db, { migrationsFolder });
  logger.info("Database migrations complete");
}
