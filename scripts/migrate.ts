import "dotenv/config";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { createDbClient } from "../db";
import { baseLogger } from "../logger";

// Written by `npm run db:generate` (drizzle-kit, see db/drizzle.config.ts).
const migrationsFolder = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "../db/migrations",
);

const logger = baseLogger.child({ scope: "db-migrate" });
const db = createDbClient();

try {
  await migrate(db, { migrationsFolder });
  logger.info({ migrationsFolder }, "Migrations applied");
} catch (error) {
  logger.error({ error }, "Migration failed");
  process.exitCode = 1;
} finally {
  await db.$client.end();
}
