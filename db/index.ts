import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import * as schema from "./schema";
import { config } from "../config";
import { ensureDefined } from "../utils";

/**
 * Any drizzle PostgreSQL database carrying this schema. Production uses
 * node-postgres; the test suite hands the services a PGlite database.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export function createDbClient(url: string | undefined = config.DATABASE_URL) {
  ensureDefined(url, "DATABASE_URL is required to connect to the database");
  return drizzle({ connection: url, schema });
}
