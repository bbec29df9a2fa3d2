import { PGlite } from "@electric-sql/pglite";
import { getLogger } from "@logtape/drizzle-orm";
import type { ExtractTablesWithRelations } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { drizzle as drizzlePglite } from "drizzle-orm/pglite";
import { drizzle as drizzlePostgres } from "drizzle-orm/postgres-js";
import createPostgres from "postgres";
import { config } from "./config";
import * as schema from "./schema";

/**
 * The URL that selects an in-process PGlite database instead of a
 * PostgreSQL server.  Tests and throwaway local runs use it.
 */
export const IN_MEMORY_DATABASE_URL = "memory://";

export type Database = PgDatabase<
  PgQueryResultHKT,
  typeof schema,
  ExtractTablesWithRelations<typeof schema>
>;

export interface DatabaseConnection {
  db: Database;
  /** Releases the underlying client; the database is unusable afterwards. */
  close(): Promise<void>;
}

export function connectDatabase(url: string): DatabaseConnection {
  const logger = getLogger();
  if (url === IN_MEMORY_DATABASE_URL) {
    const client = new PGlite();
    return {
      db: drizzlePglite(client, { schema, logger }),
      close: () => client.close(),
    };
  }
  const postgres = createPostgres(url, { connect_timeout: 5 });
  return {
    db: drizzlePostgres(postgres, { schema, logger }),
    close: () => postgres.end(),
  };
}

const connection = connectDatabase(config.DATABASE_URL);

export const db = connection.db;

export const closeDatabase = connection.close;

export default db;
