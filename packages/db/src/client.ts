import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { DatabaseConfig } from "@groundwrite/types";
import * as schema from "./schema/index.js";

const IDLE_TIMEOUT_SECONDS = 30;
const CONNECT_TIMEOUT_SECONDS = 10;

/** Lazily connecting drizzle client over a postgres.js pool of `poolMax` connections. */
export function createDbClient(config: DatabaseConfig) {
  const sql = postgres(config.url, {
    max: config.poolMax,
    idle_timeout: IDLE_TIMEOUT_SECONDS,
    connect_timeout: CONNECT_TIMEOUT_SECONDS,
  });

  return drizzle(sql, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end();
}
