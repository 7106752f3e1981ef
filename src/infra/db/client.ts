import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type DatabaseOptions = {
  maxConnections: number;
  applicationName: string;
};

const defaults: DatabaseOptions = {
  maxConnections: 10,
  applicationName: "huntline",
};

/**
 * Drizzle handle for the execution and queue tables plus the raw client pgvector queries need.
 * Postgres notices are dropped; the migrations emit one per `IF NOT EXISTS`.
 */
export const createDatabase = (
  connectionString: string,
  options: Partial<DatabaseOptions> = {},
) => {
  const { maxConnections, applicationName } = { ...defaults, ...options };
  const sql = postgres(connectionString, {
    max: maxConnections,
    connection: { application_name: applicationName },
    onnotice: () => undefined,
  });
  const db = drizzle(sql);

  return {
    db,
    sql,
    close: (): Promise<void> => sql.end({ timeout: 5 }),
  };
};

export type Database = ReturnType<typeof createDatabase>;
