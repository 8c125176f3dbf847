import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema";
import { PostgresDetectionStore } from "./postgresStore";

export function redactDatabaseUrl(url: string | undefined): string {
  if (!url) return "NOT SET";
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//*****:*****@${parsed.host}${parsed.pathname}`;
  } catch {
    return "INVALID URL FORMAT";
  }
}

export function connectDetectionStore(databaseUrl: string) {
  const pool = new pg.Pool({ connectionString: databaseUrl });
  const db = drizzle(pool, { schema });

  return {
    store: new PostgresDetectionStore(db),
    close: () => pool.end(),
  };
}
