import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { env } from "@draftloom/core";
import * as schema from "./schema.js";

let _db: ReturnType<typeof createDb> | null = null;

function createDb(url?: string) {
  const sql = postgres(url ?? env.databaseUrl);
  return drizzle(sql, { schema });
}

export function getDb(url?: string) {
  if (!_db) {
    _db = createDb(url);
  }
  return _db;
}

/** Close the shared connection pool so a CLI process can exit. */
export async function closeDb(): Promise<void> {
  if (_db) {
    await _db.$client.end();
    _db = null;
  }
}

export type Db = ReturnType<typeof getDb>;
