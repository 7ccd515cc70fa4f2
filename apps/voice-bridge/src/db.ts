import pg from "pg";
import { env } from "./config.js";

const { Pool } = pg;

// Session events are only persisted when a database is configured.
export const db = env.DATABASE_URL
  ? new Pool({
      connectionString: env.DATABASE_URL,
      max: 4
    })
  : null;

export async function healthcheckDb(): Promise<boolean> {
  if (!db) {
    return false;
  }
  await db.query("select 1");
  return true;
}

export async function appendSessionEvent(sessionId: string, type: string, payload: unknown): Promise<void> {
  if (!db) {
    return;
  }
  await db.query(
    `insert into session_events (session_id, type, payload_json)
     values ($1, $2, $3::jsonb)`,
    [sessionId, type, JSON.stringify(payload)]
  );
}

export async function closeDb(): Promise<void> {
  await db?.end();
}
