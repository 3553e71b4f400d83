import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import { newDb } from "pg-mem";

export const silentLogger = pino({ level: "silent" });

/** A fresh in-process Postgres stand-in and a pg-compatible pool onto it. */
export function memoryPostgres() {
  const db = newDb();
  const { Pool } = db.adapters.createPg();
  return { db, pool: new Pool() };
}

export async function tempJournal(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "url-journal-"));
  return {
    path: join(dir, "urls.jsonl"),
    cleanup: () => rm(dir, { recursive: true, force: true })
  };
}
