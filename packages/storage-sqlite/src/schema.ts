/**
 * Table layout for deployment records, versioned through `PRAGMA user_version`.
 */

import type Database from "better-sqlite3";
import { ErrSchemaTooNew } from "./errors.js";

export const SCHEMA_VERSION = 1;

export const TABLE = "deployments";

const migrations: readonly string[] = [
  // 1: initial layout. tags and config are JSON text
  `CREATE TABLE IF NOT EXISTS ${TABLE} (
    deployment_id TEXT PRIMARY KEY,
    workload_ref  TEXT UNIQUE,
    workload_name TEXT NOT NULL,
    status        TEXT NOT NULL,
    phase         TEXT NOT NULL,
    tags          TEXT NOT NULL,
    config        TEXT NOT NULL,
    error         TEXT,
    revision      INTEGER NOT NULL,
    created_at    TEXT NOT NULL,
    updated_at    TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS ${TABLE}_by_created ON ${TABLE} (created_at);
  CREATE INDEX IF NOT EXISTS ${TABLE}_by_workload ON ${TABLE} (workload_name, status);`,
];

/** Bring the database up to SCHEMA_VERSION. Safe to call from several processes */
export function ensureSchema(db: Database.Database): void {
  const migrate = db.transaction(() => {
    const current = Number(db.pragma("user_version", { simple: true }));
    if (current > SCHEMA_VERSION) {
      throw ErrSchemaTooNew.create({ found: current, supported: SCHEMA_VERSION });
    }
    for (let version = current; version < SCHEMA_VERSION; version++) {
      db.exec(migrations[version] ?? "");
    }
    if (current !== SCHEMA_VERSION) {
      db.pragma(`user_version = ${SCHEMA_VERSION}`);
    }
  });
  migrate.immediate();
}
