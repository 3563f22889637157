/**
 * SqliteDeploymentStore - DeploymentRecordStore backed by a SQLite file.
 *
 * Several processes may share one file. Writes run in IMMEDIATE transactions,
 * so the read-check-write of create() and update() holds the write lock
 * throughout; the revision compare-and-swap on update is the last line.
 */

import Database from "better-sqlite3";
import { ISODateString, getLogger } from "@drover/core";
import type { DeploymentConfig } from "@drover/workload";
import {
  DEFAULT_LIST_LIMIT,
  DeploymentRecord,
  ErrConcurrentModification,
  ErrDuplicateWorkloadRef,
  ErrIdAllocationFailed,
  ErrUnknownDeployment,
  type DeploymentFilter,
  type DeploymentRecordStore,
  type RecordId,
  type RecordPatch,
} from "@drover/deployment";
import { ensureSchema, TABLE } from "./schema.js";
import { fromRow, toRow, type DeploymentRow } from "./record-row.js";

export interface SqliteStoreOptions {
  /** How long a writer waits for another process's lock. Defaults to 5s */
  busyTimeoutMs?: number;
  now?: () => ISODateString;
  newId?: () => RecordId;
}

type RowUpdate = Pick<DeploymentRow, "deployment_id" | "workload_ref" | "status" | "phase" | "error" | "revision" | "updated_at"> & {
  expected_revision: number;
};

type ListParams = Record<string, string | number>;

const MAX_ID_ATTEMPTS = 5;
const DEFAULT_BUSY_TIMEOUT_MS = 5000;

const log = getLogger("storage-sqlite");

export class SqliteDeploymentStore implements DeploymentRecordStore {
  private readonly now: () => ISODateString;
  private readonly newId: () => RecordId;

  private readonly findRow: Database.Statement<[{ id: string }], DeploymentRow>;
  private readonly insertRow: Database.Statement<[DeploymentRow]>;
  private readonly updateRow: Database.Statement<[RowUpdate]>;

  private readonly createTx: Database.Transaction<(config: DeploymentConfig) => DeploymentRecord>;
  private readonly updateTx: Database.Transaction<(id: string, patch: RecordPatch) => DeploymentRecord>;

  constructor(readonly db: Database.Database, opts: SqliteStoreOptions = {}) {
    this.now = opts.now ?? ISODateString.now;
    this.newId = opts.newId ?? DeploymentRecord.newId;

    this.findRow = db.prepare<{ id: string }, DeploymentRow>(
      `SELECT * FROM ${TABLE} WHERE deployment_id = @id OR workload_ref = @id LIMIT 1`,
    );
    this.insertRow = db.prepare<DeploymentRow>(
      `INSERT INTO ${TABLE}
         (deployment_id, workload_ref, workload_name, status, phase, tags, config, error, revision, created_at, updated_at)
       VALUES
         (@deployment_id, @workload_ref, @workload_name, @status, @phase, @tags, @config, @error, @revision, @created_at, @updated_at)`,
    );
    this.updateRow = db.prepare<RowUpdate>(
      `UPDATE ${TABLE}
          SET workload_ref = @workload_ref, status = @status, phase = @phase, error = @error,
              revision = @revision, updated_at = @updated_at
        WHERE deployment_id = @deployment_id AND revision = @expected_revision`,
    );

    this.createTx = db.transaction((config: DeploymentConfig) => this.insertFresh(config));
    this.updateTx = db.transaction((id: string, patch: RecordPatch) => this.applyUpdate(id, patch));
  }

  /** Open (creating if needed) the database at `path` in WAL mode */
  static open(path: string, opts: SqliteStoreOptions = {}): SqliteDeploymentStore {
    const db = new Database(path, { timeout: opts.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS });
    try {
      db.pragma("journal_mode = WAL");
      ensureSchema(db);
    } catch (err) {
      db.close();
      throw err;
    }
    log.debug("opened %s", path);
    return new SqliteDeploymentStore(db, opts);
  }

  async create(config: DeploymentConfig): Promise<DeploymentRecord> {
    return this.createTx.immediate(config);
  }

  async get(id: string): Promise<DeploymentRecord> {
    return this.lookup(id);
  }

  async update(id: string, patch: RecordPatch): Promise<DeploymentRecord> {
    return this.updateTx.immediate(id, patch);
  }

  async list(filter: DeploymentFilter = {}, limit: number = DEFAULT_LIST_LIMIT): Promise<DeploymentRecord[]> {
    const clauses: string[] = [];
    const params: ListParams = { limit: Math.max(0, Math.floor(limit)) };
    if (filter.workloadName !== undefined) {
      clauses.push("workload_name = @workloadName");
      params.workloadName = filter.workloadName;
    }
    if (filter.status !== undefined) {
      clauses.push("status = @status");
      params.status = filter.status;
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare<ListParams, DeploymentRow>(`SELECT * FROM ${TABLE} ${where} ORDER BY created_at DESC, rowid DESC LIMIT @limit`)
      .all(params);
    return rows.map(fromRow);
  }

  close(): void {
    this.db.close();
  }

  // --------------------------------------------------------------------------
  // Transaction bodies. Run only inside createTx / updateTx
  // --------------------------------------------------------------------------

  private insertFresh(config: DeploymentConfig): DeploymentRecord {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.newId();
      if (this.findRow.get({ id })) {
        log.debug("id %s already taken, retrying", id);
        continue;
      }
      const record = DeploymentRecord.fresh(id, config, this.now());
      this.insertRow.run(toRow(record));
      return record;
    }
    throw ErrIdAllocationFailed.create({ attempts: MAX_ID_ATTEMPTS });
  }

  private applyUpdate(id: string, patch: RecordPatch): DeploymentRecord {
    const current = this.lookup(id);
    if (patch.workloadRef !== undefined && patch.workloadRef !== current.workloadRef) {
      const holder = this.findRow.get({ id: patch.workloadRef });
      if (holder && holder.deployment_id !== current.deploymentId) {
        throw ErrDuplicateWorkloadRef.create({ deploymentId: current.deploymentId, workloadRef: patch.workloadRef });
      }
    }

    const next = DeploymentRecord.applyPatch(current, patch, this.now());
    const result = this.updateRow.run({
      deployment_id: next.deploymentId,
      workload_ref: next.workloadRef,
      status: next.status,
      phase: next.phase,
      error: next.error,
      revision: next.revision,
      updated_at: next.updatedAt,
      expected_revision: current.revision,
    });
    if (result.changes === 0) {
      throw ErrConcurrentModification.create({ deploymentId: current.deploymentId, expectedRevision: current.revision });
    }
    return next;
  }

  private lookup(id: string): DeploymentRecord {
    const row = this.findRow.get({ id });
    if (!row) throw ErrUnknownDeployment.create({ deploymentId: id });
    return fromRow(row);
  }
}
