import { ISODateString } from "@drover/core";
import type { DeploymentConfig } from "@drover/workload";
import {
  DEFAULT_LIST_LIMIT,
  DeploymentRecord,
  type DeploymentFilter,
  type RecordId,
  type RecordPatch,
} from "./deployment-record.js";
import type { DeploymentRecordStore } from "./record-store.js";
import { ErrDuplicateWorkloadRef, ErrIdAllocationFailed, ErrUnknownDeployment } from "./errors.js";

export interface InMemoryRecordStoreOptions {
  now?: () => ISODateString;
  newId?: () => RecordId;
}

const MAX_ID_ATTEMPTS = 5;

/** Process-local store. For tests and ephemeral use */
export class InMemoryDeploymentStore implements DeploymentRecordStore {
  private records = new Map<string, { seq: number; record: DeploymentRecord }>();
  private seq = 0;
  private readonly now: () => ISODateString;
  private readonly newId: () => RecordId;

  constructor(opts: InMemoryRecordStoreOptions = {}) {
    this.now = opts.now ?? ISODateString.now;
    this.newId = opts.newId ?? DeploymentRecord.newId;
  }

  async create(config: DeploymentConfig): Promise<DeploymentRecord> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.newId();
      if (this.records.has(id) || this.findByRef(id)) continue;
      const record = DeploymentRecord.fresh(id, config, this.now());
      this.records.set(id, { seq: ++this.seq, record });
      return structuredClone(record);
    }
    throw ErrIdAllocationFailed.create({ attempts: MAX_ID_ATTEMPTS });
  }

  async get(id: string): Promise<DeploymentRecord> {
    return structuredClone(this.lookup(id).record);
  }

  async update(id: string, patch: RecordPatch): Promise<DeploymentRecord> {
    const entry = this.lookup(id);
    const { record } = entry;
    if (patch.workloadRef !== undefined && patch.workloadRef !== record.workloadRef) {
      const holder = this.records.get(patch.workloadRef)?.record ?? this.findByRef(patch.workloadRef);
      if (holder && holder.deploymentId !== record.deploymentId) {
        throw ErrDuplicateWorkloadRef.create({ deploymentId: record.deploymentId, workloadRef: patch.workloadRef });
      }
    }
    entry.record = DeploymentRecord.applyPatch(record, patch, this.now());
    return structuredClone(entry.record);
  }

  async list(filter: DeploymentFilter = {}, limit: number = DEFAULT_LIST_LIMIT): Promise<DeploymentRecord[]> {
    return [...this.records.values()]
      .filter((e) => DeploymentRecord.matches(e.record, filter))
      .sort((a, b) => b.record.createdAt.localeCompare(a.record.createdAt) || b.seq - a.seq)
      .slice(0, Math.max(0, limit))
      .map((e) => structuredClone(e.record));
  }

  private lookup(id: string): { seq: number; record: DeploymentRecord } {
    const direct = this.records.get(id);
    if (direct) return direct;
    for (const entry of this.records.values()) {
      if (entry.record.workloadRef === id) return entry;
    }
    throw ErrUnknownDeployment.create({ deploymentId: id });
  }

  private findByRef(ref: string): DeploymentRecord | undefined {
    for (const { record } of this.records.values()) {
      if (record.workloadRef === ref) return record;
    }
    return undefined;
  }
}
