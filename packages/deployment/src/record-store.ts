import type { DeploymentConfig } from "@drover/workload";
import type { DeploymentFilter, DeploymentRecord, RecordPatch } from "./deployment-record.js";

/**
 * DeploymentRecordStore - the single source of truth for deployment status.
 *
 * Implementations guarantee:
 * - create() never hands out an id twice, even under concurrent callers
 * - update() applies the patch atomically, bumps revision and updatedAt, and
 *   rejects edges outside the state machine
 * - a workloadRef is bound to at most one record
 */
export interface DeploymentRecordStore {
  /** New record in `deploying` with a fresh `dep-…` id */
  create(config: DeploymentConfig): Promise<DeploymentRecord>;

  /** By deploymentId or workloadRef. Throws ErrUnknownDeployment */
  get(id: string): Promise<DeploymentRecord>;

  update(id: string, patch: RecordPatch): Promise<DeploymentRecord>;

  /** Newest first. Filters are conjunctive; limit defaults to 20 */
  list(filter?: DeploymentFilter, limit?: number): Promise<DeploymentRecord[]>;
}
