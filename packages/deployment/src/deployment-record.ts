import { randomUUID } from "node:crypto";
import { ISODateString, StaticTypeCompanion, type Id } from "@drover/core";
import type { DeploymentConfig, WorkloadConfig } from "@drover/workload";
import { DeploymentStatus } from "./deployment-status.js";
import { ErrWorkloadRefImmutable } from "./errors.js";

/** Platform-allocated id: `dep-` followed by 12 hex characters */
export type RecordId = Id<"record-id">;

/** What is kept of the deploy input. Credentials never appear here */
export interface RecordedConfig {
  durationHours?: number;
  workloadConfig: WorkloadConfig;
}

/**
 * The platform's durable view of one deployment. Exactly one exists per
 * deploymentId; it is addressable by deploymentId or by workloadRef.
 */
export interface DeploymentRecord {
  readonly deploymentId: RecordId;
  /** Id returned by the workload's deploy(); null until the workload answers */
  readonly workloadRef: string | null;
  readonly workloadName: string;
  readonly status: DeploymentStatus;
  /** Free text from the workload */
  readonly phase: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly config: RecordedConfig;
  /** Last error, null when none */
  readonly error: string | null;
  /** Write counter, bumped on every update */
  readonly revision: number;
  readonly createdAt: ISODateString;
  readonly updatedAt: ISODateString;
}

export interface RecordPatch {
  status?: DeploymentStatus;
  phase?: string;
  workloadRef?: string;
  error?: string | null;
}

export interface DeploymentFilter {
  workloadName?: string;
  status?: DeploymentStatus;
}

export const DEFAULT_LIST_LIMIT = 20;

export const DeploymentRecord = StaticTypeCompanion({
  /** The id the outside world uses: the workload's id once bound */
  canonicalId(record: DeploymentRecord): string {
    return record.workloadRef ?? record.deploymentId;
  },

  newId(): RecordId {
    return `dep-${randomUUID().replace(/-/g, "").slice(0, 12)}`;
  },

  fresh(deploymentId: RecordId, config: DeploymentConfig, now: ISODateString): DeploymentRecord {
    return {
      deploymentId,
      workloadRef: null,
      workloadName: config.workloadName,
      status: DeploymentStatus.initial,
      phase: "initializing",
      tags: { ...config.tags },
      config: recordedConfig(config),
      error: null,
      revision: 1,
      createdAt: now,
      updatedAt: now,
    };
  },

  /**
   * The record after applying a patch. Throws ErrIllegalTransition for an edge
   * outside the state machine (including "transitions" to the current status).
   * Uniqueness of workloadRef is the store's job.
   */
  applyPatch(record: DeploymentRecord, patch: RecordPatch, now: ISODateString): DeploymentRecord {
    if (patch.status !== undefined) {
      DeploymentStatus.assertTransition(record.deploymentId, record.status, patch.status);
    }
    if (patch.workloadRef !== undefined && record.workloadRef !== null && record.workloadRef !== patch.workloadRef) {
      throw ErrWorkloadRefImmutable.create({ deploymentId: record.deploymentId, workloadRef: record.workloadRef });
    }
    return {
      ...record,
      status: patch.status ?? record.status,
      phase: patch.phase ?? record.phase,
      workloadRef: patch.workloadRef ?? record.workloadRef,
      error: patch.error === undefined ? record.error : patch.error,
      revision: record.revision + 1,
      updatedAt: now,
    };
  },

  matches(record: DeploymentRecord, filter: DeploymentFilter): boolean {
    return (
      (filter.workloadName === undefined || record.workloadName === filter.workloadName) &&
      (filter.status === undefined || record.status === filter.status)
    );
  },
});

function recordedConfig(config: DeploymentConfig): RecordedConfig {
  const recorded: RecordedConfig = { workloadConfig: { ...config.workloadConfig } };
  if (config.durationHours !== undefined) recorded.durationHours = config.durationHours;
  return recorded;
}
