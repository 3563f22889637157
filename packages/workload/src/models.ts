/**
 * Models shared between the platform and workload implementations.
 */

import { ISODateString, StaticTypeCompanion } from "@drover/core";

// ============================================================================
// Config values
// ============================================================================

export type ConfigValue = string | number | boolean;

/** Open, workload-owned configuration */
export type WorkloadConfig = Record<string, ConfigValue>;

// ============================================================================
// DeploymentConfig
// ============================================================================

/** Input to a single deploy. Never carries credentials. */
export interface DeploymentConfig {
  readonly workloadName: string;
  /** Advisory run length; undefined means indefinite */
  readonly durationHours?: number;
  readonly tags: Readonly<Record<string, string>>;
  readonly workloadConfig: Readonly<WorkloadConfig>;
}

export const DeploymentConfig = StaticTypeCompanion({
  create(workloadName: string, opts?: Partial<Omit<DeploymentConfig, "workloadName">>): DeploymentConfig {
    return {
      workloadName,
      durationHours: opts?.durationHours,
      tags: opts?.tags ?? {},
      workloadConfig: opts?.workloadConfig ?? {},
    };
  },
});

// ============================================================================
// DeploymentState (as reported by a workload)
// ============================================================================

export type DeploymentStateStatus = "pending" | "running" | "stopped" | "completed" | "failed" | "cleaning_up";

export interface DeploymentState {
  deploymentId: string;
  workloadName: string;
  status: DeploymentStateStatus;
  phase: string;
  startedAt?: ISODateString;
  stoppedAt?: ISODateString;
  completedAt?: ISODateString;
  config: WorkloadConfig;
  metadata: Record<string, unknown>;
  error?: string;
}

export const DeploymentState = StaticTypeCompanion({
  statuses: ["pending", "running", "stopped", "completed", "failed", "cleaning_up"] as const,

  create(
    init: Pick<DeploymentState, "deploymentId" | "workloadName" | "status"> & Partial<DeploymentState>,
  ): DeploymentState {
    return {
      phase: "unknown",
      config: {},
      metadata: {},
      ...init,
    };
  },
});

// ============================================================================
// CleanupReport
// ============================================================================

/** Outcome of a cleanup. `errors` signals partial failure; it is not thrown. */
export interface CleanupReport {
  deploymentId: string;
  resourcesDeleted: number;
  resourcesFailed: number;
  details: string[];
  errors: string[];
  durationSeconds: number;
}

function emptyReport(deploymentId: string): CleanupReport {
  return {
    deploymentId,
    resourcesDeleted: 0,
    resourcesFailed: 0,
    details: [],
    errors: [],
    durationSeconds: 0,
  };
}

export const CleanupReport = StaticTypeCompanion({
  empty: emptyReport,

  failed(deploymentId: string, error: string, durationSeconds = 0): CleanupReport {
    return { ...emptyReport(deploymentId), errors: [error], durationSeconds };
  },
});
