/**
 * @drover/deployment - deployment records, the lifecycle state machine and the orchestrator.
 */

export { DeploymentStatus } from "./deployment-status.js";
export { DeploymentRecord, DEFAULT_LIST_LIMIT } from "./deployment-record.js";
export type { RecordId, RecordedConfig, RecordPatch, DeploymentFilter } from "./deployment-record.js";

export type { DeploymentRecordStore } from "./record-store.js";
export { InMemoryDeploymentStore } from "./in-memory-record-store.js";
export type { InMemoryRecordStoreOptions } from "./in-memory-record-store.js";

export { LogStream, DEFAULT_LOG_GRACE_MS } from "./log-stream.js";
export type { LogPull, LogEndReason, LogReleaseOutcome, LogStreamOptions } from "./log-stream.js";

export { Orchestrator, DEFAULT_LOG_LINES } from "./orchestrator.js";
export type {
  DeployInput,
  DeployResult,
  StatusReport,
  CleanupOutcome,
  LogRequest,
  OrchestratorOptions,
} from "./orchestrator.js";

export * from "./errors.js";
