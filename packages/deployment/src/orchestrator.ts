/**
 * Orchestrator - routes lifecycle commands to workloads and keeps the record
 * store in step with what they report.
 *
 * Every record write goes through here; workloads never touch the store.
 * Nothing is retried, and no capability call is timed out.
 */

import { DroverError, getLogger } from "@drover/core";
import {
  CleanupReport,
  DeploymentConfig,
  type DeploymentState,
  type Workload,
  type WorkloadConfig,
  type WorkloadDescriptor,
  type WorkloadRegistry,
} from "@drover/workload";
import { DeploymentRecord, type DeploymentFilter } from "./deployment-record.js";
import { DeploymentStatus } from "./deployment-status.js";
import type { DeploymentRecordStore } from "./record-store.js";
import { LogStream } from "./log-stream.js";
import {
  ErrIllegalTransition,
  ErrValidationFailed,
  ErrWorkloadDeclined,
  ErrWorkloadExecution,
} from "./errors.js";

const log = getLogger("deployment:orchestrator");

export interface DeployInput {
  durationHours?: number;
  tags?: Record<string, string>;
  workloadConfig?: WorkloadConfig;
}

export interface DeployResult {
  /** The workload's id; use it for every later command */
  deploymentId: string;
  record: DeploymentRecord;
}

export interface StatusReport {
  record: DeploymentRecord;
  /** What the workload reported, when it could be asked */
  live?: DeploymentState;
  /** True when the workload could not be asked and `record` is the last persisted view */
  stale: boolean;
  staleReason?: string;
}

export interface CleanupOutcome {
  dryRun: boolean;
  record: DeploymentRecord;
  report: CleanupReport;
  /** Whether cleanup may run from the record's current status */
  allowed: boolean;
}

export interface LogRequest {
  follow?: boolean;
  lines?: number;
  signal?: AbortSignal;
}

export interface OrchestratorOptions {
  /** Grace period for log sources to release after cancellation */
  logGraceMs?: number;
}

export const DEFAULT_LOG_LINES = 100;

export class Orchestrator {
  constructor(
    private readonly registry: WorkloadRegistry,
    private readonly store: DeploymentRecordStore,
    private readonly options: OrchestratorOptions = {},
  ) {}

  // --------------------------------------------------------------------------
  // deploy
  // --------------------------------------------------------------------------

  /** Always allocates a new record; idempotence is the workload's concern */
  async deploy(workloadName: string, input: DeployInput = {}): Promise<DeployResult> {
    const workload = await this.registry.resolve(workloadName);
    const config = DeploymentConfig.create(workloadName, input);

    const errors = [...validateCore(config), ...(await workload.validateConfig(config))];
    if (errors.length > 0) {
      throw ErrValidationFailed.create({ workloadName, errors });
    }

    const record = await this.store.create(config);
    log.info("deploying %s as %s", workloadName, record.deploymentId);

    let workloadRef: string;
    try {
      workloadRef = await workload.deploy(config);
    } catch (err) {
      await this.markFailed(record.deploymentId, "deploy_failed", DroverError.messageOf(err));
      throw ErrWorkloadExecution.create(
        { workloadName, deploymentId: record.deploymentId, operation: "deploy" },
        undefined,
        DroverError.wrap(err),
      );
    }

    if (!workloadRef) {
      const reason = "workload returned an empty deployment id";
      await this.markFailed(record.deploymentId, "deploy_failed", reason);
      throw ErrWorkloadExecution.create(
        { workloadName, deploymentId: record.deploymentId, operation: "deploy" },
        reason,
      );
    }

    try {
      const bound = await this.store.update(record.deploymentId, {
        workloadRef,
        status: "running",
        phase: "deployed",
      });
      log.info("%s is running as %s", record.deploymentId, workloadRef);
      return { deploymentId: workloadRef, record: bound };
    } catch (err) {
      // Duplicate ref or a store failure: the record must not stay deploying
      await this.markFailed(record.deploymentId, "deploy_failed", DroverError.messageOf(err));
      throw err;
    }
  }

  // --------------------------------------------------------------------------
  // status
  // --------------------------------------------------------------------------

  async status(id: string): Promise<StatusReport> {
    const record = await this.store.get(id);
    if (record.workloadRef === null) {
      return { record, stale: true, staleReason: "the workload never acknowledged this deployment" };
    }

    let live: DeploymentState;
    try {
      const workload = await this.registry.resolve(record.workloadName);
      live = await workload.getStatus(record.workloadRef);
    } catch (err) {
      log.debug("status of %s is stale: %s", record.deploymentId, err);
      return { record, stale: true, staleReason: DroverError.messageOf(err) };
    }

    if (live.phase !== record.phase) {
      const updated = await this.store.update(record.deploymentId, { phase: live.phase });
      return { record: updated, live, stale: false };
    }
    return { record, live, stale: false };
  }

  // --------------------------------------------------------------------------
  // stop / start
  // --------------------------------------------------------------------------

  /**
   * `false` when already stopped or cleaned. Requires `running`; a record left
   * in `stopping` by an interrupted stop is asked to stop again.
   */
  async stop(id: string): Promise<boolean> {
    const record = await this.store.get(id);
    if (record.status === "stopped" || record.status === "cleaned") {
      return false;
    }
    if (record.status !== "running" && record.status !== "stopping") {
      throw ErrIllegalTransition.create({ deploymentId: record.deploymentId, from: record.status, to: "stopping" });
    }
    const workload = await this.registry.resolve(record.workloadName);
    if (record.status === "running") {
      await this.store.update(record.deploymentId, { status: "stopping", phase: "stopping" });
    } else {
      log.info("%s was left stopping; retrying stop", record.deploymentId);
    }

    const ref = DeploymentRecord.canonicalId(record);
    let stopped: boolean;
    try {
      stopped = await workload.stop(ref);
    } catch (err) {
      await this.store.update(record.deploymentId, { status: "running", phase: "running", error: DroverError.messageOf(err) });
      throw this.executionError(workload, record, "stop", err);
    }

    if (!stopped) {
      const declined = ErrWorkloadDeclined.create({ workloadName: workload.name, deploymentId: ref, operation: "stop" });
      await this.store.update(record.deploymentId, { status: "running", phase: "running", error: declined.message });
      throw declined;
    }

    await this.store.update(record.deploymentId, { status: "stopped", phase: "stopped", error: null });
    return true;
  }

  /** `false` when already running. Only a stopped deployment can be started */
  async start(id: string): Promise<boolean> {
    const record = await this.store.get(id);
    if (record.status === "running") {
      return false;
    }
    if (record.status !== "stopped") {
      throw ErrIllegalTransition.create({ deploymentId: record.deploymentId, from: record.status, to: "running" });
    }
    const workload = await this.registry.resolve(record.workloadName);

    const ref = DeploymentRecord.canonicalId(record);
    let started: boolean;
    try {
      started = await workload.start(ref);
    } catch (err) {
      await this.store.update(record.deploymentId, { error: DroverError.messageOf(err) });
      throw this.executionError(workload, record, "start", err);
    }

    if (!started) {
      const declined = ErrWorkloadDeclined.create({ workloadName: workload.name, deploymentId: ref, operation: "start" });
      await this.store.update(record.deploymentId, { error: declined.message });
      throw declined;
    }

    await this.store.update(record.deploymentId, { status: "running", phase: "running", error: null });
    return true;
  }

  // --------------------------------------------------------------------------
  // cleanup
  // --------------------------------------------------------------------------

  /**
   * A dry run reports what would happen and changes nothing. Otherwise the
   * record always ends `cleaned`; workload failures land in the report.
   */
  async cleanup(id: string, opts: { dryRun?: boolean } = {}): Promise<CleanupOutcome> {
    const record = await this.store.get(id);
    const ref = DeploymentRecord.canonicalId(record);
    const resuming = record.status === "cleaning";
    const allowed = resuming || DeploymentStatus.canTransition(record.status, "cleaning");

    if (opts.dryRun) {
      return { dryRun: true, record, report: CleanupReport.empty(ref), allowed };
    }

    if (resuming) {
      log.info("%s was left cleaning; retrying cleanup", record.deploymentId);
    } else {
      await this.store.update(record.deploymentId, { status: "cleaning", phase: "cleaning" });
    }
    const report = await this.runCleanup(record);

    const cleaned = await this.store.update(record.deploymentId, {
      status: "cleaned",
      phase: "cleaned",
      error: report.errors.length > 0 ? report.errors.join("; ") : null,
    });
    log.info("%s cleaned: %d deleted, %d failed", record.deploymentId, report.resourcesDeleted, report.resourcesFailed);
    return { dryRun: false, record: cleaned, report, allowed: true };
  }

  private async runCleanup(record: DeploymentRecord): Promise<CleanupReport> {
    const ref = DeploymentRecord.canonicalId(record);
    if (record.workloadRef === null) {
      return { ...CleanupReport.empty(ref), details: ["the workload never acknowledged this deployment; nothing to clean up"] };
    }
    const startedAt = Date.now();
    try {
      const workload = await this.registry.resolve(record.workloadName);
      return await workload.cleanup(record.workloadRef);
    } catch (err) {
      log.debug("cleanup of %s failed: %s", record.deploymentId, err);
      return CleanupReport.failed(ref, DroverError.messageOf(err), (Date.now() - startedAt) / 1000);
    }
  }

  // --------------------------------------------------------------------------
  // logs
  // --------------------------------------------------------------------------

  /**
   * follow=false: finite, the most recent `lines` entries.
   * follow=true: unbounded until cancelled or the source ends.
   */
  async logs(id: string, request: LogRequest = {}): Promise<LogStream> {
    const record = await this.store.get(id);
    const workload = await this.registry.resolve(record.workloadName);
    const ref = DeploymentRecord.canonicalId(record);
    const follow = request.follow ?? false;
    const lines = request.lines ?? DEFAULT_LOG_LINES;

    return LogStream.open(
      (signal) => {
        const source = workload.getLogs(ref, { follow, lines, signal });
        return follow ? source : lastLines(source, lines);
      },
      { signal: request.signal, graceMs: this.options.logGraceMs },
    );
  }

  // --------------------------------------------------------------------------
  // queries and registry pass-throughs
  // --------------------------------------------------------------------------

  list(filter: DeploymentFilter = {}, limit?: number): Promise<DeploymentRecord[]> {
    return this.store.list(filter, limit);
  }

  workloads(): Promise<WorkloadDescriptor[]> {
    return this.registry.list();
  }

  describeWorkload(name: string): Promise<WorkloadDescriptor> {
    return this.registry.describe(name);
  }

  installWorkload(source: string): Promise<WorkloadDescriptor> {
    return this.registry.install(source);
  }

  // --------------------------------------------------------------------------
  // helpers
  // --------------------------------------------------------------------------

  /** Best effort: the caller raises the original error whether or not this lands */
  private async markFailed(deploymentId: string, phase: string, error: string): Promise<void> {
    log.info("%s failed: %s", deploymentId, error);
    try {
      await this.store.update(deploymentId, { status: "failed", phase, error });
    } catch (err) {
      log.warn("could not mark %s failed: %s", deploymentId, err);
    }
  }

  private executionError(workload: Workload, record: DeploymentRecord, operation: string, err: unknown) {
    return ErrWorkloadExecution.create(
      { workloadName: workload.name, deploymentId: DeploymentRecord.canonicalId(record), operation },
      undefined,
      DroverError.wrap(err),
    );
  }
}

function validateCore(config: DeploymentConfig): string[] {
  const errors: string[] = [];
  const { durationHours } = config;
  if (durationHours !== undefined && (!Number.isInteger(durationHours) || durationHours <= 0)) {
    errors.push(`durationHours must be a positive integer (got ${durationHours})`);
  }
  if (Object.keys(config.tags).some((key) => key.trim() === "")) {
    errors.push("tag keys must not be empty");
  }
  return errors;
}

/** Drain a finite source, keeping only the last `count` lines */
async function* lastLines(source: AsyncIterable<string>, count: number): AsyncGenerator<string> {
  const tail: string[] = [];
  for await (const line of source) {
    tail.push(line);
    if (tail.length > count) tail.shift();
  }
  yield* tail;
}
