/**
 * @drover/workload/testing - an in-process workload for tests.
 *
 * Keeps its state in the platform's state store, records calls, and can be
 * told to fail or decline any lifecycle operation.
 */

import { ISODateString } from "@drover/core";
import { WorkloadBase } from "./workload-base.js";
import { WorkloadModule } from "./workload-module.js";
import { WorkloadPlatform } from "./platform.js";
import { CleanupReport, DeploymentState, type DeploymentConfig } from "./models.js";
import type { LogOptions } from "./workload.js";

type FailableOp = "deploy" | "getStatus" | "stop" | "start" | "cleanup";

export interface StubbedWorkloadOptions {
  readonly name?: string;
  /** Ids handed out by deploy(), in order. Defaults to `<name>-1`, `<name>-2`, … */
  readonly deployIds?: readonly string[];
  /** Mutable array to record method calls into */
  readonly calls?: string[];
  /** Throw an Error with this message from the named operation */
  readonly failOn?: Partial<Record<FailableOp, string>>;
  /** What stop() answers when it does not throw. Defaults to true */
  readonly stopResult?: boolean;
  readonly supportsStart?: boolean;
  readonly validationErrors?: readonly string[];
  /** History returned by getLogs() */
  readonly logLines?: readonly string[];
  /** Delay between generated lines when following */
  readonly followIntervalMs?: number;
  /** Phase reported by getStatus() once running */
  readonly livePhase?: string;
}

/** Counts log sources opened and released, to observe teardown */
export interface LogSourceTracker {
  opened: number;
  released: number;
}

export class StubWorkload extends WorkloadBase {
  readonly name: string;
  readonly calls: string[];
  readonly logSources: LogSourceTracker = { opened: 0, released: 0 };
  private deployCount = 0;

  constructor(platform: WorkloadPlatform, private readonly options: StubbedWorkloadOptions = {}) {
    super(platform);
    this.name = options.name ?? "stub-workload";
    this.calls = options.calls ?? [];
  }

  async validateConfig(_config: DeploymentConfig): Promise<string[]> {
    this.calls.push("validateConfig");
    return [...(this.options.validationErrors ?? [])];
  }

  async deploy(config: DeploymentConfig): Promise<string> {
    this.record("deploy");
    const index = this.deployCount++;
    const deploymentId = this.options.deployIds?.[index] ?? `${this.name}-${index + 1}`;
    await this.saveState(
      DeploymentState.create({
        deploymentId,
        workloadName: this.name,
        status: "running",
        phase: "deployed",
        startedAt: ISODateString.now(),
        config: { ...config.workloadConfig },
      }),
    );
    return deploymentId;
  }

  async getStatus(deploymentId: string): Promise<DeploymentState> {
    this.record("getStatus");
    const state = await this.requireState(deploymentId);
    if (state.status === "running" && this.options.livePhase) {
      return { ...state, phase: this.options.livePhase };
    }
    return state;
  }

  async stop(deploymentId: string): Promise<boolean> {
    this.record("stop");
    const state = await this.requireState(deploymentId);
    if (this.options.stopResult === false) return false;
    await this.saveState({ ...state, status: "stopped", phase: "stopped", stoppedAt: ISODateString.now() });
    return true;
  }

  async start(deploymentId: string): Promise<boolean> {
    if (this.options.supportsStart === false) return super.start(deploymentId);
    this.record("start");
    const state = await this.requireState(deploymentId);
    await this.saveState({ ...state, status: "running", phase: "resumed" });
    return true;
  }

  async cleanup(deploymentId: string): Promise<CleanupReport> {
    this.record("cleanup");
    const state = await this.requireState(deploymentId);
    await this.saveState({ ...state, status: "completed", phase: "cleaned", completedAt: ISODateString.now() });
    return { ...CleanupReport.empty(deploymentId), resourcesDeleted: 1, details: [`removed ${deploymentId}`] };
  }

  async *getLogs(deploymentId: string, opts: LogOptions): AsyncGenerator<string> {
    this.calls.push("getLogs");
    await this.requireState(deploymentId);
    this.logSources.opened++;
    try {
      const history = this.options.logLines ?? [];
      for (const line of history.slice(-opts.lines)) {
        if (opts.signal.aborted) return;
        yield line;
      }
      if (!opts.follow) return;
      let tick = 0;
      while (!opts.signal.aborted) {
        await pause(this.options.followIntervalMs ?? 5, opts.signal);
        if (opts.signal.aborted) return;
        yield `tick ${++tick}`;
      }
    } finally {
      this.logSources.released++;
    }
  }

  private record(op: FailableOp): void {
    this.calls.push(op);
    const message = this.options.failOn?.[op];
    if (message !== undefined) throw new Error(message);
  }
}

/** Resolves after `ms`, or as soon as the signal aborts */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function StubbedWorkload(options: StubbedWorkloadOptions = {}, platform?: WorkloadPlatform): StubWorkload {
  return new StubWorkload(platform ?? WorkloadPlatform.inMemory(), options);
}

/** A module whose instances are StubWorkloads; `instances` collects what create() produced */
export function StubbedWorkloadModule(
  options: StubbedWorkloadOptions = {},
): WorkloadModule & { instances: StubWorkload[] } {
  const instances: StubWorkload[] = [];
  const name = options.name ?? "stub-workload";
  return {
    name,
    version: "1.0.0",
    description: `${name} (test stub)`,
    requiredTargets: [],
    instances,
    create(platform) {
      const instance = new StubWorkload(platform, options);
      instances.push(instance);
      return instance;
    },
  };
}
