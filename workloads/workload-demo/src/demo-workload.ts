/**
 * DemoWorkload - simulated telemetry emitters.
 *
 * Provisions nothing: a deployment is just its saved DeploymentState, and
 * log lines are derived from the deployment's id and clock. Useful for trying
 * the CLI and for exercising the platform end to end.
 */

import { randomUUID } from "node:crypto";
import { ISODateString } from "@drover/core";
import {
  CleanupReport,
  DeploymentState,
  WorkloadBase,
  type DeploymentConfig,
  type LogOptions,
  type WorkloadPlatform,
} from "@drover/workload";
import { readDemoConfig, validateDemoConfig, type DemoConfig } from "./config.js";
import { emittedAt, linesBetween, seedOf, telemetryLine } from "./telemetry.js";

export const DEMO_WORKLOAD_NAME = "workload-demo";

/** History kept for `logs` without --follow */
const MAX_HISTORY = 1000;

/** Optional; recorded, never required */
const API_KEY_CREDENTIAL = "demo-api-key";

export interface DemoWorkloadOptions {
  now?: () => number;
  newId?: () => string;
}

export class DemoWorkload extends WorkloadBase {
  readonly name = DEMO_WORKLOAD_NAME;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(platform: WorkloadPlatform, opts: DemoWorkloadOptions = {}) {
    super(platform);
    this.now = opts.now ?? Date.now;
    this.newId = opts.newId ?? (() => `demo-${randomUUID().slice(0, 8)}`);
  }

  async validateConfig(config: DeploymentConfig): Promise<string[]> {
    return validateDemoConfig(config.workloadConfig);
  }

  async deploy(config: DeploymentConfig): Promise<string> {
    const demo = readDemoConfig(config.workloadConfig);
    const deploymentId = this.newId();
    const authenticated = (await this.getCredential(API_KEY_CREDENTIAL)) !== undefined;

    await this.saveState(
      DeploymentState.create({
        deploymentId,
        workloadName: this.name,
        status: "running",
        phase: "emitting",
        startedAt: this.isoNow(),
        config: { ...config.workloadConfig },
        metadata: { workers: demo.workers, intervalMs: demo.intervalMs, signals: [...demo.signals], authenticated },
      }),
    );
    this.log.info("deployed %s with %d workers", deploymentId, demo.workers);
    return deploymentId;
  }

  async getStatus(deploymentId: string): Promise<DeploymentState> {
    const state = await this.requireState(deploymentId);
    if (state.status !== "running" || !state.startedAt) return state;
    const emitted = linesBetween(Date.parse(state.startedAt), this.now(), readDemoConfig(state.config));
    return { ...state, metadata: { ...state.metadata, linesEmitted: emitted } };
  }

  /** Declines once cleaned up; stopping twice is fine */
  async stop(deploymentId: string): Promise<boolean> {
    const state = await this.requireState(deploymentId);
    if (state.status === "completed") return false;
    if (state.status === "stopped") return true;
    await this.saveState({ ...state, status: "stopped", phase: "stopped", stoppedAt: this.isoNow() });
    return true;
  }

  /** Resumes emitting; the stopped interval produces no lines */
  async start(deploymentId: string): Promise<boolean> {
    const state = await this.requireState(deploymentId);
    if (state.status === "running") return true;
    if (state.status !== "stopped") return false;
    await this.saveState({ ...state, status: "running", phase: "emitting", startedAt: this.isoNow(), stoppedAt: undefined });
    return true;
  }

  async cleanup(deploymentId: string): Promise<CleanupReport> {
    const state = await this.requireState(deploymentId);
    const demo = readDemoConfig(state.config);
    const began = this.isoNow();

    const details = Array.from({ length: demo.workers }, (_, i) => `released worker-${i}`);
    const completedAt = this.isoNow();
    await this.saveState({ ...state, status: "completed", phase: "cleaned", completedAt });

    return {
      ...CleanupReport.empty(deploymentId),
      resourcesDeleted: demo.workers,
      details,
      durationSeconds: ISODateString.secondsBetween(began, completedAt),
    };
  }

  async *getLogs(deploymentId: string, opts: LogOptions): AsyncGenerator<string> {
    const state = await this.requireState(deploymentId);
    if (!state.startedAt) return;
    const demo = readDemoConfig(state.config);
    const seed = seedOf(deploymentId);
    const startedMs = Date.parse(state.startedAt);
    const endMs = state.status === "running" ? this.now() : Date.parse(state.stoppedAt ?? state.completedAt ?? state.startedAt);

    const total = linesBetween(startedMs, endMs, demo);
    const first = Math.max(0, total - Math.min(opts.lines, MAX_HISTORY));
    for (let i = first; i < total; i++) {
      if (opts.signal.aborted) return;
      yield telemetryLine(seed, i, emittedAt(startedMs, i, demo), demo);
    }

    if (!opts.follow || state.status !== "running") return;

    let index = total;
    while (!opts.signal.aborted) {
      await tick(demo, opts.signal);
      if (opts.signal.aborted) return;
      for (let w = 0; w < demo.workers; w++, index++) {
        yield telemetryLine(seed, index, new Date(this.now()), demo);
      }
    }
  }

  private isoNow(): ISODateString {
    return new Date(this.now()).toISOString();
  }
}

/** One interval, or until the signal aborts */
function tick(config: DemoConfig, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, config.intervalMs);
    signal.addEventListener("abort", done, { once: true });
  });
}
