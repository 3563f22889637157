/**
 * WorkloadBase - optional base class for workload implementations.
 *
 * Supplies the contract's optional behaviour (start, validateConfig,
 * listDeployments) and helpers over the platform services. Subclasses
 * implement deploy, getStatus, stop, cleanup and getLogs.
 */

import type { Logger } from "@drover/core";
import type { CleanupReport, DeploymentConfig, DeploymentState } from "./models.js";
import type { LogOptions, Workload } from "./workload.js";
import type { WorkloadPlatform } from "./platform.js";
import { ErrStartNotSupported, ErrUnknownDeployment } from "./errors.js";

export abstract class WorkloadBase implements Workload {
  abstract readonly name: string;

  constructor(protected readonly platform: WorkloadPlatform) {}

  abstract deploy(config: DeploymentConfig): Promise<string>;
  abstract getStatus(deploymentId: string): Promise<DeploymentState>;
  abstract stop(deploymentId: string): Promise<boolean>;
  abstract cleanup(deploymentId: string): Promise<CleanupReport>;
  abstract getLogs(deploymentId: string, opts: LogOptions): AsyncIterable<string>;

  /**
   * Resume a stopped deployment. Not supported unless overridden: re-deploying
   * here would create a second deployment under a new id and orphan the first.
   */
  async start(_deploymentId: string): Promise<boolean> {
    throw ErrStartNotSupported.create({ workloadName: this.name });
  }

  async validateConfig(_config: DeploymentConfig): Promise<string[]> {
    return [];
  }

  /** States this workload saved through the platform */
  listDeployments(): Promise<DeploymentState[]> {
    return this.platform.state.list(this.name);
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  protected get log(): Logger {
    return this.platform.logger(this.name);
  }

  protected saveState(state: DeploymentState): Promise<void> {
    return this.platform.state.save(state);
  }

  protected loadState(deploymentId: string): Promise<DeploymentState | undefined> {
    return this.platform.state.load(deploymentId);
  }

  /** Saved state, or ErrUnknownDeployment */
  protected async requireState(deploymentId: string): Promise<DeploymentState> {
    const state = await this.loadState(deploymentId);
    if (!state || state.workloadName !== this.name) {
      throw ErrUnknownDeployment.create({ deploymentId });
    }
    return state;
  }

  protected getCredential(name: string): Promise<string | undefined> {
    return this.platform.credentials.lookup(name);
  }
}
