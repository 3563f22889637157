/**
 * WorkloadStateStore - where workloads keep their own DeploymentState.
 *
 * Separate from the platform's deployment records: workloads read and write
 * here, never to the record store.
 */

import type { DeploymentState } from "./models.js";
import { DeploymentId } from "./deployment-id.js";

export interface WorkloadStateStore {
  save(state: DeploymentState): Promise<void>;
  load(deploymentId: string): Promise<DeploymentState | undefined>;
  /** Every state saved by the named workload */
  list(workloadName: string): Promise<DeploymentState[]>;
}

export class InMemoryWorkloadStateStore implements WorkloadStateStore {
  private states = new Map<string, DeploymentState>();

  async save(state: DeploymentState): Promise<void> {
    DeploymentId.assertSafe(state.deploymentId);
    this.states.set(state.deploymentId, structuredClone(state));
  }

  async load(deploymentId: string): Promise<DeploymentState | undefined> {
    DeploymentId.assertSafe(deploymentId);
    const state = this.states.get(deploymentId);
    return state && structuredClone(state);
  }

  async list(workloadName: string): Promise<DeploymentState[]> {
    return [...this.states.values()]
      .filter((s) => s.workloadName === workloadName)
      .map((s) => structuredClone(s));
  }
}
