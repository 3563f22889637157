/**
 * Workload - the capability contract every implementation satisfies.
 *
 * The platform never performs a workload's action itself; it only routes
 * lifecycle calls here. Implementations are checked against this contract when
 * they are registered, not when they are first called.
 */

import { StaticTypeCompanion } from "@drover/core";
import type { CleanupReport, DeploymentConfig, DeploymentState } from "./models.js";
import { ErrContractViolation } from "./errors.js";

export interface LogOptions {
  /** Keep streaming new lines until cancelled */
  readonly follow: boolean;
  /** Historical lines to emit first */
  readonly lines: number;
  /** Aborted when the consumer cancels; sources must stop producing and release handles */
  readonly signal: AbortSignal;
}

export interface Workload {
  readonly name: string;

  /** Start a new deployment; returns the canonical deployment id */
  deploy(config: DeploymentConfig): Promise<string>;

  /** Current state. Throws ErrUnknownDeployment for ids it does not know */
  getStatus(deploymentId: string): Promise<DeploymentState>;

  /** Stop a running deployment. `false` means the workload declined */
  stop(deploymentId: string): Promise<boolean>;

  /** Resume a stopped deployment */
  start(deploymentId: string): Promise<boolean>;

  /** Remove every resource the deployment created */
  cleanup(deploymentId: string): Promise<CleanupReport>;

  getLogs(deploymentId: string, opts: LogOptions): AsyncIterable<string>;

  /** Messages describing what is wrong with the config; empty when valid */
  validateConfig(config: DeploymentConfig): Promise<string[]>;

  listDeployments(): Promise<DeploymentState[]>;
}

const contractMethods = [
  "deploy",
  "getStatus",
  "stop",
  "start",
  "cleanup",
  "getLogs",
  "validateConfig",
  "listDeployments",
] as const;

function missingMembers(candidate: unknown): string[] {
  if (typeof candidate !== "object" || candidate === null) {
    return ["name", ...contractMethods];
  }
  const missing: string[] = [];
  if (typeof Reflect.get(candidate, "name") !== "string") missing.push("name");
  for (const method of contractMethods) {
    if (typeof Reflect.get(candidate, method) !== "function") missing.push(method);
  }
  return missing;
}

function isWorkload(candidate: unknown): candidate is Workload {
  return missingMembers(candidate).length === 0;
}

export const Workload = StaticTypeCompanion({
  contractMethods,

  missingMembers,

  is: isWorkload,

  /** Return the candidate as a Workload, or throw ErrContractViolation naming what is missing */
  check(candidate: unknown, workloadName: string): Workload {
    if (isWorkload(candidate)) return candidate;
    throw ErrContractViolation.create({ workloadName, missing: missingMembers(candidate) });
  },
});
