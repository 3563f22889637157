/**
 * DeploymentStatus - the lifecycle state machine.
 *
 *   deploying → running | failed
 *   running   → stopping | cleaning | failed
 *   stopping  → stopped | running | failed
 *   stopped   → running | cleaning
 *   failed    → cleaning
 *   cleaning  → cleaned
 *   cleaned   (terminal)
 *
 * `stopping → running` is the way back when a stop fails.
 */

import { StaticTypeCompanion } from "@drover/core";
import { ErrIllegalTransition } from "./errors.js";

export type DeploymentStatus =
  | "deploying"
  | "running"
  | "stopping"
  | "stopped"
  | "cleaning"
  | "cleaned"
  | "failed";

const transitions: Readonly<Record<DeploymentStatus, readonly DeploymentStatus[]>> = {
  deploying: ["running", "failed"],
  running: ["stopping", "cleaning", "failed"],
  stopping: ["stopped", "running", "failed"],
  stopped: ["running", "cleaning"],
  failed: ["cleaning"],
  cleaning: ["cleaned"],
  cleaned: [],
};

const all: readonly DeploymentStatus[] = ["deploying", "running", "stopping", "stopped", "cleaning", "cleaned", "failed"];

function canTransition(from: DeploymentStatus, to: DeploymentStatus): boolean {
  return transitions[from].includes(to);
}

export const DeploymentStatus = StaticTypeCompanion({
  initial: "deploying" as const satisfies DeploymentStatus,

  all,

  is(value: string): value is DeploymentStatus {
    return all.some((s) => s === value);
  },

  canTransition,

  next(from: DeploymentStatus): readonly DeploymentStatus[] {
    return transitions[from];
  },

  /** No outgoing edge at all. `failed` is not terminal: it can still be cleaned up */
  isTerminal(status: DeploymentStatus): boolean {
    return transitions[status].length === 0;
  },

  assertTransition(deploymentId: string, from: DeploymentStatus, to: DeploymentStatus): void {
    if (!canTransition(from, to)) {
      throw ErrIllegalTransition.create({ deploymentId, from, to });
    }
  },
});
