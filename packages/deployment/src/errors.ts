/**
 * Error definitions for the deployment boundary.
 */

import {
  BadInput,
  Conflict,
  DroverError,
  ErrFacet,
  HasDeploymentId,
  HasWorkloadName,
  InvariantViolated,
} from "@drover/core";
import type { DeploymentStatus } from "./deployment-status.js";

export const Deployment = DroverError.boundary("deployment");

export { ErrUnknownDeployment } from "@drover/workload";

/** Core validation or the workload's validateConfig() found problems. No record is created */
export const ErrValidationFailed = Deployment.define("validation_failed", {
  customProps: ErrFacet.props<{ errors: string[] }>(),
  facets: [BadInput, HasWorkloadName],
  message: (d) => `Invalid configuration for workload "${d.workloadName}": ${d.errors.join("; ")}`,
});

/** The status edge is not part of the lifecycle */
export const ErrIllegalTransition = Deployment.define("illegal_transition", {
  customProps: ErrFacet.props<{ from: DeploymentStatus; to: DeploymentStatus }>(),
  facets: [Conflict, HasDeploymentId],
  message: (d) => `Deployment "${d.deploymentId}" cannot move from ${d.from} to ${d.to}`,
});

/** The workload raised while handling a lifecycle call. The workload's error is the cause */
export const ErrWorkloadExecution = Deployment.define("workload_execution", {
  customProps: ErrFacet.props<{ operation: string }>(),
  facets: [HasWorkloadName, HasDeploymentId],
  message: (d) => `Workload "${d.workloadName}" failed to ${d.operation} deployment "${d.deploymentId}"`,
});

/** The workload answered `false` */
export const ErrWorkloadDeclined = Deployment.define("workload_declined", {
  customProps: ErrFacet.props<{ operation: string }>(),
  facets: [HasWorkloadName, HasDeploymentId],
  message: (d) => `Workload "${d.workloadName}" declined to ${d.operation} deployment "${d.deploymentId}"`,
});

/** The workload's id is already bound to another record */
export const ErrDuplicateWorkloadRef = Deployment.define("duplicate_workload_ref", {
  customProps: ErrFacet.props<{ workloadRef: string }>(),
  facets: [Conflict, HasDeploymentId],
  message: (d) => `Workload id "${d.workloadRef}" is already bound to another deployment (binding to "${d.deploymentId}")`,
});

/** A record's workload id is bound once */
export const ErrWorkloadRefImmutable = Deployment.define("workload_ref_immutable", {
  customProps: ErrFacet.props<{ workloadRef: string }>(),
  facets: [InvariantViolated, HasDeploymentId],
  message: (d) => `Deployment "${d.deploymentId}" is already bound to workload id "${d.workloadRef}"`,
});

/** Another writer changed the record between read and write */
export const ErrConcurrentModification = Deployment.define("concurrent_modification", {
  customProps: ErrFacet.props<{ expectedRevision: number }>(),
  facets: [Conflict, HasDeploymentId],
  message: (d) => `Deployment "${d.deploymentId}" changed concurrently (expected revision ${d.expectedRevision})`,
});

/** Could not allocate a fresh deployment id */
export const ErrIdAllocationFailed = Deployment.define("id_allocation_failed", {
  customProps: ErrFacet.props<{ attempts: number }>(),
  facets: [InvariantViolated],
  message: (d) => `Could not allocate a unique deployment id after ${d.attempts} attempts`,
});
