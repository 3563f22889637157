/**
 * Error definitions for the workload boundary, plus the deployment errors a
 * workload itself is expected to raise.
 */

import {
  BadInput,
  Conflict,
  DroverError,
  ErrFacet,
  HasDeploymentId,
  HasWorkloadName,
  NotFound,
  NotSupported,
} from "@drover/core";

export const Workload = DroverError.boundary("workload");

/** Owned by the deployment boundary; declared here because workloads raise it from getStatus() */
const Deployment = DroverError.boundary("deployment");

/** No workload registered under this name */
export const ErrUnknownWorkload = Workload.define("unknown_workload", {
  facets: [NotFound, HasWorkloadName],
  message: (d) => `Workload "${d.workloadName}" is not registered`,
});

/** Two modules registered under the same name */
export const ErrWorkloadAlreadyRegistered = Workload.define("already_registered", {
  facets: [Conflict, HasWorkloadName],
  message: (d) => `Workload "${d.workloadName}" is already registered`,
});

/** Installation of a workload package failed; the registry is unchanged */
export const ErrInstallFailed = Workload.define("install_failed", {
  customProps: ErrFacet.props<{ source: string; reason: string }>(),
  facets: [BadInput],
  message: (d) => `Failed to install workload from ${d.source}: ${d.reason}`,
});

/** This registry has no installer */
export const ErrInstallNotSupported = Workload.define("install_not_supported", {
  customProps: ErrFacet.props<{ source: string }>(),
  facets: [NotSupported],
  message: (d) => `This registry cannot install workloads (source: ${d.source})`,
});

/** An object handed over as a workload is missing contract methods */
export const ErrContractViolation = Workload.define("contract_violation", {
  customProps: ErrFacet.props<{ missing: string[] }>(),
  facets: [BadInput, HasWorkloadName],
  message: (d) => `Workload "${d.workloadName}" does not satisfy the workload contract (missing: ${d.missing.join(", ")})`,
});

/** An installed workload's entrypoint could not be loaded */
export const ErrWorkloadLoadFailed = Workload.define("load_failed", {
  customProps: ErrFacet.props<{ entrypoint: string }>(),
  facets: [HasWorkloadName],
  message: (d) => `Could not load workload "${d.workloadName}" from ${d.entrypoint}`,
});

export const ErrStartNotSupported = Workload.define("start_not_supported", {
  facets: [NotSupported, HasWorkloadName],
  message: (d) => `Workload "${d.workloadName}" does not implement start/resume`,
});

export const ErrCredentialNotFound = Workload.define("credential_not_found", {
  customProps: ErrFacet.props<{ credential: string }>(),
  facets: [NotFound],
  message: (d) => `Credential "${d.credential}" not found`,
});

export const ErrInvalidDeploymentId = Workload.define("invalid_deployment_id", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput, HasDeploymentId],
  message: (d) => `Invalid deployment id ${JSON.stringify(d.deploymentId)}: ${d.reason}`,
});

/** Neither the record store nor the workload knows this deployment */
export const ErrUnknownDeployment = Deployment.define("unknown_deployment", {
  facets: [NotFound, HasDeploymentId],
  message: (d) => `Deployment "${d.deploymentId}" not found`,
});
