/**
 * Node platform error definitions.
 *
 * Errors specific to running on a local filesystem: manifests, the registry
 * file, state files and the package tools.
 */

import { BadInput, DroverError, ErrFacet, HasWorkloadName, InvariantViolated, NotFound, NotSupported } from "@drover/core";

const Platform = DroverError.boundary("platform");
const HasPath = ErrFacet.data<{ path: string }>("HasPath");

export { Platform };

/** The package has no workload.yaml */
export const ErrManifestNotFound = Platform.define("manifest_not_found", {
  facets: [NotFound, HasPath],
  message: (d) => `No workload.yaml found in ${d.path}`,
});

/** workload.yaml exists but does not describe a workload */
export const ErrManifestInvalid = Platform.define("manifest_invalid", {
  customProps: ErrFacet.props<{ problems: string[] }>(),
  facets: [BadInput, HasPath],
  message: (d) => `Invalid manifest ${d.path}: ${d.problems.join("; ")}`,
});

/** A local install source that is not a directory */
export const ErrNotADirectory = Platform.define("not_a_directory", {
  facets: [BadInput, HasPath],
  message: (d) => `Not a directory: ${d.path}`,
});

/** The manifest's entrypoint names a file the package does not have */
export const ErrEntrypointNotFound = Platform.define("entrypoint_not_found", {
  facets: [NotFound, HasPath, HasWorkloadName],
  message: (d) => `Entrypoint of "${d.workloadName}" does not exist: ${d.path}`,
});

/** The entrypoint module exists but its export is not a workload module */
export const ErrNotAWorkloadModule = Platform.define("not_a_workload_module", {
  customProps: ErrFacet.props<{ exportName: string }>(),
  facets: [BadInput, HasPath],
  message: (d) => `Export "${d.exportName}" of ${d.path} is not a workload module`,
});

/** git or npm exited unsuccessfully */
export const ErrCommandFailed = Platform.define("command_failed", {
  customProps: ErrFacet.props<{ command: string; exitCode: number | null }>(),
  facets: [],
  message: (d) => `${d.command} failed${d.exitCode === null ? "" : ` with exit code ${d.exitCode}`}`,
});

/** workloads.json or a state file could not be read back */
export const ErrCorruptFile = Platform.define("corrupt_file", {
  facets: [InvariantViolated, HasPath],
  message: (d) => `Cannot read ${d.path}`,
});

/** The environment credential store cannot be written */
export const ErrCredentialStoreReadOnly = Platform.define("credential_store_read_only", {
  customProps: ErrFacet.props<{ credential: string }>(),
  facets: [NotSupported],
  message: (d) => `Cannot change credential "${d.credential}": environment credentials are read-only`,
});
