/**
 * Storage boundary - errors owned by @drover/storage-sqlite.
 */

import { DroverError, ErrFacet, HasDeploymentId, InvariantViolated } from "@drover/core";

export const Storage = DroverError.boundary("storage-sqlite");

/** A stored row does not decode into a DeploymentRecord */
export const ErrCorruptRecord = Storage.define("corrupt_record", {
  customProps: ErrFacet.props<{ column: string }>(),
  facets: [InvariantViolated, HasDeploymentId],
  message: (d) => `Stored deployment "${d.deploymentId}" has an unreadable ${d.column} column`,
});

/** The database was written by a newer schema than this build knows */
export const ErrSchemaTooNew = Storage.define("schema_too_new", {
  customProps: ErrFacet.props<{ found: number; supported: number }>(),
  facets: [InvariantViolated],
  message: (d) => `Database schema version ${d.found} is newer than the supported version ${d.supported}`,
});
