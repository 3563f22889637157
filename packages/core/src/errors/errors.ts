/**
 * Standard facets and the errors owned by the core boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 */

import {ErrFacet, DroverError} from "../drover-error.js";

export const Core = DroverError.boundary("core");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

export const NotSupported = ErrFacet.marker("NotSupported");

/** Internal invariant violated, always a bug */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** Another writer or record already holds the thing */
export const Conflict = ErrFacet.marker("Conflict");

/** Carries a workload name */
export const HasWorkloadName = ErrFacet.data<{ workloadName: string }>("HasWorkloadName");

/** Carries a deployment id (either the internal id or the workload's ref) */
export const HasDeploymentId = ErrFacet.data<{ deploymentId: string }>("HasDeploymentId");

// ============================================================================
// Core Errors
// ============================================================================

/** Printer key has no registered implementation */
export const ErrPrinterNotRegistered = Core.define("printer_not_registered", {
  customProps: ErrFacet.props<{ key: string }>(),
  facets: [NotFound],
  message: (d) => `No printer registered for "${d.key}"`,
});

export const ErrInvariant = Core.define("invariant", {
  customProps: ErrFacet.props<{ detail: string }>(),
  facets: [InvariantViolated],
  message: (d) => `Invariant violated: ${d.detail}`,
});
