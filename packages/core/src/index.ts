/**
 * @drover/core - shared primitives: errors, branding, formatting, logging.
 */

// Branding utilities
export type { SoftBrand, Id } from "./brand.js";

export * from "./date-util.js"

// Error system (DroverError and ErrFacet are both type and value)
export { DroverError, ErrFacet } from "./drover-error.js";
export type {
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  EmptyProps,
  InferPropsData,
  FacetProps,
  MergeFacetProps,
  ErrorDef,
  ErrorBoundary,
  DroverErrorJSON,
} from "./drover-error.js";

// Standard facets and error definitions
export * from "./errors/errors.js";

export type { UnionToIntersection, OptionalKeys } from "./type-system-utils.js";

// Formatting
export { Fmt } from "./fmt.js";
export { Printer, PrintFormatter } from "./printable.js";

// Logging
export { getLogger, enableLogging } from "./logger.js";
export type { Logger } from "./logger.js";

// Utilities
export { StaticTypeCompanion } from "./companion.js";
export * from "./lazy.js";
