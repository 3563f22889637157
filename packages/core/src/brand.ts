/**
 * Branding utilities for nominal typing of plain strings.
 */

declare const SoftBrandTag: unique symbol;

/**
 * SoftBrand<U, Name> - A branded type that still accepts a naked U.
 *
 * @example
 * type DeploymentId = SoftBrand<string, 'deployment-id'>;
 * const id: DeploymentId = "dep-3f2a9c1b7e4d";  // ok
 * const name: WorkloadName = id;                 // error - different brand
 */
export type SoftBrand<U, Name extends string> = U & { [SoftBrandTag]?: Name };

/**
 * Id<Name> - soft-branded string identifier. Most identifiers use this.
 *
 * @example
 * function stop(id: DeploymentId): Promise<boolean>;
 */
export type Id<Name extends string> = SoftBrand<string, Name>;
