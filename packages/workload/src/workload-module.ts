/**
 * WorkloadModule - what a workload package exports.
 *
 * Pairs the workload's identity with a factory. The registry holds modules and
 * creates one instance per process on first use.
 */

import { StaticTypeCompanion } from "@drover/core";
import type { TargetRequirement } from "./descriptor.js";
import type { WorkloadPlatform } from "./platform.js";
import type { Workload } from "./workload.js";

export interface WorkloadModule {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly requiredTargets?: readonly TargetRequirement[];
  create(platform: WorkloadPlatform): Workload;
}

export const WorkloadModule = StaticTypeCompanion({
  define(opts: WorkloadModule): WorkloadModule {
    return Object.freeze({ ...opts });
  },

  /** Structural check for values loaded from an untyped entrypoint */
  is(value: unknown): value is WorkloadModule {
    return (
      typeof value === "object" &&
      value !== null &&
      typeof Reflect.get(value, "name") === "string" &&
      typeof Reflect.get(value, "version") === "string" &&
      typeof Reflect.get(value, "create") === "function"
    );
  },
});
