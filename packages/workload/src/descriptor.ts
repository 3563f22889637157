import { ISODateString, StaticTypeCompanion } from "@drover/core";
import type { WorkloadModule } from "./workload-module.js";

/** A target environment the workload needs, with the roles it must hold there */
export interface TargetRequirement {
  readonly targetType: string;
  readonly requiredRoles: readonly string[];
}

export type WorkloadSource =
  | { readonly kind: "builtin" }
  | { readonly kind: "path"; readonly location: string }
  | { readonly kind: "git"; readonly location: string };

/**
 * Metadata identifying one installable workload package.
 * Immutable once installed; a re-install replaces it wholesale.
 */
export interface WorkloadDescriptor {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  /** `<module path>[#<export>]`; `builtin:<name>` for statically registered workloads */
  readonly entrypoint: string;
  readonly requiredTargets: readonly TargetRequirement[];
  readonly source: WorkloadSource;
  readonly installedAt?: ISODateString;
}

export const WorkloadDescriptor = StaticTypeCompanion({
  /** Descriptor for a module registered in code */
  builtin(module: WorkloadModule): WorkloadDescriptor {
    return {
      name: module.name,
      version: module.version,
      description: module.description ?? "",
      entrypoint: `builtin:${module.name}`,
      requiredTargets: module.requiredTargets ?? [],
      source: { kind: "builtin" },
    };
  },

  sourceLabel(source: WorkloadSource): string {
    return source.kind === "builtin" ? "builtin" : `${source.kind}:${source.location}`;
  },
});
