import { StaticTypeCompanion, type Id } from "@drover/core";
import { ErrInvalidDeploymentId } from "./errors.js";

/** Either the platform's `dep-…` id or the id a workload returned from deploy() */
export type DeploymentId = Id<"deployment-id">;

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const DeploymentId = StaticTypeCompanion({
  /** Reject ids that are unsafe to use as a file name */
  assertSafe(deploymentId: string): DeploymentId {
    const fail = (reason: string) => ErrInvalidDeploymentId.create({ deploymentId, reason });
    if (!deploymentId) throw fail("must not be empty");
    if (deploymentId.includes("/") || deploymentId.includes("\\")) throw fail("contains a path separator");
    if (deploymentId.includes("..")) throw fail("contains a path traversal");
    if (!SAFE_ID.test(deploymentId)) throw fail("only letters, digits, '.', '_' and '-' are allowed");
    return deploymentId;
  },
});
