import * as path from "node:path";
import type { WorkloadSource } from "@drover/workload";

/** A source a workload can be installed from. Built-ins are never installed */
export type InstallSource = Exclude<WorkloadSource, { kind: "builtin" }>;

const GIT_PREFIXES = ["https://", "http://", "git@", "ssh://", "git://"];

/**
 * Remote repository references become `git`; everything else is a local path,
 * resolved against `cwd`.
 */
export function classifySource(source: string, cwd: string): InstallSource {
  const trimmed = source.trim();
  if (GIT_PREFIXES.some((p) => trimmed.startsWith(p)) || trimmed.endsWith(".git")) {
    return { kind: "git", location: trimmed };
  }
  return { kind: "path", location: path.resolve(cwd, trimmed) };
}
