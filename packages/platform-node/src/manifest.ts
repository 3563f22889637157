/**
 * WorkloadManifest - the `workload.yaml` at the root of every workload package.
 *
 *   name: workload-demo
 *   version: 0.1.0
 *   description: Simulated telemetry
 *   entrypoint: src/index.ts#default
 *   targets:
 *     - type: azure-tenant
 *       roles: [Reader]
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { StaticTypeCompanion } from "@drover/core";
import type { TargetRequirement } from "@drover/workload";
import { ErrManifestInvalid, ErrManifestNotFound } from "./errors/errors.js";

export const MANIFEST_FILE = "workload.yaml";

const DEFAULT_ENTRYPOINT = "src/index.ts";

const NAME = /^[a-z0-9][a-z0-9._-]*$/;

const ManifestSchema = z.object({
  name: z
    .string()
    .regex(NAME, "name must be lower-case letters, digits, '.', '_' or '-'")
    .refine((name) => !name.includes(".."), "name must not contain '..'"),
  version: z.union([z.string(), z.number()]).transform(String),
  description: z.string().default(""),
  entrypoint: z.string().min(1).default(DEFAULT_ENTRYPOINT),
  targets: z
    .array(
      z.object({
        type: z.string().min(1),
        roles: z.array(z.string()).default([]),
      }),
    )
    .default([]),
});

export interface WorkloadManifest {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly entrypoint: Entrypoint;
  readonly targets: readonly TargetRequirement[];
}

/** `<module path relative to the package>[#<export>]` */
export interface Entrypoint {
  readonly modulePath: string;
  readonly exportName: string;
}

export const Entrypoint = StaticTypeCompanion({
  /** Undefined when the reference is absolute or leaves the package */
  parse(ref: string): Entrypoint | undefined {
    const hash = ref.indexOf("#");
    const modulePath = hash === -1 ? ref : ref.slice(0, hash);
    const exportName = hash === -1 ? "default" : ref.slice(hash + 1);
    if (!modulePath || !exportName || path.isAbsolute(modulePath) || modulePath.includes("://")) {
      return undefined;
    }
    if (path.normalize(modulePath).split(path.sep).includes("..")) {
      return undefined;
    }
    return { modulePath, exportName };
  },

  format(entry: Entrypoint): string {
    return entry.exportName === "default" ? entry.modulePath : `${entry.modulePath}#${entry.exportName}`;
  },
});

function parseManifest(text: string, file: string): WorkloadManifest {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw ErrManifestInvalid.create({ path: file, problems: [err instanceof Error ? err.message : String(err)] });
  }

  const parsed = ManifestSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw ErrManifestInvalid.create({ path: file, problems });
  }

  const { name, version, description, entrypoint, targets } = parsed.data;
  const entry = Entrypoint.parse(entrypoint);
  if (!entry) {
    throw ErrManifestInvalid.create({
      path: file,
      problems: [`entrypoint: "${entrypoint}" must be a relative path inside the package`],
    });
  }
  return {
    name,
    version,
    description,
    entrypoint: entry,
    targets: targets.map((t) => ({ targetType: t.type, requiredRoles: t.roles })),
  };
}

export const WorkloadManifest = StaticTypeCompanion({
  /** Parse manifest text. `file` is used in error messages only */
  parse: parseManifest,

  /** Read `<directory>/workload.yaml` */
  async read(directory: string): Promise<WorkloadManifest> {
    const file = path.join(directory, MANIFEST_FILE);
    let text: string;
    try {
      text = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isMissing(err)) throw ErrManifestNotFound.create({ path: directory });
      throw err;
    }
    return parseManifest(text, file);
  },
});

export function isMissing(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT";
}
