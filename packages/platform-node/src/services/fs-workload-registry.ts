/**
 * Filesystem-backed WorkloadRegistry.
 *
 * Built-ins are registered in code; installed workloads are listed in
 * workloads.json and loaded from their packages on first resolve. The file is
 * written only after an install passed every check, so a failed install
 * leaves both the file and the in-memory table as they were.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { DroverError, getLogger } from "@drover/core";
import {
  ErrWorkloadLoadFailed,
  InMemoryWorkloadRegistry,
  type Workload,
  type WorkloadDescriptor,
  type WorkloadModule,
  type WorkloadPlatform,
  type WorkloadRegistry,
} from "@drover/workload";
import { ErrCorruptFile } from "../errors/errors.js";
import type { WorkloadInstaller } from "./workload-installer.js";

const log = getLogger("platform:registry");

const InstalledDescriptor = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string(),
  entrypoint: z.string(),
  requiredTargets: z.array(z.object({ targetType: z.string(), requiredRoles: z.array(z.string()) })),
  source: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("path"), location: z.string() }),
    z.object({ kind: z.literal("git"), location: z.string() }),
  ]),
  installedAt: z.string().optional(),
});

const RegistryFile = z.object({
  workloads: z.record(z.string(), InstalledDescriptor).default({}),
});

interface RegistryFile {
  workloads: Record<string, WorkloadDescriptor>;
}

export interface FsWorkloadRegistryOptions {
  registryPath: string;
  platform: WorkloadPlatform;
  installer: WorkloadInstaller;
  builtins?: readonly WorkloadModule[];
}

export class FsWorkloadRegistry implements WorkloadRegistry {
  #registry: InMemoryWorkloadRegistry;
  readonly #installer: WorkloadInstaller;
  readonly #registryPath: string;

  constructor(opts: FsWorkloadRegistryOptions) {
    this.#registry = new InMemoryWorkloadRegistry(opts.platform);
    this.#installer = opts.installer;
    this.#registryPath = opts.registryPath;

    for (const module of opts.builtins ?? []) {
      this.#registry.register(module);
    }
    for (const descriptor of Object.values(this.read().workloads)) {
      if (this.#registry.isBuiltin(descriptor.name)) {
        log.warn("ignoring installed %s: a built-in workload has that name", descriptor.name);
        continue;
      }
      this.#registry.addInstalled(descriptor, () => this.loadInstalled(descriptor));
    }
  }

  register(module: WorkloadModule): void {
    this.#registry.register(module);
  }

  async install(source: string): Promise<WorkloadDescriptor> {
    const { descriptor, module } = await this.#installer.install(source, {
      isReserved: (name) => this.#registry.isBuiltin(name),
    });

    const file = this.read();
    this.write({ ...file, workloads: { ...file.workloads, [descriptor.name]: descriptor } });
    this.#registry.addInstalled(descriptor, async () => module);
    return descriptor;
  }

  list(): Promise<WorkloadDescriptor[]> {
    return this.#registry.list();
  }

  describe(name: string): Promise<WorkloadDescriptor> {
    return this.#registry.describe(name);
  }

  resolve(name: string): Promise<Workload> {
    return this.#registry.resolve(name);
  }

  private async loadInstalled(descriptor: WorkloadDescriptor): Promise<WorkloadModule> {
    try {
      return await this.#installer.load(descriptor);
    } catch (err) {
      throw ErrWorkloadLoadFailed.create(
        { workloadName: descriptor.name, entrypoint: descriptor.entrypoint },
        undefined,
        DroverError.wrap(err),
      );
    }
  }

  // --------------------------------------------------------------------------
  // File I/O
  // --------------------------------------------------------------------------

  private read(): RegistryFile {
    if (!fs.existsSync(this.#registryPath)) {
      return { workloads: {} };
    }
    const raw = fs.readFileSync(this.#registryPath, "utf-8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw ErrCorruptFile.create({ path: this.#registryPath }, DroverError.messageOf(err));
    }
    const parsed = RegistryFile.safeParse(json);
    if (!parsed.success) {
      throw ErrCorruptFile.create({ path: this.#registryPath }, parsed.error.issues[0]?.message);
    }
    return parsed.data;
  }

  private write(file: RegistryFile): void {
    const dir = path.dirname(this.#registryPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const tmp = `${this.#registryPath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(file, null, 2) + "\n");
    fs.renameSync(tmp, this.#registryPath);
  }
}
