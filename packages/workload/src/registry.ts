/**
 * WorkloadRegistry - maps workload names to modules and live instances.
 *
 * Built-in workloads are registered in code. Installed workloads are added by a
 * registry that knows how to fetch packages (see the Node platform). A built-in
 * is instantiated and checked against the contract when it is registered;
 * installed workloads are loaded and checked on first resolve.
 */

import { getLogger } from "@drover/core";
import { WorkloadDescriptor } from "./descriptor.js";
import type { WorkloadModule } from "./workload-module.js";
import type { WorkloadPlatform } from "./platform.js";
import { Workload } from "./workload.js";
import {
  ErrInstallFailed,
  ErrInstallNotSupported,
  ErrUnknownWorkload,
  ErrWorkloadAlreadyRegistered,
} from "./errors.js";

const log = getLogger("workload:registry");

export type WorkloadLoader = () => Promise<WorkloadModule>;

export interface WorkloadRegistry {
  /** Register a built-in module. Duplicate names and contract violations are rejected */
  register(module: WorkloadModule): void;

  /** Install from a git URL or local path; replaces an installed workload of the same name */
  install(source: string): Promise<WorkloadDescriptor>;

  /** Built-in and installed, sorted by name */
  list(): Promise<WorkloadDescriptor[]>;

  describe(name: string): Promise<WorkloadDescriptor>;

  /** Live instance, created on first use and cached */
  resolve(name: string): Promise<Workload>;
}

interface RegistryEntry {
  descriptor: WorkloadDescriptor;
  load: WorkloadLoader;
}

export class InMemoryWorkloadRegistry implements WorkloadRegistry {
  private entries = new Map<string, RegistryEntry>();
  private instances = new Map<string, Promise<Workload>>();

  constructor(private readonly platform: WorkloadPlatform) {}

  register(module: WorkloadModule): void {
    if (this.entries.has(module.name)) {
      throw ErrWorkloadAlreadyRegistered.create({ workloadName: module.name });
    }
    const workload = InMemoryWorkloadRegistry.instantiate(module, this.platform);
    this.entries.set(module.name, {
      descriptor: WorkloadDescriptor.builtin(module),
      load: async () => module,
    });
    this.instances.set(module.name, Promise.resolve(workload));
  }

  /** Add or replace an installed workload. Built-in names cannot be shadowed */
  addInstalled(descriptor: WorkloadDescriptor, load: WorkloadLoader): void {
    if (this.isBuiltin(descriptor.name)) {
      throw ErrInstallFailed.create({
        source: WorkloadDescriptor.sourceLabel(descriptor.source),
        reason: `name "${descriptor.name}" collides with a built-in workload`,
      });
    }
    this.entries.set(descriptor.name, { descriptor, load });
    this.instances.delete(descriptor.name);
  }

  isBuiltin(name: string): boolean {
    return this.entries.get(name)?.descriptor.source.kind === "builtin";
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  async install(source: string): Promise<WorkloadDescriptor> {
    throw ErrInstallNotSupported.create({ source });
  }

  async list(): Promise<WorkloadDescriptor[]> {
    return [...this.entries.values()]
      .map((e) => e.descriptor)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async describe(name: string): Promise<WorkloadDescriptor> {
    const entry = this.entries.get(name);
    if (!entry) throw ErrUnknownWorkload.create({ workloadName: name });
    return entry.descriptor;
  }

  resolve(name: string): Promise<Workload> {
    const cached = this.instances.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) return Promise.reject(ErrUnknownWorkload.create({ workloadName: name }));

    const pending = entry.load().then((module) => InMemoryWorkloadRegistry.instantiate(module, this.platform));
    this.instances.set(name, pending);
    // A failed load is not cached, so a later resolve retries
    pending.catch((err: unknown) => {
      log.debug("resolve %s failed: %s", name, err);
      if (this.instances.get(name) === pending) this.instances.delete(name);
    });
    return pending;
  }

  /** Create an instance from a module and check it against the contract */
  static instantiate(module: WorkloadModule, platform: WorkloadPlatform): Workload {
    return Workload.check(module.create(platform), module.name);
  }
}
