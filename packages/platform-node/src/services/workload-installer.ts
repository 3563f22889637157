/**
 * WorkloadInstaller - turns an install source into a checked workload module.
 *
 * Git sources are cloned into a staging directory under the workloads
 * directory and moved to `<workloads>/<name>` only once every check passed.
 * Local paths are used in place. Nothing is registered here; the caller
 * decides what to do with the result.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { DroverError, ISODateString, getLogger } from "@drover/core";
import {
  ErrInstallFailed,
  InMemoryWorkloadRegistry,
  WorkloadDescriptor,
  WorkloadModule,
  WorkloadPlatform,
} from "@drover/workload";
import { Entrypoint, MANIFEST_FILE, WorkloadManifest, isMissing } from "../manifest.js";
import { classifySource, type InstallSource } from "../workload-source.js";
import { ErrEntrypointNotFound, ErrNotADirectory, ErrNotAWorkloadModule } from "../errors/errors.js";
import { NodePackageTools, type PackageTools } from "./package-tools.js";
import { importModule, pickExport, type ModuleLoader } from "./module-loader.js";

const log = getLogger("platform:installer");

export interface WorkloadInstallerOptions {
  workloadsDirectory: string;
  /** Handed to the sample instance created to check the contract */
  platform: WorkloadPlatform;
  cwd?: string;
  tools?: PackageTools;
  loadModule?: ModuleLoader;
  now?: () => ISODateString;
}

export interface InstallRequest {
  /** Names that may not be installed over, e.g. built-ins */
  isReserved?: (name: string) => boolean;
}

export interface InstalledWorkload {
  descriptor: WorkloadDescriptor;
  module: WorkloadModule;
}

export class WorkloadInstaller {
  private readonly tools: PackageTools;
  private readonly loadModule: ModuleLoader;
  private readonly now: () => ISODateString;
  private readonly cwd: string;

  constructor(private readonly opts: WorkloadInstallerOptions) {
    this.tools = opts.tools ?? new NodePackageTools();
    this.loadModule = opts.loadModule ?? importModule;
    this.now = opts.now ?? ISODateString.now;
    this.cwd = opts.cwd ?? process.cwd();
  }

  async install(source: string, request: InstallRequest = {}): Promise<InstalledWorkload> {
    const from = classifySource(source, this.cwd);
    let staging: string | undefined;
    try {
      let directory: string;
      if (from.kind === "git") {
        await fs.mkdir(this.opts.workloadsDirectory, { recursive: true });
        staging = path.join(this.opts.workloadsDirectory, `.staging-${randomUUID().slice(0, 8)}`);
        log.info("cloning %s", from.location);
        await this.tools.clone(from.location, staging);
        directory = staging;
      } else {
        await assertDirectory(from.location);
        directory = from.location;
      }

      const manifest = await WorkloadManifest.read(directory);
      if (request.isReserved?.(manifest.name)) {
        throw fail(source, `name "${manifest.name}" collides with a built-in workload`);
      }

      await this.prepareDependencies(directory);

      const module = await this.loadEntrypoint(directory, manifest.entrypoint, manifest.name);
      if (module.name !== manifest.name) {
        throw fail(source, `module declares name "${module.name}" but ${MANIFEST_FILE} says "${manifest.name}"`);
      }
      InMemoryWorkloadRegistry.instantiate(module, this.opts.platform);

      if (staging !== undefined) {
        const target = path.join(this.opts.workloadsDirectory, manifest.name);
        await fs.rm(target, { recursive: true, force: true });
        await fs.rename(staging, target);
        staging = undefined;
      }

      const descriptor: WorkloadDescriptor = {
        name: manifest.name,
        version: manifest.version,
        description: manifest.description,
        entrypoint: Entrypoint.format(manifest.entrypoint),
        requiredTargets: manifest.targets,
        source: from,
        installedAt: this.now(),
      };
      log.info("installed %s %s from %s", descriptor.name, descriptor.version, WorkloadDescriptor.sourceLabel(from));
      return { descriptor, module };
    } catch (err) {
      if (ErrInstallFailed.is(err)) throw err;
      throw ErrInstallFailed.create({ source, reason: DroverError.messageOf(err) }, undefined, DroverError.wrap(err));
    } finally {
      if (staging !== undefined) {
        await fs.rm(staging, { recursive: true, force: true });
      }
    }
  }

  /** Load the module of an installed descriptor */
  async load(descriptor: WorkloadDescriptor): Promise<WorkloadModule> {
    const entry = Entrypoint.parse(descriptor.entrypoint);
    if (!entry || descriptor.source.kind === "builtin") {
      throw ErrNotAWorkloadModule.create({ path: descriptor.entrypoint, exportName: "default" });
    }
    return this.loadEntrypoint(this.packageDirectory(descriptor.name, descriptor.source), entry, descriptor.name);
  }

  /** Where an installed package lives on disk */
  packageDirectory(name: string, source: InstallSource): string {
    return source.kind === "git" ? path.join(this.opts.workloadsDirectory, name) : source.location;
  }

  private async prepareDependencies(directory: string): Promise<void> {
    const hasPackageJson = await exists(path.join(directory, "package.json"));
    if (hasPackageJson && !(await exists(path.join(directory, "node_modules")))) {
      log.info("installing dependencies in %s", directory);
      await this.tools.installDependencies(directory);
    }
  }

  private async loadEntrypoint(directory: string, entry: Entrypoint, name: string): Promise<WorkloadModule> {
    const file = path.join(directory, entry.modulePath);
    if (!(await exists(file))) {
      throw ErrEntrypointNotFound.create({ path: file, workloadName: name });
    }
    const namespace = await this.loadModule(file);
    const exported = pickExport(namespace, entry.exportName);
    if (!WorkloadModule.is(exported)) {
      throw ErrNotAWorkloadModule.create({ path: file, exportName: entry.exportName });
    }
    return exported;
  }
}

function fail(source: string, reason: string) {
  return ErrInstallFailed.create({ source, reason });
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.stat(file);
    return true;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

async function assertDirectory(location: string): Promise<void> {
  try {
    const stat = await fs.stat(location);
    if (stat.isDirectory()) return;
  } catch (err) {
    if (!isMissing(err)) throw err;
  }
  throw ErrNotADirectory.create({ path: location });
}
