/**
 * NodePlatform - wires the registry, record store and orchestrator for a
 * local installation rooted at GlobalConfig.homeDirectory.
 *
 * One instance per CLI invocation. Everything is passed explicitly; nothing
 * here is global.
 */

import * as fs from "node:fs";
import { enableLogging, getLogger } from "@drover/core";
import {
  CredentialProvider,
  WorkloadPlatform,
  type CredentialStore,
  type WorkloadModule,
  type WorkloadStateStore,
} from "@drover/workload";
import { Orchestrator, type DeploymentRecordStore } from "@drover/deployment";
import { SqliteDeploymentStore } from "@drover/storage-sqlite";
import type { GlobalConfig } from "./global-config.js";
import { EnvCredentialStore } from "./services/env-credential-store.js";
import { FsWorkloadStateStore } from "./services/fs-state-store.js";
import { FsWorkloadRegistry } from "./services/fs-workload-registry.js";
import { WorkloadInstaller } from "./services/workload-installer.js";
import type { PackageTools } from "./services/package-tools.js";
import type { ModuleLoader } from "./services/module-loader.js";

const log = getLogger("platform");

export interface NodePlatformOptions {
  /** Workloads registered in code */
  builtins?: readonly WorkloadModule[];
  /** Defaults to the environment */
  credentials?: CredentialStore;
  /** Defaults to files under config.stateDirectory */
  state?: WorkloadStateStore;
  /** Defaults to the SQLite database at config.databasePath */
  store?: DeploymentRecordStore;
  tools?: PackageTools;
  loadModule?: ModuleLoader;
  logGraceMs?: number;
}

export class NodePlatform {
  private constructor(
    readonly config: GlobalConfig,
    readonly workloadPlatform: WorkloadPlatform,
    readonly registry: FsWorkloadRegistry,
    readonly store: DeploymentRecordStore,
    readonly orchestrator: Orchestrator,
    private readonly ownedDatabase: SqliteDeploymentStore | undefined,
  ) {}

  static create(config: GlobalConfig, opts: NodePlatformOptions = {}): NodePlatform {
    const namespaces = config.logNamespaces;
    if (namespaces) enableLogging(namespaces);
    fs.mkdirSync(config.homeDirectory, { recursive: true });
    log.debug("home %s", config.homeDirectory);

    const workloadPlatform = WorkloadPlatform.create({
      credentials: CredentialProvider.create(opts.credentials ?? new EnvCredentialStore()),
      state: opts.state ?? new FsWorkloadStateStore(config.stateDirectory),
    });

    const installer = new WorkloadInstaller({
      workloadsDirectory: config.workloadsDirectory,
      platform: workloadPlatform,
      cwd: config.cwd,
      tools: opts.tools,
      loadModule: opts.loadModule,
    });

    const registry = new FsWorkloadRegistry({
      registryPath: config.registryPath,
      platform: workloadPlatform,
      installer,
      builtins: opts.builtins,
    });

    let ownedDatabase: SqliteDeploymentStore | undefined;
    let store: DeploymentRecordStore;
    if (opts.store) {
      store = opts.store;
    } else {
      ownedDatabase = SqliteDeploymentStore.open(config.databasePath);
      store = ownedDatabase;
    }

    const orchestrator = new Orchestrator(registry, store, { logGraceMs: opts.logGraceMs });
    return new NodePlatform(config, workloadPlatform, registry, store, orchestrator, ownedDatabase);
  }

  /** Release the database if this platform opened it */
  close(): void {
    if (this.ownedDatabase?.db.open) this.ownedDatabase.close();
  }
}
