/**
 * @drover/platform-node - running Drover on a local machine: config, the
 * installable workload registry, file-backed workload services.
 */

// Platform entry point
export { NodePlatform } from "./node-platform.js";
export type { NodePlatformOptions } from "./node-platform.js";

// Config
export { GlobalConfig } from "./global-config.js";
export type { GlobalConfigOptions } from "./global-config.js";

// Manifests and install sources
export { WorkloadManifest, Entrypoint, MANIFEST_FILE } from "./manifest.js";
export { classifySource } from "./workload-source.js";
export type { InstallSource } from "./workload-source.js";

// Services
export { FsWorkloadRegistry } from "./services/fs-workload-registry.js";
export type { FsWorkloadRegistryOptions } from "./services/fs-workload-registry.js";
export { WorkloadInstaller } from "./services/workload-installer.js";
export type { WorkloadInstallerOptions, InstalledWorkload, InstallRequest } from "./services/workload-installer.js";
export { NodePackageTools } from "./services/package-tools.js";
export type { PackageTools, NodePackageToolsOptions } from "./services/package-tools.js";
export { importModule } from "./services/module-loader.js";
export type { ModuleLoader } from "./services/module-loader.js";
export { EnvCredentialStore, credentialEnvName } from "./services/env-credential-store.js";
export { FsWorkloadStateStore } from "./services/fs-state-store.js";

// Errors
export * from "./errors/errors.js";

// Utilities
export { useColor } from "./util/use-color.js";
