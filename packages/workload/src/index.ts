/**
 * @drover/workload - the workload capability contract and the services around it.
 */

export { Workload } from "./workload.js";
export type { LogOptions } from "./workload.js";

export { WorkloadBase } from "./workload-base.js";

export { WorkloadModule } from "./workload-module.js";

export { WorkloadDescriptor } from "./descriptor.js";
export type { TargetRequirement, WorkloadSource } from "./descriptor.js";

export { DeploymentConfig, DeploymentState, CleanupReport } from "./models.js";
export type { ConfigValue, WorkloadConfig, DeploymentStateStatus } from "./models.js";

export { DeploymentId } from "./deployment-id.js";

export { InMemoryCredentialStore } from "./credential-store.js";
export type { CredentialStore } from "./credential-store.js";
export { CredentialProvider } from "./credential-provider.js";
export type { CredentialHandle, CredentialProviderOptions } from "./credential-provider.js";

export { InMemoryWorkloadStateStore } from "./state-store.js";
export type { WorkloadStateStore } from "./state-store.js";

export { WorkloadPlatform } from "./platform.js";

export { InMemoryWorkloadRegistry } from "./registry.js";
export type { WorkloadRegistry, WorkloadLoader } from "./registry.js";

export * from "./errors.js";
