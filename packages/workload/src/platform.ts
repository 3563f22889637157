/**
 * WorkloadPlatform - the services the platform hands to every workload.
 */

import { getLogger, StaticTypeCompanion, type Logger } from "@drover/core";
import { CredentialProvider } from "./credential-provider.js";
import { InMemoryCredentialStore } from "./credential-store.js";
import { InMemoryWorkloadStateStore, type WorkloadStateStore } from "./state-store.js";

export interface WorkloadPlatform {
  readonly credentials: CredentialProvider;
  readonly state: WorkloadStateStore;
  /** Logger namespaced to the workload: `drover:workload:<name>` */
  logger(workloadName: string): Logger;
}

export const WorkloadPlatform = StaticTypeCompanion({
  create(opts: { credentials: CredentialProvider; state: WorkloadStateStore }): WorkloadPlatform {
    return {
      credentials: opts.credentials,
      state: opts.state,
      logger: (workloadName) => getLogger(`workload:${workloadName}`),
    };
  },

  /** Everything in memory. For tests and ephemeral use */
  inMemory(opts?: { credentials?: Record<string, string> }): WorkloadPlatform {
    return {
      credentials: CredentialProvider.create(new InMemoryCredentialStore(opts?.credentials)),
      state: new InMemoryWorkloadStateStore(),
      logger: (workloadName) => getLogger(`workload:${workloadName}`),
    };
  },
});
