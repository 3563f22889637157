// Runs in a worker thread with its own connection: applies `updates` patches to one record
import { parentPort, workerData } from "node:worker_threads";
import { z } from "zod";
import { SqliteDeploymentStore } from "../../deployment-store.js";

export const UpdateJob = z.object({
  path: z.string(),
  deploymentId: z.string(),
  label: z.string(),
  updates: z.number().int().nonnegative(),
});
export type UpdateJob = z.infer<typeof UpdateJob>;

async function run(job: UpdateJob): Promise<number> {
  const store = SqliteDeploymentStore.open(job.path, { busyTimeoutMs: 10_000 });
  try {
    for (let i = 0; i < job.updates; i++) {
      await store.update(job.deploymentId, { phase: `${job.label}-${i}` });
    }
    return (await store.get(job.deploymentId)).revision;
  } finally {
    store.close();
  }
}

if (parentPort) {
  const port = parentPort;
  await run(UpdateJob.parse(workerData)).then((revision) => port.postMessage(revision));
}
