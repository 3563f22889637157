/**
 * @drover/deployment/testing - behaviour every DeploymentRecordStore must show.
 *
 * Run it from a store's own test file:
 *
 *   describeRecordStore("SqliteDeploymentStore", () => SqliteDeploymentStore.open(tmpFile()));
 */

import { describe, test, expect } from "vitest";
import { DeploymentConfig } from "@drover/workload";
import type { DeploymentRecordStore } from "./record-store.js";
import { ErrDuplicateWorkloadRef, ErrIllegalTransition, ErrUnknownDeployment, ErrWorkloadRefImmutable } from "./errors.js";

const config = (workloadName = "m365-knowledge-worker") =>
  DeploymentConfig.create(workloadName, { workloadConfig: { workers: 25 }, tags: { team: "qa" } });

export function describeRecordStore(name: string, makeStore: () => DeploymentRecordStore | Promise<DeploymentRecordStore>): void {
  describe(`${name} (record store behaviour)`, () => {
    test("create() starts in deploying with a dep- id", async () => {
      const store = await makeStore();
      const record = await store.create(config());
      expect(record.deploymentId).toMatch(/^dep-[0-9a-f]{12}$/);
      expect(record.status).toBe("deploying");
      expect(record.phase).toBe("initializing");
      expect(record.workloadRef).toBeNull();
      expect(record.error).toBeNull();
      expect(record.revision).toBe(1);
      expect(record.tags).toEqual({ team: "qa" });
      expect(record.config).toEqual({ workloadConfig: { workers: 25 } });
    });

    test("concurrent creates produce distinct ids and lose nothing", async () => {
      const store = await makeStore();
      const records = await Promise.all(Array.from({ length: 40 }, () => store.create(config())));
      const ids = new Set(records.map((r) => r.deploymentId));
      expect(ids.size).toBe(40);
      expect(await store.list({}, 100)).toHaveLength(40);
    });

    test("get() finds a record by its workload ref", async () => {
      const store = await makeStore();
      const record = await store.create(config());
      await store.update(record.deploymentId, { workloadRef: "dep-001", status: "running" });
      const byRef = await store.get("dep-001");
      expect(byRef.deploymentId).toBe(record.deploymentId);
      expect(byRef.status).toBe("running");
    });

    test("get() of an unknown id throws unknown_deployment", async () => {
      const store = await makeStore();
      const err = await store.get("dep-missing").catch((e: unknown) => e);
      expect(ErrUnknownDeployment.is(err)).toBe(true);
    });

    test("update() bumps the revision and keeps unpatched fields", async () => {
      const store = await makeStore();
      const record = await store.create(config());
      const updated = await store.update(record.deploymentId, { phase: "provisioning" });
      expect(updated.revision).toBe(2);
      expect(updated.status).toBe("deploying");
      expect(updated.phase).toBe("provisioning");
      const failed = await store.update(record.deploymentId, { status: "failed", error: "boom" });
      expect(failed.revision).toBe(3);
      expect(failed.error).toBe("boom");
      expect(failed.phase).toBe("provisioning");
    });

    test("update() rejects illegal edges and leaves the record alone", async () => {
      const store = await makeStore();
      const record = await store.create(config());
      const err = await store.update(record.deploymentId, { status: "stopped" }).catch((e: unknown) => e);
      expect(ErrIllegalTransition.is(err)).toBe(true);
      if (ErrIllegalTransition.is(err)) {
        expect(err.data.from).toBe("deploying");
        expect(err.data.to).toBe("stopped");
      }
      expect((await store.get(record.deploymentId)).revision).toBe(1);
    });

    test("a patch to the current status is not a transition", async () => {
      const store = await makeStore();
      const record = await store.create(config());
      const err = await store.update(record.deploymentId, { status: "deploying" }).catch((e: unknown) => e);
      expect(ErrIllegalTransition.is(err)).toBe(true);
    });

    test("a workload ref binds to one record only", async () => {
      const store = await makeStore();
      const a = await store.create(config());
      const b = await store.create(config());
      await store.update(a.deploymentId, { workloadRef: "dep-001", status: "running" });
      const err = await store.update(b.deploymentId, { workloadRef: "dep-001", status: "running" }).catch((e: unknown) => e);
      expect(ErrDuplicateWorkloadRef.is(err)).toBe(true);
      expect((await store.get(b.deploymentId)).status).toBe("deploying");
    });

    test("a bound workload ref cannot be rebound", async () => {
      const store = await makeStore();
      const a = await store.create(config());
      await store.update(a.deploymentId, { workloadRef: "dep-001", status: "running" });
      const err = await store.update(a.deploymentId, { workloadRef: "dep-002" }).catch((e: unknown) => e);
      expect(ErrWorkloadRefImmutable.is(err)).toBe(true);
    });

    test("list() is newest first, filtered and limited", async () => {
      const store = await makeStore();
      const first = await store.create(config("alpha"));
      const second = await store.create(config("beta"));
      const third = await store.create(config("alpha"));
      await store.update(third.deploymentId, { status: "failed" });

      expect((await store.list()).map((r) => r.deploymentId)).toEqual([
        third.deploymentId,
        second.deploymentId,
        first.deploymentId,
      ]);
      expect((await store.list({ workloadName: "alpha" })).map((r) => r.deploymentId)).toEqual([
        third.deploymentId,
        first.deploymentId,
      ]);
      expect((await store.list({ workloadName: "alpha", status: "deploying" })).map((r) => r.deploymentId)).toEqual([
        first.deploymentId,
      ]);
      expect(await store.list({}, 1)).toHaveLength(1);
    });
  });
}
