import { describe, test, expect } from "vitest";
import { DeploymentConfig } from "@drover/workload";
import { InMemoryDeploymentStore } from "../in-memory-record-store.js";
import { ErrIdAllocationFailed } from "../errors.js";
import { describeRecordStore } from "../testing.js";

describeRecordStore("InMemoryDeploymentStore", () => new InMemoryDeploymentStore());

describe("InMemoryDeploymentStore id allocation", () => {
  test("retries when a generated id is taken", async () => {
    const ids = ["dep-aaaaaaaaaaaa", "dep-aaaaaaaaaaaa", "dep-bbbbbbbbbbbb"];
    const store = new InMemoryDeploymentStore({ newId: () => ids.shift() ?? "dep-zzzzzzzzzzzz" });
    const a = await store.create(DeploymentConfig.create("w"));
    const b = await store.create(DeploymentConfig.create("w"));
    expect(a.deploymentId).toBe("dep-aaaaaaaaaaaa");
    expect(b.deploymentId).toBe("dep-bbbbbbbbbbbb");
  });

  test("gives up after repeated collisions", async () => {
    const store = new InMemoryDeploymentStore({ newId: () => "dep-aaaaaaaaaaaa" });
    await store.create(DeploymentConfig.create("w"));
    const err = await store.create(DeploymentConfig.create("w")).catch((e: unknown) => e);
    expect(ErrIdAllocationFailed.is(err)).toBe(true);
  });

  test("records handed out are copies", async () => {
    const store = new InMemoryDeploymentStore();
    const record = await store.create(DeploymentConfig.create("w", { tags: { a: "1" } }));
    const tags: Record<string, string> = { ...record.tags, b: "2" };
    expect(tags).toEqual({ a: "1", b: "2" });
    expect((await store.get(record.deploymentId)).tags).toEqual({ a: "1" });
  });
});
