import { describe, test, expect } from "vitest";
import { DroverError } from "@drover/core";
import { Workload } from "../workload.js";
import { WorkloadModule } from "../workload-module.js";
import { ErrContractViolation, ErrStartNotSupported, ErrUnknownDeployment } from "../errors.js";
import { DeploymentConfig } from "../models.js";
import { StubbedWorkload } from "../testing.js";

describe("Workload contract", () => {
  test("a complete implementation passes", () => {
    const stub = StubbedWorkload();
    expect(Workload.is(stub)).toBe(true);
    expect(Workload.check(stub, "stub-workload")).toBe(stub);
  });

  test("missing members are named", () => {
    const partial = { name: "half", deploy: async () => "x", stop: async () => true };
    expect(Workload.missingMembers(partial)).toEqual([
      "getStatus",
      "start",
      "cleanup",
      "getLogs",
      "validateConfig",
      "listDeployments",
    ]);
  });

  test("check() throws a contract violation listing what is missing", () => {
    try {
      Workload.check({ name: "empty" }, "empty");
      expect.unreachable();
    } catch (err) {
      expect(ErrContractViolation.is(err)).toBe(true);
      if (ErrContractViolation.is(err)) {
        expect(err.data.missing).toContain("deploy");
        expect(err.data.workloadName).toBe("empty");
      }
    }
  });

  test("non-objects are missing everything", () => {
    expect(Workload.missingMembers(null)).toHaveLength(9);
  });
});

describe("WorkloadModule", () => {
  test("is() recognises module-shaped values", () => {
    const mod = WorkloadModule.define({
      name: "m",
      version: "1.0.0",
      create: (platform) => StubbedWorkload({ name: "m" }, platform),
    });
    expect(WorkloadModule.is(mod)).toBe(true);
    expect(WorkloadModule.is({ name: "m" })).toBe(false);
    expect(Object.isFrozen(mod)).toBe(true);
  });
});

describe("WorkloadBase defaults", () => {
  test("start() refuses unless overridden", async () => {
    const stub = StubbedWorkload({ supportsStart: false });
    const id = await stub.deploy(DeploymentConfig.create("stub-workload"));
    await expect(stub.start(id)).rejects.toSatisfy((err: unknown) => ErrStartNotSupported.is(err));
  });

  test("listDeployments() reads the platform state store", async () => {
    const stub = StubbedWorkload({ deployIds: ["a-1", "a-2"] });
    await stub.deploy(DeploymentConfig.create("stub-workload"));
    await stub.deploy(DeploymentConfig.create("stub-workload"));
    const ids = (await stub.listDeployments()).map((s) => s.deploymentId).sort();
    expect(ids).toEqual(["a-1", "a-2"]);
  });

  test("getStatus() of an unknown id raises unknown_deployment", async () => {
    const stub = StubbedWorkload();
    const err = await stub.getStatus("nope").catch((e: unknown) => e);
    expect(ErrUnknownDeployment.is(err)).toBe(true);
    expect(DroverError.inDomain(err, "deployment")).toBe(true);
  });

  test("deploy() keeps the workload config in its state", async () => {
    const stub = StubbedWorkload({ deployIds: ["dep-001"] });
    await stub.deploy(DeploymentConfig.create("stub-workload", { workloadConfig: { workers: 25 } }));
    const state = await stub.getStatus("dep-001");
    expect(state.config).toEqual({ workers: 25 });
    expect(state.status).toBe("running");
  });
});
