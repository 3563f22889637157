import { describe, test, expect } from "vitest";
import {
  DeploymentConfig,
  ErrUnknownDeployment,
  InMemoryWorkloadRegistry,
  Workload,
  WorkloadPlatform,
} from "@drover/workload";
import { InMemoryDeploymentStore, Orchestrator } from "@drover/deployment";
import DemoWorkloadModule, { DemoWorkload, validateDemoConfig } from "../index.js";

const T0 = Date.parse("2026-03-01T09:00:00.000Z");

function setup(credentials: Record<string, string> = {}) {
  const clock = { now: T0 };
  let ids = 0;
  const platform = WorkloadPlatform.inMemory({ credentials });
  const workload = new DemoWorkload(platform, {
    now: () => clock.now,
    newId: () => `demo-${String(++ids).padStart(4, "0")}`,
  });
  return { clock, platform, workload };
}

const config = (workloadConfig: Record<string, string | number | boolean> = {}) =>
  DeploymentConfig.create("workload-demo", { workloadConfig });

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of source) out.push(line);
  return out;
}

describe("validateDemoConfig", () => {
  test("accepts the defaults and known keys", () => {
    expect(validateDemoConfig({})).toEqual([]);
    expect(validateDemoConfig({ workers: 100, intervalMs: 250, signals: "cpu, disk" })).toEqual([]);
  });

  test("reports every problem", () => {
    expect(validateDemoConfig({ colour: "red", workers: 0, intervalMs: -1, signals: "cpu,gpu" })).toEqual([
      'unknown config key "colour"',
      "workers must be a positive integer (got 0)",
      "intervalMs must be a positive number (got -1)",
      "unknown signals: gpu (expected cpu, memory, disk, network)",
    ]);
    expect(validateDemoConfig({ workers: 101 })).toEqual(["workers must be at most 100"]);
    expect(validateDemoConfig({ workers: "many" })).toEqual(["workers must be a positive integer (got many)"]);
  });
});

describe("DemoWorkload", () => {
  test("satisfies the workload contract", () => {
    const instance = DemoWorkloadModule.create(WorkloadPlatform.inMemory());
    expect(Workload.is(instance)).toBe(true);
    expect(instance.name).toBe("workload-demo");
  });

  test("deploy saves a running state", async () => {
    const { workload } = setup();
    const id = await workload.deploy(config({ workers: 3 }));

    expect(id).toBe("demo-0001");
    expect(await workload.getStatus(id)).toMatchObject({
      deploymentId: "demo-0001",
      workloadName: "workload-demo",
      status: "running",
      phase: "emitting",
      startedAt: "2026-03-01T09:00:00.000Z",
      config: { workers: 3 },
      metadata: { workers: 3, intervalMs: 1000, authenticated: false, linesEmitted: 0 },
    });
    expect((await workload.listDeployments()).map((s) => s.deploymentId)).toEqual(["demo-0001"]);
  });

  test("records whether an api key credential was available", async () => {
    const { workload } = setup({ "demo-api-key": "test-secret" });
    const id = await workload.deploy(config());
    expect((await workload.getStatus(id)).metadata.authenticated).toBe(true);
  });

  test("linesEmitted follows the clock", async () => {
    const { workload, clock } = setup();
    const id = await workload.deploy(config({ workers: 2 }));
    clock.now = T0 + 3500;
    expect((await workload.getStatus(id)).metadata.linesEmitted).toBe(6);
  });

  test("log history is the most recent lines, in order and repeatable", async () => {
    const { workload, clock } = setup();
    const id = await workload.deploy(config({ workers: 2, signals: "cpu,memory" }));
    clock.now = T0 + 3000;

    const signal = new AbortController().signal;
    const lines = await collect(workload.getLogs(id, { follow: false, lines: 4, signal }));

    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(/^2026-03-01T09:00:02\.000Z worker-0 cpu=\d+\.\d$/);
    expect(lines[1]).toMatch(/^2026-03-01T09:00:02\.000Z worker-1 memory=\d+\.\d$/);
    expect(lines[2]).toMatch(/^2026-03-01T09:00:03\.000Z worker-0 cpu=\d+\.\d$/);
    expect(lines[3]).toMatch(/^2026-03-01T09:00:03\.000Z worker-1 memory=\d+\.\d$/);
    expect(await collect(workload.getLogs(id, { follow: false, lines: 4, signal }))).toEqual(lines);
  });

  test("following emits new lines until the signal aborts", async () => {
    const { workload, clock } = setup();
    const id = await workload.deploy(config({ workers: 1, intervalMs: 5 }));
    clock.now = T0 + 10;

    const controller = new AbortController();
    const lines: string[] = [];
    for await (const line of workload.getLogs(id, { follow: true, lines: 100, signal: controller.signal })) {
      lines.push(line);
      if (lines.length === 4) controller.abort();
    }

    expect(lines).toHaveLength(4);
    expect(lines.slice(0, 2).map((l) => l.slice(0, 24))).toEqual(["2026-03-01T09:00:00.005Z", "2026-03-01T09:00:00.010Z"]);
  });

  test("stop, start and cleanup move the saved state", async () => {
    const { workload, clock } = setup();
    const id = await workload.deploy(config({ workers: 2 }));

    clock.now = T0 + 2000;
    expect(await workload.stop(id)).toBe(true);
    expect(await workload.stop(id)).toBe(true);
    expect(await workload.getStatus(id)).toMatchObject({ status: "stopped", stoppedAt: "2026-03-01T09:00:02.000Z" });

    clock.now = T0 + 9000;
    const signal = new AbortController().signal;
    expect(await collect(workload.getLogs(id, { follow: true, lines: 100, signal }))).toHaveLength(4);

    expect(await workload.start(id)).toBe(true);
    expect((await workload.getStatus(id)).status).toBe("running");

    const report = await workload.cleanup(id);
    expect(report).toMatchObject({
      deploymentId: id,
      resourcesDeleted: 2,
      resourcesFailed: 0,
      details: ["released worker-0", "released worker-1"],
      errors: [],
    });
    expect((await workload.getStatus(id)).status).toBe("completed");
    expect(await workload.stop(id)).toBe(false);
    expect(await workload.start(id)).toBe(false);
  });

  test("unknown ids raise UnknownDeployment", async () => {
    const { workload } = setup();
    await expect(workload.getStatus("demo-9999")).rejects.toSatisfy((e: unknown) => ErrUnknownDeployment.is(e));
  });
});

describe("DemoWorkload through the orchestrator", () => {
  test("runs the whole lifecycle", async () => {
    const platform = WorkloadPlatform.inMemory();
    const registry = new InMemoryWorkloadRegistry(platform);
    registry.register(DemoWorkloadModule);
    const orchestrator = new Orchestrator(registry, new InMemoryDeploymentStore());

    const { deploymentId } = await orchestrator.deploy("workload-demo", { workloadConfig: { workers: 2 } });
    expect(deploymentId).toMatch(/^demo-[0-9a-f]{8}$/);
    expect((await orchestrator.status(deploymentId)).record).toMatchObject({ status: "running", phase: "emitting" });

    expect(await orchestrator.stop(deploymentId)).toBe(true);
    expect(await orchestrator.start(deploymentId)).toBe(true);

    const outcome = await orchestrator.cleanup(deploymentId);
    expect(outcome.report.resourcesDeleted).toBe(2);
    expect(outcome.record.status).toBe("cleaned");
  });
});
