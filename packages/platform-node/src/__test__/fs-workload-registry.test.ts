import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { cp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import {
  ErrContractViolation,
  ErrInstallFailed,
  ErrUnknownWorkload,
  ErrWorkloadLoadFailed,
  WorkloadPlatform,
  type WorkloadModule,
} from "@drover/workload";
import { StubbedWorkloadModule } from "@drover/workload/testing";
import { FsWorkloadRegistry } from "../services/fs-workload-registry.js";
import { WorkloadInstaller } from "../services/workload-installer.js";
import type { PackageTools } from "../services/package-tools.js";
import type { ModuleLoader } from "../services/module-loader.js";

const INSTALLED_AT = "2026-01-01T00:00:00.000Z";

/** Clones by copying a local fixture; records what it was asked to do */
class FakeTools implements PackageTools {
  cloned: string[] = [];
  dependencyInstalls: string[] = [];
  constructor(private readonly repos: Map<string, string>) {}

  async clone(url: string, destination: string): Promise<void> {
    this.cloned.push(url);
    const fixture = this.repos.get(url);
    if (!fixture) throw new Error(`repository not found: ${url}`);
    await cp(fixture, destination, { recursive: true });
  }

  async installDependencies(directory: string): Promise<void> {
    this.dependencyInstalls.push(directory);
  }
}

let root: string;
let modules: Map<string, unknown>;
let repos: Map<string, string>;
let tools: FakeTools;
let platform: WorkloadPlatform;

/** Entry files hold a key into `modules`, so nothing is really imported */
const loadModule: ModuleLoader = async (file) => {
  const key = (await readFile(file, "utf-8")).trim();
  const namespace = modules.get(key);
  if (namespace === undefined) throw new Error(`cannot import ${file}`);
  return namespace;
};

function writePackage(dir: string, manifest: string, files: Record<string, string> = { "src/index.ts": "telemetry" }): string {
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, "workload.yaml"), manifest);
  for (const [name, content] of Object.entries(files)) {
    mkdirSync(dirname(join(dir, name)), { recursive: true });
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

const TELEMETRY_MANIFEST = [
  "name: telemetry-sim",
  "version: 0.2.0",
  "description: Simulated telemetry",
  "targets:",
  "  - type: azure-tenant",
  "    roles: [Reader]",
].join("\n");

function makeRegistry(builtins: readonly WorkloadModule[] = []): FsWorkloadRegistry {
  const installer = new WorkloadInstaller({
    workloadsDirectory: join(root, "home", "workloads"),
    platform,
    cwd: root,
    tools,
    loadModule,
    now: () => INSTALLED_AT,
  });
  return new FsWorkloadRegistry({ registryPath: join(root, "home", "workloads.json"), platform, installer, builtins });
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "drover-registry-"));
  modules = new Map([["telemetry", { default: StubbedWorkloadModule({ name: "telemetry-sim" }) }]]);
  repos = new Map();
  tools = new FakeTools(repos);
  platform = WorkloadPlatform.inMemory();
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("FsWorkloadRegistry.install from a local path", () => {
  test("registers the manifest's descriptor and persists it", async () => {
    const dir = writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    const registry = makeRegistry();

    const descriptor = await registry.install("./telemetry");

    expect(descriptor).toEqual({
      name: "telemetry-sim",
      version: "0.2.0",
      description: "Simulated telemetry",
      entrypoint: "src/index.ts",
      requiredTargets: [{ targetType: "azure-tenant", requiredRoles: ["Reader"] }],
      source: { kind: "path", location: dir },
      installedAt: INSTALLED_AT,
    });
    expect(await registry.describe("telemetry-sim")).toEqual(descriptor);
    expect((await registry.resolve("telemetry-sim")).name).toBe("telemetry-sim");

    const file: unknown = JSON.parse(readFileSync(join(root, "home", "workloads.json"), "utf-8"));
    expect(file).toEqual({ workloads: { "telemetry-sim": descriptor } });
  });

  test("a fresh registry loads installed workloads from the file", async () => {
    writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    await makeRegistry().install("./telemetry");

    const reopened = makeRegistry();
    expect((await reopened.list()).map((d) => d.name)).toEqual(["telemetry-sim"]);
    expect((await reopened.resolve("telemetry-sim")).name).toBe("telemetry-sim");
  });

  test("list() merges built-ins and installed workloads by name", async () => {
    writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    const registry = makeRegistry([StubbedWorkloadModule({ name: "workload-demo" }), StubbedWorkloadModule({ name: "alpha" })]);
    await registry.install("./telemetry");

    expect((await registry.list()).map((d) => d.name)).toEqual(["alpha", "telemetry-sim", "workload-demo"]);
  });

  test("./bad-package without a resolvable entrypoint fails and changes nothing", async () => {
    writePackage(join(root, "bad-package"), "name: bad-package\nversion: 0.1.0\nentrypoint: src/missing.ts\n");
    const registry = makeRegistry([StubbedWorkloadModule({ name: "workload-demo" })]);

    const err = await registry.install("./bad-package").catch((e: unknown) => e);

    expect(ErrInstallFailed.is(err)).toBe(true);
    if (ErrInstallFailed.is(err)) {
      expect(err.data.source).toBe("./bad-package");
      expect(err.data.reason).toBe(
        `Entrypoint of "bad-package" does not exist: ${join(root, "bad-package", "src", "missing.ts")}`,
      );
    }
    expect((await registry.list()).map((d) => d.name)).toEqual(["workload-demo"]);
    expect(existsSync(join(root, "home", "workloads.json"))).toBe(false);
    const unknown = await registry.describe("bad-package").catch((e: unknown) => e);
    expect(ErrUnknownWorkload.is(unknown)).toBe(true);
  });

  test("a missing directory or manifest is an install failure", async () => {
    const registry = makeRegistry();
    const missing = await registry.install("./nowhere").catch((e: unknown) => e);
    expect(ErrInstallFailed.is(missing)).toBe(true);
    if (ErrInstallFailed.is(missing)) expect(missing.data.reason).toBe(`Not a directory: ${join(root, "nowhere")}`);

    mkdirSync(join(root, "empty"));
    const noManifest = await registry.install("./empty").catch((e: unknown) => e);
    if (!ErrInstallFailed.is(noManifest)) throw new Error("expected install_failed");
    expect(noManifest.data.reason).toBe(`No workload.yaml found in ${join(root, "empty")}`);
  });

  test("the module must declare the manifest's name", async () => {
    writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    modules.set("telemetry", { default: StubbedWorkloadModule({ name: "something-else" }) });

    const err = await makeRegistry().install("./telemetry").catch((e: unknown) => e);
    if (!ErrInstallFailed.is(err)) throw new Error("expected install_failed");
    expect(err.data.reason).toBe('module declares name "something-else" but workload.yaml says "telemetry-sim"');
  });

  test("the export must be a workload module whose instances satisfy the contract", async () => {
    writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    modules.set("telemetry", { default: { name: "telemetry-sim" } });
    const notAModule = await makeRegistry().install("./telemetry").catch((e: unknown) => e);
    if (!ErrInstallFailed.is(notAModule)) throw new Error("expected install_failed");
    expect(notAModule.data.reason).toBe(
      `Export "default" of ${join(root, "telemetry", "src", "index.ts")} is not a workload module`,
    );

    modules.set("telemetry", { default: { name: "telemetry-sim", version: "0.2.0", create: () => ({ deploy: () => "x" }) } });
    const broken = await makeRegistry().install("./telemetry").catch((e: unknown) => e);
    if (!ErrInstallFailed.is(broken)) throw new Error("expected install_failed");
    expect(ErrContractViolation.is(broken.cause)).toBe(true);
  });

  test("a built-in name cannot be installed over", async () => {
    writePackage(join(root, "impostor"), "name: workload-demo\nversion: 9.9.9\n");
    const registry = makeRegistry([StubbedWorkloadModule({ name: "workload-demo" })]);

    const err = await registry.install("./impostor").catch((e: unknown) => e);
    if (!ErrInstallFailed.is(err)) throw new Error("expected install_failed");
    expect(err.data.reason).toBe('name "workload-demo" collides with a built-in workload');
    expect((await registry.describe("workload-demo")).version).toBe("1.0.0");
  });

  test("re-installing a name replaces the descriptor", async () => {
    writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    const registry = makeRegistry();
    await registry.install("./telemetry");

    writeFileSync(join(root, "telemetry", "workload.yaml"), TELEMETRY_MANIFEST.replace("0.2.0", "0.3.0"));
    await registry.install("./telemetry");

    expect((await registry.list()).map((d) => `${d.name}@${d.version}`)).toEqual(["telemetry-sim@0.3.0"]);
  });

  test("dependencies are installed when the package has a package.json but no node_modules", async () => {
    const dir = writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST, {
      "src/index.ts": "telemetry",
      "package.json": "{}",
    });
    const registry = makeRegistry();
    await registry.install("./telemetry");
    expect(tools.dependencyInstalls).toEqual([dir]);

    mkdirSync(join(dir, "node_modules"));
    await registry.install("./telemetry");
    expect(tools.dependencyInstalls).toEqual([dir]);
  });

  test("an installed workload whose package vanished fails to resolve, not to list", async () => {
    writePackage(join(root, "telemetry"), TELEMETRY_MANIFEST);
    await makeRegistry().install("./telemetry");
    rmSync(join(root, "telemetry"), { recursive: true });

    const reopened = makeRegistry();
    expect((await reopened.list()).map((d) => d.name)).toEqual(["telemetry-sim"]);
    const err = await reopened.resolve("telemetry-sim").catch((e: unknown) => e);
    expect(ErrWorkloadLoadFailed.is(err)).toBe(true);
  });
});

describe("FsWorkloadRegistry.install from git", () => {
  const url = "https://git.example.test/acme/telemetry-sim.git";

  test("clones, then moves the package under the workloads directory", async () => {
    repos.set(url, writePackage(join(root, "fixtures", "telemetry"), TELEMETRY_MANIFEST));
    const registry = makeRegistry();

    const descriptor = await registry.install(url);

    expect(tools.cloned).toEqual([url]);
    expect(descriptor.source).toEqual({ kind: "git", location: url });
    expect(readdirSync(join(root, "home", "workloads"))).toEqual(["telemetry-sim"]);
    expect(existsSync(join(root, "home", "workloads", "telemetry-sim", "workload.yaml"))).toBe(true);

    const reopened = makeRegistry();
    expect((await reopened.resolve("telemetry-sim")).name).toBe("telemetry-sim");
  });

  test("an unreachable repository is an install failure", async () => {
    const err = await makeRegistry().install(url).catch((e: unknown) => e);
    if (!ErrInstallFailed.is(err)) throw new Error("expected install_failed");
    expect(err.data.reason).toBe(`repository not found: ${url}`);
  });

  test("a rejected clone leaves no staging directory behind", async () => {
    repos.set(url, writePackage(join(root, "fixtures", "impostor"), "name: workload-demo\nversion: 1.0.0\n"));
    const registry = makeRegistry([StubbedWorkloadModule({ name: "workload-demo" })]);

    const err = await registry.install(url).catch((e: unknown) => e);
    expect(ErrInstallFailed.is(err)).toBe(true);
    expect(readdirSync(join(root, "home", "workloads"))).toEqual([]);
  });
});
