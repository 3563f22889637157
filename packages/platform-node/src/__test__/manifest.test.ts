import { describe, test, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Entrypoint, WorkloadManifest } from "../manifest.js";
import { ErrManifestInvalid, ErrManifestNotFound } from "../errors/errors.js";

describe("WorkloadManifest.parse", () => {
  test("reads every field", () => {
    const manifest = WorkloadManifest.parse(
      [
        "name: telemetry-sim",
        "version: 0.2.0",
        "description: Simulated telemetry",
        "entrypoint: dist/main.js#telemetry",
        "targets:",
        "  - type: azure-tenant",
        "    roles: [Reader, Contributor]",
      ].join("\n"),
      "workload.yaml",
    );

    expect(manifest).toEqual({
      name: "telemetry-sim",
      version: "0.2.0",
      description: "Simulated telemetry",
      entrypoint: { modulePath: "dist/main.js", exportName: "telemetry" },
      targets: [{ targetType: "azure-tenant", requiredRoles: ["Reader", "Contributor"] }],
    });
  });

  test("fills in defaults", () => {
    const manifest = WorkloadManifest.parse("name: telemetry-sim\nversion: 1\n", "workload.yaml");
    expect(manifest.version).toBe("1");
    expect(manifest.description).toBe("");
    expect(manifest.entrypoint).toEqual({ modulePath: "src/index.ts", exportName: "default" });
    expect(manifest.targets).toEqual([]);
  });

  test("lists every problem", () => {
    const err = (() => {
      try {
        WorkloadManifest.parse("description: no name\n", "pkg/workload.yaml");
      } catch (e) {
        return e;
      }
    })();
    expect(ErrManifestInvalid.is(err)).toBe(true);
    if (ErrManifestInvalid.is(err)) {
      expect(err.data.path).toBe("pkg/workload.yaml");
      expect(err.data.problems).toEqual(["name: Required", "version: Required"]);
    }
  });

  test("rejects names that are unsafe as directory names", () => {
    expect(() => WorkloadManifest.parse("name: ../escape\nversion: 1\n", "workload.yaml")).toThrow(
      "name must be lower-case letters",
    );
  });

  test("rejects entrypoints outside the package", () => {
    expect(() => WorkloadManifest.parse("name: w\nversion: 1\nentrypoint: ../other/index.ts\n", "workload.yaml")).toThrow(
      'entrypoint: "../other/index.ts" must be a relative path inside the package',
    );
    expect(() => WorkloadManifest.parse("name: w\nversion: 1\nentrypoint: /abs/index.ts\n", "workload.yaml")).toThrow(
      ErrManifestInvalid.create({ path: "workload.yaml", problems: [] }).message,
    );
  });

  test("an empty file is invalid, not a crash", () => {
    expect(() => WorkloadManifest.parse("", "workload.yaml")).toThrow("name: Required");
  });
});

describe("Entrypoint", () => {
  test("parse and format round the export name", () => {
    expect(Entrypoint.parse("src/index.ts")).toEqual({ modulePath: "src/index.ts", exportName: "default" });
    expect(Entrypoint.format({ modulePath: "src/index.ts", exportName: "default" })).toBe("src/index.ts");
    expect(Entrypoint.format({ modulePath: "lib/w.js", exportName: "demo" })).toBe("lib/w.js#demo");
  });

  test("rejects empty parts and URLs", () => {
    expect(Entrypoint.parse("#default")).toBeUndefined();
    expect(Entrypoint.parse("src/index.ts#")).toBeUndefined();
    expect(Entrypoint.parse("https://example.com/w.js")).toBeUndefined();
  });
});

describe("WorkloadManifest.read", () => {
  const dirs: string[] = [];
  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  test("reads workload.yaml from a directory", async () => {
    const dir = mkdtempSync(join(tmpdir(), "drover-manifest-"));
    dirs.push(dir);
    writeFileSync(join(dir, "workload.yaml"), "name: telemetry-sim\nversion: 0.2.0\n");
    expect((await WorkloadManifest.read(dir)).name).toBe("telemetry-sim");
  });

  test("a directory without a manifest raises manifest_not_found", async () => {
    const dir = mkdtempSync(join(tmpdir(), "drover-manifest-"));
    dirs.push(dir);
    const err = await WorkloadManifest.read(dir).catch((e: unknown) => e);
    expect(ErrManifestNotFound.is(err)).toBe(true);
  });
});
