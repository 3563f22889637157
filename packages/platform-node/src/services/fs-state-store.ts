/**
 * FsWorkloadStateStore - one JSON file per deployment under the state directory.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { DroverError, getLogger } from "@drover/core";
import { DeploymentId, DeploymentState, type WorkloadStateStore } from "@drover/workload";
import { ErrCorruptFile } from "../errors/errors.js";
import { isMissing } from "../manifest.js";

const log = getLogger("platform:state");

const StateFile = z.object({
  deploymentId: z.string(),
  workloadName: z.string(),
  status: z.enum(DeploymentState.statuses),
  phase: z.string(),
  startedAt: z.string().optional(),
  stoppedAt: z.string().optional(),
  completedAt: z.string().optional(),
  config: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
  metadata: z.record(z.string(), z.unknown()),
  error: z.string().optional(),
});

export class FsWorkloadStateStore implements WorkloadStateStore {
  constructor(private readonly stateDirectory: string) {}

  async save(state: DeploymentState): Promise<void> {
    const file = this.fileFor(state.deploymentId);
    await fs.mkdir(this.stateDirectory, { recursive: true });
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 2) + "\n");
    await fs.rename(tmp, file);
    log.debug("saved state to %s", file);
  }

  async load(deploymentId: string): Promise<DeploymentState | undefined> {
    const file = this.fileFor(deploymentId);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
    return parseState(raw, file);
  }

  /** Unreadable files are skipped with a warning */
  async list(workloadName: string): Promise<DeploymentState[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.stateDirectory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const states: DeploymentState[] = [];
    for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
      const file = path.join(this.stateDirectory, name);
      try {
        const state = parseState(await fs.readFile(file, "utf-8"), file);
        if (state.workloadName === workloadName) states.push(state);
      } catch (err) {
        log.warn("skipping %s: %s", file, DroverError.messageOf(err));
      }
    }
    return states;
  }

  private fileFor(deploymentId: string): string {
    return path.join(this.stateDirectory, `${DeploymentId.assertSafe(deploymentId)}.json`);
  }
}

function parseState(raw: string, file: string): DeploymentState {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw ErrCorruptFile.create({ path: file }, DroverError.messageOf(err));
  }
  const parsed = StateFile.safeParse(json);
  if (!parsed.success) {
    throw ErrCorruptFile.create({ path: file }, parsed.error.issues[0]?.message);
  }
  return parsed.data;
}
