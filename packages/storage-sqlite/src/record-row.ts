/**
 * Mapping between DeploymentRecord and its row in the deployments table.
 */

import { z } from "zod";
import { DroverError } from "@drover/core";
import { DeploymentRecord, DeploymentStatus, type RecordedConfig } from "@drover/deployment";
import { ErrCorruptRecord } from "./errors.js";

export interface DeploymentRow {
  deployment_id: string;
  workload_ref: string | null;
  workload_name: string;
  status: string;
  phase: string;
  tags: string;
  config: string;
  error: string | null;
  revision: number;
  created_at: string;
  updated_at: string;
}

const TagsColumn = z.record(z.string(), z.string());

const ConfigColumn = z.object({
  durationHours: z.number().int().positive().optional(),
  workloadConfig: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
});

export function toRow(record: DeploymentRecord): DeploymentRow {
  return {
    deployment_id: record.deploymentId,
    workload_ref: record.workloadRef,
    workload_name: record.workloadName,
    status: record.status,
    phase: record.phase,
    tags: JSON.stringify(record.tags),
    config: JSON.stringify(record.config),
    error: record.error,
    revision: record.revision,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

export function fromRow(row: DeploymentRow): DeploymentRecord {
  const status = row.status;
  if (!DeploymentStatus.is(status)) {
    throw ErrCorruptRecord.create({ deploymentId: row.deployment_id, column: "status" }, `unknown status "${status}"`);
  }
  return {
    deploymentId: row.deployment_id,
    workloadRef: row.workload_ref,
    workloadName: row.workload_name,
    status,
    phase: row.phase,
    tags: parseJsonColumn(row, "tags", TagsColumn),
    config: parseJsonColumn<RecordedConfig>(row, "config", ConfigColumn),
    error: row.error,
    revision: row.revision,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseJsonColumn<T>(row: DeploymentRow, column: "tags" | "config", schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(row[column]);
  } catch (err) {
    throw ErrCorruptRecord.create({ deploymentId: row.deployment_id, column }, DroverError.messageOf(err));
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw ErrCorruptRecord.create({ deploymentId: row.deployment_id, column }, parsed.error.issues[0]?.message);
  }
  return parsed.data;
}
