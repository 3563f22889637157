/**
 * Demo workload config - read from DeploymentConfig.workloadConfig.
 */

import type { WorkloadConfig } from "@drover/workload";

export interface DemoConfig {
  /** Simulated emitters, 1-100 */
  readonly workers: number;
  /** Time between lines of one emitter */
  readonly intervalMs: number;
  readonly signals: readonly DemoSignal[];
}

export const DEMO_SIGNALS = ["cpu", "memory", "disk", "network"] as const;
export type DemoSignal = (typeof DEMO_SIGNALS)[number];

export const DEFAULT_DEMO_CONFIG: DemoConfig = {
  workers: 2,
  intervalMs: 1000,
  signals: DEMO_SIGNALS,
};

const MAX_WORKERS = 100;
const KNOWN_KEYS = new Set(["workers", "intervalMs", "signals"]);

function isDemoSignal(value: string): value is DemoSignal {
  return DEMO_SIGNALS.some((s) => s === value);
}

/** Problems with the config; empty when it is usable */
export function validateDemoConfig(config: Readonly<WorkloadConfig>): string[] {
  const errors: string[] = [];
  for (const key of Object.keys(config)) {
    if (!KNOWN_KEYS.has(key)) errors.push(`unknown config key "${key}"`);
  }

  const { workers, intervalMs, signals } = config;
  if (workers !== undefined && (typeof workers !== "number" || !Number.isInteger(workers) || workers < 1)) {
    errors.push(`workers must be a positive integer (got ${String(workers)})`);
  } else if (typeof workers === "number" && workers > MAX_WORKERS) {
    errors.push(`workers must be at most ${MAX_WORKERS}`);
  }
  if (intervalMs !== undefined && (typeof intervalMs !== "number" || intervalMs <= 0)) {
    errors.push(`intervalMs must be a positive number (got ${String(intervalMs)})`);
  }
  if (signals !== undefined) {
    const unknown = String(signals).split(",").map((s) => s.trim()).filter((s) => !isDemoSignal(s));
    if (unknown.length > 0) {
      errors.push(`unknown signals: ${unknown.join(", ")} (expected ${DEMO_SIGNALS.join(", ")})`);
    }
  }
  return errors;
}

/** Apply defaults. Assumes validateDemoConfig found nothing */
export function readDemoConfig(config: Readonly<WorkloadConfig>): DemoConfig {
  const { workers, intervalMs, signals } = config;
  return {
    workers: typeof workers === "number" ? workers : DEFAULT_DEMO_CONFIG.workers,
    intervalMs: typeof intervalMs === "number" ? intervalMs : DEFAULT_DEMO_CONFIG.intervalMs,
    signals:
      signals === undefined
        ? DEFAULT_DEMO_CONFIG.signals
        : String(signals).split(",").map((s) => s.trim()).filter(isDemoSignal),
  };
}
