/**
 * Deterministic telemetry lines. The same deployment and index always give
 * the same line, so history can be recomputed instead of stored.
 */

import type { DemoConfig } from "./config.js";

/** FNV-1a */
export function seedOf(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** 0.0 to 99.9 */
export function sampleValue(seed: number, index: number): number {
  const mixed = Math.imul(seed ^ index, 0x9e3779b1) >>> 0;
  return (mixed % 1000) / 10;
}

export function telemetryLine(seed: number, index: number, at: Date, config: DemoConfig): string {
  const worker = index % config.workers;
  const signal = config.signals[index % config.signals.length] ?? "cpu";
  return `${at.toISOString()} worker-${worker} ${signal}=${sampleValue(seed, index).toFixed(1)}`;
}

/** Lines emitted between two instants: every emitter ticks once per interval */
export function linesBetween(fromMs: number, toMs: number, config: DemoConfig): number {
  if (toMs <= fromMs) return 0;
  return Math.floor((toMs - fromMs) / config.intervalMs) * config.workers;
}

/** When line `index` was emitted */
export function emittedAt(startedMs: number, index: number, config: DemoConfig): Date {
  return new Date(startedMs + (Math.floor(index / config.workers) + 1) * config.intervalMs);
}
