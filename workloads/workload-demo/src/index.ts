/**
 * @drover/workload-demo - a workload that simulates telemetry emitters.
 */

import { WorkloadModule } from "@drover/workload";
import { DEMO_WORKLOAD_NAME, DemoWorkload } from "./demo-workload.js";

export { DemoWorkload, DEMO_WORKLOAD_NAME } from "./demo-workload.js";
export type { DemoWorkloadOptions } from "./demo-workload.js";
export { validateDemoConfig, readDemoConfig, DEMO_SIGNALS, DEFAULT_DEMO_CONFIG } from "./config.js";
export type { DemoConfig, DemoSignal } from "./config.js";

// ============================================================================
// WorkloadModule (default export)
// ============================================================================

const DemoWorkloadModule = WorkloadModule.define({
  name: DEMO_WORKLOAD_NAME,
  version: "0.1.0",
  description: "Simulated telemetry emitters; provisions nothing real",
  requiredTargets: [{ targetType: "local", requiredRoles: [] }],
  create: (platform) => new DemoWorkload(platform),
});

export default DemoWorkloadModule;
