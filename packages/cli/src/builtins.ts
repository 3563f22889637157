import type { WorkloadModule } from '@drover/workload'
import DemoWorkloadModule from '@drover/workload-demo'

/** Workloads that ship with the CLI and need no install */
export const builtinWorkloads: readonly WorkloadModule[] = [DemoWorkloadModule]
