import { Printer, type Fmt } from '@drover/core'
import {
  DeploymentRecord,
  type CleanupOutcome,
  type DeploymentStatus,
  type StatusReport,
} from '@drover/deployment'

function statusColor(status: DeploymentStatus, fmt: Fmt): string {
  switch (status) {
    case 'running':
      return fmt.green(status)
    case 'failed':
      return fmt.red(status)
    case 'stopping':
    case 'stopped':
    case 'cleaning':
      return fmt.yellow(status)
    default:
      return fmt.dim(status)
  }
}

const json = (value: unknown) => JSON.stringify(value, null, 2)

// ============================================================================
// status
// ============================================================================

export const StatusText = Printer.define<StatusReport>(({ record, stale, staleReason, live }, fmt) => {
  const lines = [
    `Deployment: ${fmt.bold(DeploymentRecord.canonicalId(record))}`,
    `  Record:   ${record.deploymentId}`,
    `  Workload: ${record.workloadName}`,
    `  Status:   ${statusColor(record.status, fmt)}`,
    `  Phase:    ${record.phase}`,
    `  Created:  ${record.createdAt}`,
    `  Updated:  ${record.updatedAt}`,
  ]
  if (live?.startedAt) lines.push(`  Started:  ${live.startedAt}`)
  if (record.error) lines.push(`  Error:    ${fmt.red(record.error)}`)
  if (stale) lines.push(fmt.yellow(`  (stale: ${staleReason ?? 'workload unavailable'})`))
  return Printer.lines(lines)
})

export const StatusJson = Printer.define<StatusReport>((report) =>
  json({ ...report.record, live: report.live ?? null, stale: report.stale, staleReason: report.staleReason ?? null }),
)

// ============================================================================
// list
// ============================================================================

export const DeploymentListText = Printer.define<DeploymentRecord[]>((records, fmt) => {
  if (records.length === 0) return 'No deployments found.'
  return Printer.table(
    ['ID', 'Workload', 'Status', 'Phase'],
    records.map((r) => [DeploymentRecord.canonicalId(r), r.workloadName, r.status, r.phase]),
    fmt,
  )
})

export const DeploymentListJson = Printer.define<DeploymentRecord[]>((records) => json(records))

// ============================================================================
// cleanup
// ============================================================================

export const CleanupText = Printer.define<CleanupOutcome>(({ dryRun, record, report, allowed }, fmt) => {
  const id = DeploymentRecord.canonicalId(record)
  if (dryRun) {
    const lines = [
      `Would clean up deployment: ${id}`,
      `  Workload: ${record.workloadName}`,
      `  Status:   ${statusColor(record.status, fmt)}`,
    ]
    if (!allowed) lines.push(fmt.yellow(`  Cleanup is not possible from status ${record.status}`))
    lines.push('(Dry run - no changes made)')
    return Printer.lines(lines)
  }

  const lines = [`Cleanup complete for ${id}`, `  Resources deleted: ${report.resourcesDeleted}`]
  if (report.resourcesFailed > 0) lines.push(`  Resources failed:  ${report.resourcesFailed}`)
  for (const detail of report.details) lines.push(fmt.dim(`  ${detail}`))
  if (report.errors.length > 0) {
    lines.push('  Errors:')
    for (const err of report.errors) lines.push(fmt.red(`    - ${err}`))
  }
  return Printer.lines(lines)
})
