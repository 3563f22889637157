import { Printer } from '@drover/core'
import { WorkloadDescriptor } from '@drover/workload'

export const WorkloadListText = Printer.define<WorkloadDescriptor[]>((workloads, fmt) => {
  if (workloads.length === 0) {
    return Printer.lines(['No workloads installed.', 'Install a workload with: drover workload install <source>'])
  }
  return Printer.table(
    ['Name', 'Version', 'Source', 'Description'],
    workloads.map((w) => [w.name, w.version, WorkloadDescriptor.sourceLabel(w.source), w.description]),
    fmt,
  )
})

export const WorkloadInfoText = Printer.define<WorkloadDescriptor>((w, fmt) => {
  const lines = [
    `Workload: ${fmt.bold(w.name)}`,
    `  Version:     ${w.version}`,
    `  Description: ${w.description || fmt.dim('(none)')}`,
    `  Source:      ${WorkloadDescriptor.sourceLabel(w.source)}`,
    `  Entrypoint:  ${w.entrypoint}`,
  ]
  if (w.installedAt) lines.push(`  Installed:   ${w.installedAt}`)
  if (w.requiredTargets.length > 0) {
    lines.push('  Targets:')
    for (const t of w.requiredTargets) {
      const roles = t.requiredRoles.length > 0 ? ` (${t.requiredRoles.join(', ')})` : ''
      lines.push(`    - ${t.targetType}${roles}`)
    }
  }
  return Printer.lines(lines)
})
