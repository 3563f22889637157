/**
 * workload list | install <source> | info <name>
 */

import { LazyX } from '@drover/core'
import { WorkloadDescriptor } from '@drover/workload'
import { argument, command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'
import { WorkloadInfoText, WorkloadListText } from '../printers/workload-printers.js'

export class CmdWorkloadList implements Command {
  readonly name = 'workload list'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'list',
    object({ cmd: constant('workload-list') }),
    { description: message`List built-in and installed workloads` },
  ))

  async run(_args: Inferred<this>, opts: CommandOptions) {
    const workloads = await this.services.orchestrator.workloads()
    return this.services.getPrintFormatter(opts.color).print(WorkloadListText, workloads)
  }
}

export class CmdWorkloadInstall implements Command {
  readonly name = 'workload install'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'install',
    object({
      cmd: constant('workload-install'),
      source: argument(string({ metavar: 'SOURCE' }), { description: message`Git URL or local path` }),
    }),
    { description: message`Install a workload from a git URL or local path` },
  ))

  async run(args: Inferred<this>) {
    const descriptor = await this.services.orchestrator.installWorkload(args.source)
    return `Workload "${descriptor.name}" ${descriptor.version} installed from ${WorkloadDescriptor.sourceLabel(descriptor.source)}.`
  }
}

export class CmdWorkloadInfo implements Command {
  readonly name = 'workload info'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'info',
    object({
      cmd: constant('workload-info'),
      workload: argument(string({ metavar: 'NAME' }), { description: message`Workload name` }),
    }),
    { description: message`Show a workload's metadata` },
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const descriptor = await this.services.orchestrator.describeWorkload(args.workload)
    return this.services.getPrintFormatter(opts.color).print(WorkloadInfoText, descriptor)
  }
}
