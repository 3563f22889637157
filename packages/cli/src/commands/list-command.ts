import { DEFAULT_LIST_LIMIT, DeploymentStatus } from '@drover/deployment'
import { LazyX } from '@drover/core'
import { command, constant, option } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { optional, withDefault } from '@optique/core/modifiers'
import { choice, integer, string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'
import { formatOption } from '../parsers/standard-opts.js'
import { DeploymentListJson, DeploymentListText } from '../printers/deployment-printers.js'

export class CmdList implements Command {
  readonly name = 'list'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'list',
    object({
      cmd: constant('list'),
      workload: optional(option('-w', '--workload', string({ metavar: 'NAME' }), {
        description: message`Only this workload's deployments`,
      })),
      status: optional(option('-s', '--status', choice(DeploymentStatus.all), {
        description: message`Only deployments in this status`,
      })),
      limit: withDefault(option('-l', '--limit', integer({ min: 1 }), {
        description: message`Maximum results`,
      }), DEFAULT_LIST_LIMIT),
      format: formatOption,
    }),
    { description: message`List deployments, newest first` },
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const records = await this.services.orchestrator.list(
      { workloadName: args.workload, status: args.status },
      args.limit,
    )
    return this.services.printAs(args.format, { text: DeploymentListText, json: DeploymentListJson }, records, opts.color)
  }
}
