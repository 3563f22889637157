import { LazyX } from '@drover/core'
import { argument, command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'
import { formatOption } from '../parsers/standard-opts.js'
import { StatusJson, StatusText } from '../printers/deployment-printers.js'

export class CmdStatus implements Command {
  readonly name = 'status'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'status',
    object({
      cmd: constant('status'),
      id: argument(string({ metavar: 'ID' }), { description: message`Deployment id` }),
      format: formatOption,
    }),
    { description: message`Show a deployment's status` },
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const report = await this.services.orchestrator.status(args.id)
    return this.services.printAs(args.format, { text: StatusText, json: StatusJson }, report, opts.color)
  }
}
