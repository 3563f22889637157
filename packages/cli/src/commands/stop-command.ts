import { LazyX } from '@drover/core'
import { argument, command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'
import { yesOption } from '../parsers/standard-opts.js'
import { confirm } from '../prompter.js'

export class CmdStop implements Command {
  readonly name = 'stop'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'stop',
    object({
      cmd: constant('stop'),
      id: argument(string({ metavar: 'ID' }), { description: message`Deployment id` }),
      yes: yesOption,
    }),
    { description: message`Stop a running deployment` },
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    if (!args.yes && !(await confirm(opts.prompter, `Stop deployment ${args.id}?`))) {
      return 'Aborted.'
    }
    const stopped = await this.services.orchestrator.stop(args.id)
    return stopped
      ? `Deployment ${args.id} stopped.`
      : `Deployment ${args.id} is not running; nothing to stop.`
  }
}
