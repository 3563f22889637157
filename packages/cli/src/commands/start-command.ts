import { LazyX } from '@drover/core'
import { argument, command, constant } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdStart implements Command {
  readonly name = 'start'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'start',
    object({
      cmd: constant('start'),
      id: argument(string({ metavar: 'ID' }), { description: message`Deployment id` }),
    }),
    { description: message`Resume a stopped deployment` },
  ))

  async run(args: Inferred<this>) {
    const started = await this.services.orchestrator.start(args.id)
    return started ? `Deployment ${args.id} started.` : `Deployment ${args.id} is already running.`
  }
}
