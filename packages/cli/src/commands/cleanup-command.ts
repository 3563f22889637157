import { LazyX } from '@drover/core'
import { argument, command, constant, flag } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { withDefault } from '@optique/core/modifiers'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'
import { yesOption } from '../parsers/standard-opts.js'
import { CleanupText } from '../printers/deployment-printers.js'
import { confirm } from '../prompter.js'

export class CmdCleanup implements Command {
  readonly name = 'cleanup'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'cleanup',
    object({
      cmd: constant('cleanup'),
      id: argument(string({ metavar: 'ID' }), { description: message`Deployment id` }),
      yes: yesOption,
      dryRun: withDefault(flag('--dry-run', { description: message`Show what would be cleaned up` }), false),
    }),
    { description: message`Delete a deployment's resources. Cannot be undone` },
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const orchestrator = this.services.orchestrator
    const printer = this.services.getPrintFormatter(opts.color)

    if (args.dryRun) {
      return printer.print(CleanupText, await orchestrator.cleanup(args.id, { dryRun: true }))
    }

    if (!args.yes) {
      opts.prompter.write(`This will delete all resources for deployment: ${args.id}\n`)
      if (!(await confirm(opts.prompter, 'Are you sure?'))) return 'Aborted.'
    }
    return printer.print(CleanupText, await orchestrator.cleanup(args.id))
  }
}
