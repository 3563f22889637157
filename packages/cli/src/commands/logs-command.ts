import { DEFAULT_LOG_LINES } from '@drover/deployment'
import { LazyX } from '@drover/core'
import { argument, command, constant, flag, option } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { withDefault } from '@optique/core/modifiers'
import { integer, string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'

export class CmdLogs implements Command {
  readonly name = 'logs'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'logs',
    object({
      cmd: constant('logs'),
      id: argument(string({ metavar: 'ID' }), { description: message`Deployment id` }),
      follow: withDefault(flag('-f', '--follow', { description: message`Keep streaming new lines until interrupted` }), false),
      lines: withDefault(option('-n', '--lines', integer({ min: 0 }), {
        description: message`Number of recent lines to show`,
      }), DEFAULT_LOG_LINES),
    }),
    { description: message`Show a deployment's logs` },
  ))

  /** Lines are written as they arrive; the returned text is empty */
  async run(args: Inferred<this>, opts: CommandOptions) {
    const stream = await this.services.orchestrator.logs(args.id, {
      follow: args.follow,
      lines: args.lines,
      signal: args.follow ? opts.interruptible() : undefined,
    })
    for await (const line of stream) {
      opts.write(line.replace(/\s+$/, '') + '\n')
    }
    return ''
  }
}
