import { LazyX } from '@drover/core'
import { argument, command, constant, option } from '@optique/core/primitives'
import { object } from '@optique/core/constructs'
import { multiple, optional } from '@optique/core/modifiers'
import { integer, string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { Command, Inferred, CommandOptions } from '../command.js'
import type { CliServices } from '../cli-services.js'
import { configPair, tagPair, toRecord } from '../parsers/key-value.js'
import { yesOption } from '../parsers/standard-opts.js'
import { confirm } from '../prompter.js'

export class CmdDeploy implements Command {
  readonly name = 'deploy'

  constructor(private services: CliServices) {}

  parser = LazyX.once(() => command(
    'deploy',
    object({
      cmd: constant('deploy'),
      workload: argument(string({ metavar: 'NAME' }), { description: message`Workload to deploy` }),
      duration: optional(option('-d', '--duration', integer({ min: 1 }), {
        description: message`Run length in hours (advisory; default: indefinite)`,
      })),
      tags: multiple(option('-t', '--tag', tagPair(), { description: message`Tag as key=value (repeatable)` })),
      config: multiple(option('-c', '--config', configPair(), {
        description: message`Workload config as key=value (repeatable)`,
      })),
      yes: yesOption,
    }),
    { description: message`Deploy a workload` },
  ))

  async run(args: Inferred<this>, opts: CommandOptions) {
    const workloadConfig = toRecord(args.config)

    if (!args.yes) {
      const preview = [`Deploying workload: ${args.workload}`]
      if (args.config.length > 0) {
        preview.push('Configuration:')
        for (const [key, value] of Object.entries(workloadConfig)) preview.push(`  ${key}: ${String(value)}`)
      }
      opts.prompter.write(preview.join('\n') + '\n')
      if (!(await confirm(opts.prompter, 'Proceed?'))) return 'Aborted.'
    }

    const { deploymentId } = await this.services.orchestrator.deploy(args.workload, {
      durationHours: args.duration,
      tags: toRecord(args.tags),
      workloadConfig,
    })
    return `Deployment started: ${deploymentId}`
  }
}
