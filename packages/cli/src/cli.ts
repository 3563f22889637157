/**
 * CLI - the dispatch engine.
 *
 * Parses argv with one optique parser tree and routes the result to the
 * command whose `cmd` constant matched. The harness (process argv, signals,
 * exit codes) lives in main.ts; this file has no process-level side effects.
 */

import { DroverError, LazyX } from '@drover/core'
import type { Orchestrator } from '@drover/deployment'
import { GlobalConfig, NodePlatform, type NodePlatformOptions } from '@drover/platform-node'
import { or } from '@optique/core/constructs'
import { command } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import type { InferValue } from '@optique/core/parser'

import type { CliRequest, CliResponse } from './types.js'
import { parseAndValidateArgs } from './argv-parser.js'
import { DirectPrompter, type Prompter } from './prompter.js'
import { CliServices } from './cli-services.js'
import type { CommandOptions } from './command.js'
import { ErrUnknownCommand } from './errors.js'
import { builtinWorkloads } from './builtins.js'
import type { Interrupt } from './interrupt.js'

import { CmdDeploy } from './commands/deploy-command.js'
import { CmdStatus } from './commands/status-command.js'
import { CmdList } from './commands/list-command.js'
import { CmdLogs } from './commands/logs-command.js'
import { CmdStop } from './commands/stop-command.js'
import { CmdStart } from './commands/start-command.js'
import { CmdCleanup } from './commands/cleanup-command.js'
import { CmdWorkloadInfo, CmdWorkloadInstall, CmdWorkloadList } from './commands/workload-command.js'

export const PROGRAM_NAME = 'drover'

class Commands {
  readonly deploy: CmdDeploy
  readonly status: CmdStatus
  readonly list: CmdList
  readonly logs: CmdLogs
  readonly stop: CmdStop
  readonly start: CmdStart
  readonly cleanup: CmdCleanup
  readonly workloadList: CmdWorkloadList
  readonly workloadInstall: CmdWorkloadInstall
  readonly workloadInfo: CmdWorkloadInfo

  constructor(services: CliServices) {
    this.deploy = new CmdDeploy(services)
    this.status = new CmdStatus(services)
    this.list = new CmdList(services)
    this.logs = new CmdLogs(services)
    this.stop = new CmdStop(services)
    this.start = new CmdStart(services)
    this.cleanup = new CmdCleanup(services)
    this.workloadList = new CmdWorkloadList(services)
    this.workloadInstall = new CmdWorkloadInstall(services)
    this.workloadInfo = new CmdWorkloadInfo(services)
  }

  program = LazyX.once(() => or(
    this.deploy.parser.get,
    this.status.parser.get,
    this.list.parser.get,
    this.logs.parser.get,
    this.stop.parser.get,
    this.start.parser.get,
    this.cleanup.parser.get,
    command(
      'workload',
      or(this.workloadList.parser.get, this.workloadInstall.parser.get, this.workloadInfo.parser.get),
      { description: message`Manage workloads` },
    ),
  ))
}

type ParsedArgs = InferValue<Commands['program']['get']>

export interface CliOptions {
  /** Pre-built orchestrator; skips opening the local platform. Used for testing. */
  orchestrator?: Orchestrator
  /** Passed to NodePlatform.create when the CLI opens the local platform */
  platform?: NodePlatformOptions
}

export interface ExecuteOptions {
  prompter?: Prompter
  /** Where streaming commands write. Defaults to stdout */
  write?: (text: string) => void
  /** Streaming commands claim it; without one they run until their source ends */
  interrupt?: Interrupt
}

export class CLI {
  constructor(
    public cfg: GlobalConfig,
    private opts: CliOptions = {},
  ) {}

  async execute(req: CliRequest, exec: ExecuteOptions = {}): Promise<CliResponse> {
    const color = req.color ?? this.cfg.useColor

    // The platform is opened on first use and closed when the request is done
    let platform: NodePlatform | undefined
    const services = new CliServices(() => {
      if (this.opts.orchestrator) return this.opts.orchestrator
      platform ??= NodePlatform.create(this.cfg, { builtins: builtinWorkloads, ...this.opts.platform })
      return platform.orchestrator
    })
    const commands = new Commands(services)

    const parsed = await parseAndValidateArgs(commands.program.get, PROGRAM_NAME, req.argv, color)
    if (!parsed.ok) return parsed.response

    const prompter = exec.prompter ?? new DirectPrompter()
    const opts: CommandOptions = {
      color,
      prompter,
      write: exec.write ?? ((text) => process.stdout.write(text)),
      interruptible: () => exec.interrupt?.claim() ?? new AbortController().signal,
    }

    try {
      const output = await this.dispatch(commands, parsed.value, opts)
      return { exitCode: 0, stdout: output ? output + '\n' : undefined }
    } catch (e) {
      return { exitCode: 1, stderr: DroverError.wrap(e).prettyPrint({ color }) + '\n' }
    } finally {
      if (!exec.prompter) prompter.close()
      platform?.close()
    }
  }

  private dispatch(
    commands: Commands,
    args: ParsedArgs,
    opts: CommandOptions,
  ): Promise<string> {
    switch (args.cmd) {
      case 'deploy': return commands.deploy.run(args, opts)
      case 'status': return commands.status.run(args, opts)
      case 'list': return commands.list.run(args, opts)
      case 'logs': return commands.logs.run(args, opts)
      case 'stop': return commands.stop.run(args, opts)
      case 'start': return commands.start.run(args)
      case 'cleanup': return commands.cleanup.run(args, opts)
      case 'workload-list': return commands.workloadList.run(args, opts)
      case 'workload-install': return commands.workloadInstall.run(args)
      case 'workload-info': return commands.workloadInfo.run(args, opts)
    }
    throw ErrUnknownCommand.create({ command: String(Reflect.get(args, 'cmd')) })
  }
}
