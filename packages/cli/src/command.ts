/**
 * Command - a self-contained CLI command with type-safe args.
 *
 * Each command owns its parser (lazy) and handler. `Inferred<this>` extracts
 * the parsed value type from the concrete class's parser, so the handler's
 * args are typed end to end.
 */

import type { LazyOne } from '@drover/core'
import type { InferValue, Mode, Parser } from '@optique/core/parser'
import type { Prompter } from './prompter.js'

/** Extract the parsed value type from a Command's parser. */
export type Inferred<T extends Command> = InferValue<T['parser']['get']>

/** Per-request options passed to command handlers. */
export interface CommandOptions {
  color: boolean
  prompter: Prompter
  /** Incremental output, for commands that stream (logs --follow) */
  write(text: string): void
  /** Claims Ctrl-C for this command; the returned signal aborts on the first SIGINT */
  interruptible(): AbortSignal
}

export interface Command {
  /** Command name as typed by the user (e.g. 'deploy', 'workload install'). */
  readonly name: string
  readonly parser: LazyOne<Parser<Mode>>
  run(args: Inferred<this>, opts: CommandOptions): Promise<string>
}
