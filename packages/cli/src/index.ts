/**
 * @drover/cli - the `drover` command line.
 */

export { CLI, PROGRAM_NAME } from './cli.js'
export type { CliOptions, ExecuteOptions } from './cli.js'
export type { CliRequest, CliResponse } from './types.js'
export { DirectPrompter, confirm } from './prompter.js'
export type { Prompter } from './prompter.js'
export { builtinWorkloads } from './builtins.js'
export { Interrupt, INTERRUPTED_EXIT_CODE } from './interrupt.js'
export { main } from './main.js'
