import type { CliResponse } from './types.js'
import type { Mode, Parser } from '@optique/core/parser'
import { runParserAsync, RunParserError } from '@optique/core/facade'

/** Sentinels thrown from runParserAsync callbacks once help or an error was shown. */
const HELP_SHOWN = Symbol('help')
const ERROR_SHOWN = Symbol('error')

type RunResult<T> =
  | { ok: true; value: T }
  | { ok: false; response: CliResponse }

/**
 * Parse argv without letting optique touch the process: help and usage
 * errors come back as a response instead of printing and exiting.
 */
export async function parseAndValidateArgs<T>(
  parser: Parser<Mode, T, unknown>,
  programName: string,
  args: readonly string[],
  useColor?: boolean,
): Promise<RunResult<T>> {
  let stdout = ''
  let stderr = ''

  try {
    const value = await runParserAsync(parser, programName, args, {
      colors: useColor,
      aboveError: 'help',
      help: {
        mode: 'both',
        onShow: () => {
          throw HELP_SHOWN
        },
      },
      showChoices: true,
      onError: () => {
        throw ERROR_SHOWN
      },
      stdout: (text) => {
        stdout += text + '\n'
      },
      stderr: (text) => {
        stderr += text + '\n'
      },
    })
    return { ok: true, value }
  } catch (e) {
    if (e === HELP_SHOWN) {
      return { ok: false, response: { stdout, exitCode: 0 } }
    }
    if (e === ERROR_SHOWN || e instanceof RunParserError) {
      return { ok: false, response: { stderr, exitCode: 1 } }
    }
    throw e
  }
}
