/**
 * CliServices - per-request container for command classes.
 *
 * Holds the orchestrator the commands drive and the print formatters. The
 * orchestrator is supplied lazily, so commands that only print help never
 * open the database.
 */

import { Fmt, PrintFormatter, type Printer } from '@drover/core'
import type { Orchestrator } from '@drover/deployment'
import type { OutputFormat } from './parsers/standard-opts.js'

export class CliServices {
  private colorPrinter = new PrintFormatter(Fmt.ansi)
  private plainPrinter = new PrintFormatter(Fmt.plain)

  constructor(private readonly getOrchestrator: () => Orchestrator) {}

  get orchestrator(): Orchestrator {
    return this.getOrchestrator()
  }

  getPrintFormatter(color: boolean): PrintFormatter {
    return color ? this.colorPrinter : this.plainPrinter
  }

  /** Pick the text or JSON printer for `--format`. JSON is never coloured */
  printAs<T>(format: OutputFormat, printers: { text: Printer<T>; json: Printer<T> }, value: T, color: boolean): string {
    return format === 'json'
      ? this.plainPrinter.print(printers.json, value)
      : this.getPrintFormatter(color).print(printers.text, value)
  }
}
