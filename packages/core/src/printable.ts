import { Fmt } from './fmt.js'

type PrintFn<T> = (value: T, fmt: Fmt) => string

export class Printer<T> {
  constructor(private fn: PrintFn<T>) {}

  static define<T>(fn: PrintFn<T>): Printer<T> {
    return new Printer(fn)
  }

  print(value: T, fmt: Fmt): string {
    return this.fn(value, fmt)
  }

  /** Convenience function for multi-line output */
  static lines(strings: string[]): string {
    return strings.join('\n')
  }

  /** Left-aligned columns, padded to the widest cell. Styling is applied after padding. */
  static table(headers: string[], rows: string[][], fmt: Fmt): string {
    const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)))
    const render = (cells: string[]) =>
      cells.map((c, i) => (i === cells.length - 1 ? c : c.padEnd(widths[i] ?? 0))).join('  ')
    return [fmt.bold(render(headers)), ...rows.map(render)].join('\n')
  }
}

/** Binds printers to one Fmt, so callers don't thread it through */
export class PrintFormatter {
  constructor(readonly fmt: Fmt) {}

  print<T>(printer: Printer<T>, value: T): string {
    return printer.print(value, this.fmt)
  }

  printList<T>(printer: Printer<T>, values: readonly T[], separator: string = '\n'): string {
    return values.map((v) => printer.print(v, this.fmt)).join(separator)
  }
}
