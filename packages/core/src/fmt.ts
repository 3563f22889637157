/**
 * Fmt - text formatting for terminal output.
 *
 * ANSI colours or a passthrough; pick one with Fmt.from(useColor).
 */
import {StaticTypeCompanion} from "./companion.js";

export interface Fmt {
  readonly isColor: boolean
  dim(text: string): string
  bold(text: string): string
  red(text: string): string
  green(text: string): string
  yellow(text: string): string
  cyan(text: string): string
}

const RESET = "\x1b[0m";
const ansi = (code: number) => (text: string) => `\x1b[${code}m${text}${RESET}`

const ansiFmt: Fmt = {
  isColor: true,
  dim: ansi(2),
  bold: ansi(1),
  red: ansi(31),
  green: ansi(32),
  yellow: ansi(33),
  cyan: ansi(36),
}

const plainFmt: Fmt = {
  isColor: false,
  dim: (t) => t,
  bold: (t) => t,
  red: (t) => t,
  green: (t) => t,
  yellow: (t) => t,
  cyan: (t) => t,
}

export const Fmt = StaticTypeCompanion({
  ansi: ansiFmt,
  plain: plainFmt,
  from(color: boolean): Fmt {
    return color ? ansiFmt : plainFmt
  },
})
