/**
 * Interrupt - what Ctrl-C means for the running command.
 *
 * A command that can wind down cleanly (logs --follow) claims the interrupt
 * and gets a signal; the first SIGINT then aborts that signal and the command
 * returns normally. Unclaimed, or on a second SIGINT, the process exits.
 */

/** Shell convention for "terminated by SIGINT" */
export const INTERRUPTED_EXIT_CODE = 130

export class Interrupt {
  private readonly controller = new AbortController()
  private claimed = false

  constructor(private readonly exit: (code: number) => void) {}

  /** Claim Ctrl-C for the running command */
  claim(): AbortSignal {
    this.claimed = true
    return this.controller.signal
  }

  get isClaimed(): boolean {
    return this.claimed
  }

  /** Install with process.on('SIGINT', interrupt.onSignal) */
  readonly onSignal = (): void => {
    if (this.claimed && !this.controller.signal.aborted) {
      this.controller.abort()
      return
    }
    this.exit(INTERRUPTED_EXIT_CODE)
  }
}
