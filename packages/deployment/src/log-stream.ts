/**
 * LogStream - a pull-based, cancellable view over a workload's log source.
 *
 * pull() yields one line or an end signal. cancel() aborts the signal handed
 * to the source, asks the source iterator to return, and waits up to a grace
 * period for it to settle. The source is released exactly once, whether the
 * stream ends by exhaustion, cancellation, an external abort or an error.
 */

import { getLogger } from "@drover/core";

const log = getLogger("deployment:logs");

export type LogEndReason = "exhausted" | "cancelled";

/** `timed_out`: the source had not settled when the grace period ran out */
export type LogReleaseOutcome = "released" | "timed_out";

export type LogPull =
  | { readonly done: false; readonly line: string }
  | { readonly done: true; readonly reason: LogEndReason };

export interface LogStreamOptions {
  /** How long cancel() waits for the source to settle. Default 2000ms */
  graceMs?: number;
  /** Cancels the stream when aborted */
  signal?: AbortSignal;
}

export const DEFAULT_LOG_GRACE_MS = 2000;

const CANCELLED = Symbol("cancelled");

export class LogStream implements AsyncIterable<string> {
  private readonly controller = new AbortController();
  private readonly iterator: AsyncIterator<string>;
  private readonly cancelled: Promise<typeof CANCELLED>;
  private readonly graceMs: number;
  private readonly external?: AbortSignal;
  private state: "open" | LogEndReason = "open";
  private releasing?: Promise<LogReleaseOutcome>;
  private releasedFlag = false;

  private constructor(open: (signal: AbortSignal) => AsyncIterable<string>, opts: LogStreamOptions) {
    this.graceMs = opts.graceMs ?? DEFAULT_LOG_GRACE_MS;
    this.cancelled = new Promise((resolve) => {
      this.controller.signal.addEventListener("abort", () => resolve(CANCELLED), { once: true });
    });
    this.iterator = open(this.controller.signal)[Symbol.asyncIterator]();

    this.external = opts.signal;
    if (this.external?.aborted) {
      this.cancelInBackground();
    } else {
      this.external?.addEventListener("abort", this.onExternalAbort, { once: true });
    }
  }

  /** Open a stream. `open` receives the signal the source must honour */
  static open(open: (signal: AbortSignal) => AsyncIterable<string>, opts: LogStreamOptions = {}): LogStream {
    return new LogStream(open, opts);
  }

  /** The source's return() has settled. Stays false while a timed-out source hangs */
  get released(): boolean {
    return this.releasedFlag;
  }

  async pull(): Promise<LogPull> {
    if (this.state !== "open") return { done: true, reason: this.state };

    const next = this.iterator.next();
    // Outlives a cancellation; must not surface as an unhandled rejection
    next.catch((err: unknown) => log.debug("log source rejected: %s", err));

    let result: IteratorResult<string> | typeof CANCELLED;
    try {
      result = await Promise.race([next, this.cancelled]);
    } catch (err) {
      this.finish("exhausted");
      await this.release();
      throw err;
    }

    if (result === CANCELLED || this.isCancelled()) {
      return { done: true, reason: "cancelled" };
    }
    if (result.done) {
      this.finish("exhausted");
      await this.release();
      return { done: true, reason: "exhausted" };
    }
    return { done: false, line: result.value };
  }

  /** Stop the stream and release the source. Safe to call more than once */
  async cancel(): Promise<LogReleaseOutcome> {
    this.finish("cancelled");
    this.controller.abort();
    return this.release();
  }

  /** Every remaining line. For finite (non-follow) streams */
  async collect(): Promise<string[]> {
    const lines: string[] = [];
    for await (const line of this) lines.push(line);
    return lines;
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: async (): Promise<IteratorResult<string>> => {
        const pulled = await this.pull();
        return pulled.done ? { done: true, value: undefined } : { done: false, value: pulled.line };
      },
      // Leaving a for-await loop early lands here
      return: async (): Promise<IteratorResult<string>> => {
        await this.cancel();
        return { done: true, value: undefined };
      },
    };
  }

  private isCancelled(): boolean {
    return this.state === "cancelled";
  }

  private finish(reason: LogEndReason): void {
    if (this.state === "open") this.state = reason;
  }

  private readonly onExternalAbort = (): void => {
    this.cancelInBackground();
  };

  private cancelInBackground(): void {
    this.cancel().catch((err: unknown) => log.warn("log stream cancel failed: %s", err));
  }

  private release(): Promise<LogReleaseOutcome> {
    this.releasing ??= this.releaseSource();
    return this.releasing;
  }

  private async releaseSource(): Promise<LogReleaseOutcome> {
    this.controller.abort();
    this.external?.removeEventListener("abort", this.onExternalAbort);

    const iterator = this.iterator;
    let timer: NodeJS.Timeout | undefined;
    const settled = (async () => {
      try {
        await iterator.return?.();
      } catch (err) {
        log.debug("log source return() rejected: %s", err);
      }
      this.releasedFlag = true;
      return "released" as const;
    })();
    const timedOut = new Promise<"timed_out">((resolve) => {
      timer = setTimeout(() => resolve("timed_out"), this.graceMs);
    });

    const outcome = await Promise.race([settled, timedOut]);
    clearTimeout(timer);
    if (outcome === "timed_out") {
      log.warn("log source did not release within %dms", this.graceMs);
    }
    return outcome;
  }
}
