import { describe, test, expect } from "vitest";
import { LogStream } from "../log-stream.js";

interface Tracked {
  opened: number;
  released: number;
  sawAbort: boolean;
}

/** An endless source that releases in `finally` and honours the signal */
function endless(tracked: Tracked) {
  return async function* (signal: AbortSignal): AsyncGenerator<string> {
    tracked.opened++;
    signal.addEventListener("abort", () => (tracked.sawAbort = true), { once: true });
    try {
      let n = 0;
      while (!signal.aborted) {
        yield `line ${++n}`;
        await new Promise((r) => setTimeout(r, 1));
      }
    } finally {
      tracked.released++;
    }
  };
}

function finite(lines: string[], tracked: Tracked) {
  return async function* (): AsyncGenerator<string> {
    tracked.opened++;
    try {
      yield* lines;
    } finally {
      tracked.released++;
    }
  };
}

const fresh = (): Tracked => ({ opened: 0, released: 0, sawAbort: false });

describe("LogStream", () => {
  test("cancelling after 3 lines releases the source within the grace period", async () => {
    const tracked = fresh();
    const stream = LogStream.open(endless(tracked), { graceMs: 500 });

    const lines: string[] = [];
    for (let i = 0; i < 3; i++) {
      const pulled = await stream.pull();
      if (!pulled.done) lines.push(pulled.line);
    }
    expect(await stream.cancel()).toBe("released");

    expect(lines).toEqual(["line 1", "line 2", "line 3"]);
    expect(tracked.sawAbort).toBe(true);
    expect(tracked.released).toBe(1);
    expect(stream.released).toBe(true);
    expect(await stream.pull()).toEqual({ done: true, reason: "cancelled" });
  });

  test("exhaustion ends with 'exhausted' and releases exactly once", async () => {
    const tracked = fresh();
    const stream = LogStream.open(finite(["a", "b"], tracked));

    expect(await stream.pull()).toEqual({ done: false, line: "a" });
    expect(await stream.pull()).toEqual({ done: false, line: "b" });
    expect(await stream.pull()).toEqual({ done: true, reason: "exhausted" });
    await stream.cancel();
    expect(await stream.pull()).toEqual({ done: true, reason: "exhausted" });
    expect(tracked.released).toBe(1);
  });

  test("leaving a for-await loop early cancels the stream", async () => {
    const tracked = fresh();
    const stream = LogStream.open(endless(tracked));
    const seen: string[] = [];
    for await (const line of stream) {
      seen.push(line);
      if (seen.length === 2) break;
    }
    expect(seen).toEqual(["line 1", "line 2"]);
    expect(tracked.released).toBe(1);
    expect(stream.released).toBe(true);
  });

  test("collect() drains a finite stream", async () => {
    const stream = LogStream.open(finite(["x", "y", "z"], fresh()));
    expect(await stream.collect()).toEqual(["x", "y", "z"]);
  });

  test("an external abort signal cancels the stream", async () => {
    const tracked = fresh();
    const controller = new AbortController();
    const stream = LogStream.open(endless(tracked), { signal: controller.signal });

    expect(await stream.pull()).toEqual({ done: false, line: "line 1" });
    controller.abort();
    expect(await stream.pull()).toEqual({ done: true, reason: "cancelled" });
    await stream.cancel();
    expect(tracked.released).toBe(1);
  });

  test("an already-aborted signal yields a cancelled stream", async () => {
    const controller = new AbortController();
    controller.abort();
    const stream = LogStream.open(endless(fresh()), { signal: controller.signal });
    expect(await stream.pull()).toEqual({ done: true, reason: "cancelled" });
  });

  test("a source error is rethrown and the source is released", async () => {
    const tracked = fresh();
    const stream = LogStream.open(async function* () {
      tracked.opened++;
      try {
        yield "first";
        throw new Error("source broke");
      } finally {
        tracked.released++;
      }
    });

    expect(await stream.pull()).toEqual({ done: false, line: "first" });
    await expect(stream.pull()).rejects.toThrow("source broke");
    expect(tracked.released).toBe(1);
    expect(stream.released).toBe(true);
    expect(await stream.pull()).toEqual({ done: true, reason: "exhausted" });
  });

  test("cancel() reports a source that never settles as timed out, not released", async () => {
    const hanging: AsyncIterable<string> = {
      [Symbol.asyncIterator]: () => ({
        next: async () => ({ done: false, value: "tick" }),
        return: () => new Promise<IteratorResult<string>>(() => {}),
      }),
    };
    const stream = LogStream.open(() => hanging, { graceMs: 20 });
    expect(await stream.pull()).toEqual({ done: false, line: "tick" });

    const started = Date.now();
    expect(await stream.cancel()).toBe("timed_out");
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
    expect(stream.released).toBe(false);
    expect(await stream.cancel()).toBe("timed_out");
  });

  test("a source that settles late is released once it does", async () => {
    let finishReturn: () => void = () => {};
    const slow: AsyncIterable<string> = {
      [Symbol.asyncIterator]: () => ({
        next: async () => ({ done: false, value: "tick" }),
        return: () =>
          new Promise<IteratorResult<string>>((resolve) => {
            finishReturn = () => resolve({ done: true, value: undefined });
          }),
      }),
    };
    const stream = LogStream.open(() => slow, { graceMs: 10 });
    expect(await stream.pull()).toEqual({ done: false, line: "tick" });

    expect(await stream.cancel()).toBe("timed_out");
    expect(stream.released).toBe(false);
    finishReturn();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(stream.released).toBe(true);
  });

  test("a pull pending during cancel resolves as cancelled", async () => {
    const never: AsyncIterable<string> = {
      [Symbol.asyncIterator]: () => ({
        next: () => new Promise<IteratorResult<string>>(() => {}),
        return: async () => ({ done: true, value: undefined }),
      }),
    };
    const stream = LogStream.open(() => never, { graceMs: 20 });
    const pending = stream.pull();
    await stream.cancel();
    expect(await pending).toEqual({ done: true, reason: "cancelled" });
  });
});
