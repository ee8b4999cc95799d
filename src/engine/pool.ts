import { log, type Logger } from "../logger.js";

/* ---------- tiny concurrency pool (no deps) ---------- */
export async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T, idx: number) => Promise<void>,
  concurrency: number,
  logger: Logger = log
): Promise<void> {
  if (items.length === 0) return;
  const queue = items.map((v, i) => ({ v, i }));
  let active = 0;
  let cursor = 0;

  return new Promise<void>((resolve) => {
    const launch = () => {
      if (cursor >= queue.length) {
        if (active === 0) resolve();
        return;
      }
      const { v, i } = queue[cursor++];
      active++;
      Promise.resolve()
        .then(() => worker(v, i))
        .catch((err: unknown) => {
          logger.error("[WORKER] unhandled error", { idx: i, err });
        })
        .finally(() => {
          active--;
          launch();
        });
      if (active < concurrency) launch();
    };
    const first = Math.min(Math.max(1, concurrency), queue.length);
    for (let k = 0; k < first; k++) launch();
  });
}

export type Deadline = {
  promise: Promise<"timeout">;
  clear(): void;
};

export function deadline(ms: number): Deadline {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), ms);
  });
  return { promise, clear: () => clearTimeout(timer) };
}

/** Resolves once the signal aborts; never rejects. */
export function whenAborted(signal: AbortSignal): Promise<"aborted"> {
  if (signal.aborted) return Promise.resolve("aborted");
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve("aborted"), { once: true });
  });
}

/**
 * Run `worker` over `items` with bounded concurrency until all finish or
 * `stop` settles. Outcomes arriving after that are dropped, and items not yet
 * started are skipped.
 */
export async function collectWithin<T, R>(
  items: T[],
  worker: (item: T) => Promise<R>,
  opts: { concurrency: number; stop: Promise<unknown>; logger?: Logger }
): Promise<{ results: Map<T, PromiseSettledResult<R>>; complete: boolean }> {
  const results = new Map<T, PromiseSettledResult<R>>();
  let closed = false;

  const all = runWithConcurrency(
    items,
    async (item) => {
      if (closed) return;
      try {
        const value = await worker(item);
        if (!closed) results.set(item, { status: "fulfilled", value });
      } catch (reason) {
        if (!closed) results.set(item, { status: "rejected", reason });
      }
    },
    opts.concurrency,
    opts.logger
  ).then(() => "done" as const);

  const outcome = await Promise.race([all, opts.stop]);
  closed = true;
  return { results: new Map(results), complete: outcome === "done" };
}
