/**
 * Utility helpers to convert transport events into async iterables, and to
 * read exact byte counts from them.
 *
 * Keeps concerns (stream acquisition) separate from the framing logic in
 * the command session and notification listener.
 */
import { createErr, createOk, type Result } from "option-t/plain_result";
import { ConnectionError, toError } from "./errors.ts";
import type { IPigpioTransport } from "./transport/transport.ts";

/**
 * Convert a transport (EventTarget emitting Uint8Array through `message` events)
 * into an async iterable of raw Uint8Array chunks.
 *
 * The iterable completes when:
 *  - AbortSignal aborts (iterator throws the abort reason)
 *  - An `error` event fires (iterator throws)
 *  - A `close` event fires (normal completion)
 *
 * Listeners are detached once the iterable finishes.
 */
export async function* byteStreamFromTransport(
  transport: IPigpioTransport,
  options: { signal?: AbortSignal } = {},
): AsyncGenerator<Uint8Array, void, unknown> {
  const { signal } = options;
  const detach = new AbortController();
  const queue: (Uint8Array | null)[] = [];
  let resolve: (() => void) | undefined;
  let done = false;
  let error: Error | undefined;

  const wake = () => {
    if (resolve) {
      const r = resolve;
      resolve = undefined;
      r();
    }
  };
  const finish = (cause?: Error) => {
    if (!done) {
      done = true;
      error = cause;
      queue.push(null);
      wake();
    }
  };

  const onMessage = (ev: CustomEvent<Uint8Array>) => {
    if (!done && ev.detail instanceof Uint8Array) {
      queue.push(ev.detail);
      wake();
    }
  };
  const onError = (ev: CustomEvent<Error>) => finish(toError(ev.detail));
  const onClose = () => finish();
  const onAbort = () =>
    finish(
      signal?.reason instanceof Error ? signal.reason : new Error("Aborted"),
    );

  const listenerOptions = { signal: detach.signal };
  transport.addEventListener("message", onMessage, listenerOptions);
  transport.addEventListener("error", onError, listenerOptions);
  transport.addEventListener("close", onClose, listenerOptions);
  if (signal?.aborted) onAbort();
  signal?.addEventListener("abort", onAbort, {
    once: true,
    signal: detach.signal,
  });

  try {
    while (true) {
      if (!queue.length) {
        await new Promise<void>((r) => {
          resolve = r;
        });
      }
      const item = queue.shift();
      if (item === null) break;
      if (item) yield item;
    }
    if (error) {
      throw error;
    }
  } finally {
    detach.abort();
  }
}

type Pending =
  | { kind: "chunk"; chunk: Uint8Array }
  | { kind: "end" }
  | { kind: "error"; error: Error };

/**
 * Reads exact byte counts from a chunk stream, keeping leftover bytes for
 * the next read.
 *
 * The next chunk is always requested ahead of time so the underlying
 * stream starts listening as soon as the reader exists. Not safe for
 * concurrent `readExact` calls; callers serialize their reads.
 */
export class ByteReader {
  readonly #iterator: AsyncIterator<Uint8Array>;
  #buffer = new Uint8Array(0);
  #pending: Promise<Pending>;
  #ended: Pending | null = null;

  constructor(source: AsyncIterable<Uint8Array>) {
    this.#iterator = source[Symbol.asyncIterator]();
    this.#pending = this.#pull();
  }

  /** Bytes received but not yet consumed. */
  get buffered(): number {
    return this.#buffer.length;
  }

  /** True once the source has ended or failed. */
  get ended(): boolean {
    return this.#ended !== null;
  }

  /**
   * Resolve with exactly `count` bytes, accumulating as many chunks as
   * needed. Fails with {@link ConnectionError} if the stream ends or
   * errors first; bytes read so far stay buffered.
   */
  async readExact(count: number): Promise<Result<Uint8Array, ConnectionError>> {
    while (this.#buffer.length < count) {
      const next = this.#ended ?? (await this.#pending);
      if (next.kind === "chunk") {
        this.#append(next.chunk);
        this.#pending = this.#pull();
        continue;
      }
      this.#ended = next;
      const got = `${this.#buffer.length} of ${count} bytes`;
      return createErr(
        next.kind === "error"
          ? new ConnectionError(`Stream failed after ${got}: ${next.error.message}`, {
              cause: next.error,
            })
          : new ConnectionError(`Connection closed after ${got}`),
      );
    }
    const out = this.#buffer.slice(0, count);
    this.#buffer = this.#buffer.slice(count);
    return createOk(out);
  }

  #append(chunk: Uint8Array): void {
    const merged = new Uint8Array(this.#buffer.length + chunk.length);
    merged.set(this.#buffer, 0);
    merged.set(chunk, this.#buffer.length);
    this.#buffer = merged;
  }

  #pull(): Promise<Pending> {
    return this.#iterator.next().then(
      (step): Pending =>
        step.done ? { kind: "end" } : { chunk: step.value, kind: "chunk" },
      (error: unknown): Pending => ({ error: toError(error), kind: "error" }),
    );
  }
}
