/**
 * Notification listener: a second stream to the daemon, switched into
 * notify mode, whose 12-byte records are turned into per-GPIO callbacks.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import {
  Command,
  Edge,
  type EdgeSelector,
  type EventLevel,
  Level,
  MAX_GPIO,
  NotifyFlag,
} from "./commands.ts";
import {
  ConnectionError,
  DaemonError,
  type PigpioError,
  toError,
} from "./errors.ts";
import {
  COMMAND_HEADER_SIZE,
  encodeCommand,
  NOTIFICATION_SIZE,
  type NotificationRecord,
} from "./frameBuilder.ts";
import { parseNotification, parseResponse } from "./frameParser.ts";
import { type Logger, silentLogger } from "./logger.ts";
import type { CommandSession } from "./session.ts";
import { ByteReader, byteStreamFromTransport } from "./stream.ts";
import type { IPigpioTransport } from "./transport/transport.ts";
import { assertGpio, assertIntegerInRange } from "./utils/validation.ts";

/** What a callback receives for one level change or watchdog timeout. */
export interface CallbackEvent {
  /** Identifier of the connection the callback was registered on. */
  pi: string;
  gpio: number;
  /** New level, or `Level.TIMEOUT` when the watchdog fired. */
  level: EventLevel;
  /** Daemon tick of the change (µs, wraps at 2^32). */
  tick: number;
}

export type CallbackHandler = (event: CallbackEvent) => void;

interface Registration {
  edge: EdgeSelector;
  handler: CallbackHandler;
}

export interface NotificationListenerOptions {
  /** Value passed as `pi` to every handler. */
  id: string;
  logger?: Logger;
}

/**
 * Read one record. Fails when the stream ends before 12 bytes arrive.
 */
export async function readNotification(
  reader: ByteReader,
): Promise<Result<NotificationRecord, PigpioError>> {
  const bytes = await reader.readExact(NOTIFICATION_SIZE);
  if (isErr(bytes)) return bytes;
  return parseNotification(unwrapOk(bytes));
}

function succeeded(result: Result<number, PigpioError>): boolean {
  return !isErr(result) && unwrapOk(result) >= 0;
}

/**
 * True when a change to `level` should reach a handler registered for
 * `edge`: rising wants 1, falling wants 0, either takes both.
 */
export function edgeMatches(edge: EdgeSelector, level: 0 | 1): boolean {
  return (edge ^ level) !== 0;
}

/**
 * Owns the notification stream of one connection.
 *
 * Handlers run synchronously inside the receive loop, one at a time and in
 * record order. Emits `close` when the loop ends.
 */
export class NotificationListener extends EventTarget {
  readonly #session: CommandSession;
  readonly #transport: IPigpioTransport;
  readonly #id: string;
  readonly #logger: Logger;
  readonly #registrations = new Map<number, Registration>();
  #bits = 0;
  #previous = 0;
  #handle: number | null = null;
  #opening: Promise<Result<number, PigpioError>> | null = null;
  #loop: Promise<void> | null = null;
  #closing = false;
  /** Tail of the subscription change queue. */
  #changes: Promise<void> = Promise.resolve();

  constructor(
    session: CommandSession,
    transport: IPigpioTransport,
    options: NotificationListenerOptions,
  ) {
    super();
    this.#session = session;
    this.#transport = transport;
    this.#id = options.id;
    this.#logger = options.logger ?? silentLogger;
  }

  /** Subscription bitmask last pushed to the daemon. */
  get bits(): number {
    return this.#bits;
  }

  /** Daemon notification handle, or null when not open. */
  get handle(): number | null {
    return this.#handle;
  }

  /** True while the receive loop is running. */
  get running(): boolean {
    return this.#loop !== null;
  }

  /** True when `gpio` has a registered handler. */
  isSubscribed(gpio: number): boolean {
    return this.#registrations.has(gpio);
  }

  /**
   * Open the notification stream and start the receive loop. Resolves with
   * the daemon handle; repeated and concurrent calls share one stream.
   */
  open(): Promise<Result<number, PigpioError>> {
    if (this.#handle !== null) return Promise.resolve(createOk(this.#handle));
    if (!this.#opening) {
      this.#opening = this.#open().finally(() => {
        this.#opening = null;
      });
    }
    return this.#opening;
  }

  /**
   * Register `handler` for changes on `gpio` matching `edge`, replacing any
   * previous handler, and push the new bitmask. When the daemon refuses the
   * mask the previous registration is restored.
   *
   * @throws TypeError | RangeError on an invalid GPIO or edge.
   */
  subscribe(
    gpio: number,
    edge: EdgeSelector,
    handler: CallbackHandler,
  ): Promise<Result<number, PigpioError>> {
    assertGpio(gpio);
    assertIntegerInRange("edge", edge, Edge.RISING, Edge.EITHER);
    if (typeof handler !== "function") {
      throw new TypeError("handler must be a function");
    }
    return this.#enqueue(() => this.#subscribe(gpio, { edge, handler }));
  }

  /** Remove the handler for `gpio` and push the new bitmask. */
  unsubscribe(gpio: number): Promise<Result<number, PigpioError>> {
    assertGpio(gpio);
    return this.#enqueue(() => this.#unsubscribe(gpio));
  }

  /**
   * Close the daemon handle and the stream, wait for the loop to end, and
   * drop every subscription.
   */
  async close(): Promise<void> {
    await this.#changes;
    if (this.#opening) await this.#opening;
    const handle = this.#handle;
    this.#registrations.clear();
    this.#bits = 0;
    if (handle === null) return;

    this.#closing = true;
    const closed = await this.#session.sendCommand(Command.NC, handle);
    if (isErr(closed)) {
      this.#logger.warn(`notify: close failed: ${closed.err.message}`);
    }
    await this.#transport.disconnect();
    await this.#loop;
  }

  /**
   * Run subscription changes one after another, in call order, so the
   * pushed mask always follows the latest request.
   */
  #enqueue(
    change: () => Promise<Result<number, PigpioError>>,
  ): Promise<Result<number, PigpioError>> {
    const next = this.#changes.then(change);
    // Failures reach the caller through `next`; the queue only needs to
    // know the change is over.
    this.#changes = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  async #subscribe(
    gpio: number,
    registration: Registration,
  ): Promise<Result<number, PigpioError>> {
    const opened = await this.open();
    if (isErr(opened)) return opened;
    const previous = this.#registrations.get(gpio);
    const bits = this.#bits;
    this.#registrations.set(gpio, registration);
    this.#bits = (bits | (1 << gpio)) >>> 0;
    const pushed = await this.#pushBits();
    if (!succeeded(pushed)) {
      if (previous) this.#registrations.set(gpio, previous);
      else this.#registrations.delete(gpio);
      this.#bits = bits;
    }
    return pushed;
  }

  async #unsubscribe(gpio: number): Promise<Result<number, PigpioError>> {
    const previous = this.#registrations.get(gpio);
    if (!previous) return createOk(0);
    const bits = this.#bits;
    this.#registrations.delete(gpio);
    this.#bits = (bits & ~(1 << gpio)) >>> 0;
    const pushed = await this.#pushBits();
    if (!succeeded(pushed)) {
      this.#registrations.set(gpio, previous);
      this.#bits = bits;
    }
    return pushed;
  }

  #pushBits(): Promise<Result<number, PigpioError>> {
    if (this.#handle === null) return Promise.resolve(createOk(0));
    return this.#session.sendCommand(Command.NB, this.#handle, this.#bits);
  }

  async #open(): Promise<Result<number, PigpioError>> {
    const detach = new AbortController();
    const reader = new ByteReader(
      byteStreamFromTransport(this.#transport, { signal: detach.signal }),
    );
    try {
      await this.#transport.connect();
    } catch (error) {
      detach.abort();
      const cause = toError(error);
      return createErr(
        new ConnectionError(
          `Unable to open notification stream: ${cause.message}`,
          { cause },
        ),
      );
    }

    const handle = await this.#requestHandle(reader);
    if (isErr(handle)) {
      await this.#transport.disconnect();
      return handle;
    }

    // Level changes are computed against the bank as it is now.
    const bank = await this.#session.sendCommand(Command.BR1, 0);
    if (isErr(bank)) {
      await this.#transport.disconnect();
      return bank;
    }

    this.#previous = unwrapOk(bank) >>> 0;
    this.#handle = unwrapOk(handle);
    this.#closing = false;
    this.#loop = this.#run(reader);
    this.#logger.info(`notify: opened handle ${this.#handle}`);
    return createOk(this.#handle);
  }

  async #requestHandle(
    reader: ByteReader,
  ): Promise<Result<number, PigpioError>> {
    try {
      this.#transport.postMessage(encodeCommand(Command.NOIB, 0, 0));
    } catch (error) {
      const cause = toError(error);
      return createErr(
        new ConnectionError(`NOIB write failed: ${cause.message}`, { cause }),
      );
    }
    const bytes = await reader.readExact(COMMAND_HEADER_SIZE);
    if (isErr(bytes)) return bytes;
    const response = parseResponse(unwrapOk(bytes));
    if (isErr(response)) return response;
    const { result } = unwrapOk(response);
    if (result < 0) return createErr(new DaemonError(result));
    return createOk(result);
  }

  async #run(reader: ByteReader): Promise<void> {
    while (true) {
      const record = await readNotification(reader);
      if (isErr(record)) {
        if (this.#closing) {
          this.#logger.debug("notify: stream closed");
        } else {
          this.#logger.warn(`notify: stream ended: ${record.err.message}`);
        }
        break;
      }
      this.#dispatch(unwrapOk(record));
    }
    this.#handle = null;
    this.#loop = null;
    this.dispatchEvent(new Event("close"));
  }

  #dispatch(record: NotificationRecord): void {
    if (record.flags === 0) {
      const changed = (record.level ^ this.#previous) & this.#bits;
      this.#previous = record.level;
      if (changed === 0) return;
      for (let gpio = 0; gpio <= MAX_GPIO; gpio++) {
        if (((changed >>> gpio) & 1) === 0) continue;
        const registration = this.#registrations.get(gpio);
        if (!registration) continue;
        const level = (record.level >>> gpio) & 1 ? Level.HIGH : Level.LOW;
        if (edgeMatches(registration.edge, level)) {
          this.#call(registration, gpio, level, record.tick);
        }
      }
      return;
    }
    if (record.flags & NotifyFlag.WATCHDOG) {
      const gpio = record.flags & NotifyFlag.GPIO_MASK;
      const registration = this.#registrations.get(gpio);
      if (registration) {
        this.#call(registration, gpio, Level.TIMEOUT, record.tick);
      }
    }
    // Alive and event records carry no level change.
  }

  #call(
    registration: Registration,
    gpio: number,
    level: EventLevel,
    tick: number,
  ): void {
    try {
      registration.handler({ gpio, level, pi: this.#id, tick });
    } catch (error) {
      this.#logger.error(
        `notify: handler for GPIO ${gpio} failed: ${toError(error).message}`,
      );
    }
  }
}
