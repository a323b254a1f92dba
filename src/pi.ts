/**
 * Command facade: typed GPIO, bank, SPI and serial operations on one daemon
 * connection.
 *
 * Arguments are checked before anything is sent; a bad one throws
 * `TypeError` or `RangeError`. Every operation otherwise resolves with a
 * `Result`: `Ok` carries the daemon's result (negative values are daemon
 * error codes, see `describeDaemonError`), `Err` a transport or framing
 * failure.
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
  type DigitalLevel,
  type EdgeSelector,
  type GpioMode,
  Level,
  MAX_TRIGGER_PULSE_US,
  MAX_WATCHDOG_MS,
  Mode,
  Pull,
  type PullSetting,
} from "./commands.ts";
import {
  type ConnectionConfig,
  type ConnectionOptions,
  type Environment,
  resolveConnectionConfig,
} from "./config.ts";
import { ConnectionError, type PigpioError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import {
  type CallbackHandler,
  NotificationListener,
} from "./notifications.ts";
import { CommandSession, type PayloadResponse } from "./session.ts";
import { createTransport } from "./transport/index.ts";
import type {
  IPigpioTransport,
  TcpTransportConfig,
} from "./transport/transport.ts";
import {
  assertBytes,
  assertGpio,
  assertIntegerInRange,
  assertPin,
  assertUint32,
} from "./utils/validation.ts";

const SPI_MAX_CHANNEL = 2;
const SPI_MAX_BAUD = 125_000_000;

/** Pending daemon result. */
export type DaemonResult<T = number> = Promise<Result<T, PigpioError>>;

/** Hooks for replacing the TCP transport or the logger. */
export interface ConnectDependencies {
  /** Builds each stream; called once for commands, once for notifications. */
  transportFactory?: (config: TcpTransportConfig) => IPigpioTransport;
  logger?: Logger;
  env?: Environment;
}

function unsigned(
  result: Result<number, PigpioError>,
): Result<number, PigpioError> {
  return isErr(result) ? result : createOk(unwrapOk(result) >>> 0);
}

function assertLevel(level: number): void {
  assertIntegerInRange("level", level, Level.LOW, Level.HIGH);
}

/**
 * Open the command stream to a daemon.
 *
 * Host and port come from `options`, then `PIGPIO_ADDR` / `PIGPIO_PORT`,
 * then `localhost:8888`. The notification stream opens on the first
 * {@link Pi.callback}.
 *
 * @throws RangeError on invalid options.
 */
export function connect(
  options: ConnectionOptions = {},
  deps: ConnectDependencies = {},
): Promise<Result<Pi, ConnectionError>> {
  const config = resolveConnectionConfig(options, deps.env);
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  const factory = deps.transportFactory ?? createTransport;
  const transportConfig: TcpTransportConfig = {
    connectTimeout: config.connectTimeout,
    host: config.host,
    port: config.port,
    type: "tcp",
  };
  const session = new CommandSession(factory(transportConfig), { logger });
  const listener = new NotificationListener(
    session,
    factory(transportConfig),
    { id: config.id, logger },
  );
  const pi = new Pi(config, session, listener, logger);
  return pi.open();
}

/** One connection to a daemon. */
export class Pi {
  readonly #config: ConnectionConfig;
  readonly #session: CommandSession;
  readonly #listener: NotificationListener;
  readonly #logger: Logger;
  readonly #watchdogs = new Set<number>();

  constructor(
    config: ConnectionConfig,
    session: CommandSession,
    listener: NotificationListener,
    logger: Logger,
  ) {
    this.#config = config;
    this.#session = session;
    this.#listener = listener;
    this.#logger = logger;
  }

  /** Identifier handed to callbacks. */
  get id(): string {
    return this.#config.id;
  }

  get host(): string {
    return this.#config.host;
  }

  get port(): number {
    return this.#config.port;
  }

  get connected(): boolean {
    return this.#session.connected;
  }

  /** GPIOs with a watchdog armed through this connection. */
  get watchdogs(): ReadonlySet<number> {
    return this.#watchdogs;
  }

  /** Notification listener of this connection. */
  get notifications(): NotificationListener {
    return this.#listener;
  }

  /** Open the command stream; resolves with this connection. */
  async open(): Promise<Result<Pi, ConnectionError>> {
    const opened = await this.#session.open();
    if (isErr(opened)) {
      const error = opened.err;
      return createErr(
        error instanceof ConnectionError
          ? error
          : new ConnectionError(error.message, { cause: error }),
      );
    }
    this.#logger.info(`connected to ${this.host}:${this.port}`);
    return createOk(this);
  }

  /**
   * Cancel watchdogs armed here, close the notification stream, then the
   * command stream.
   */
  async disconnect(): Promise<void> {
    for (const gpio of [...this.#watchdogs]) {
      const cleared = await this.#session.sendCommand(Command.WDOG, gpio, 0);
      if (isErr(cleared)) {
        this.#logger.warn(
          `watchdog on GPIO ${gpio} not cleared: ${cleared.err.message}`,
        );
      }
    }
    this.#watchdogs.clear();
    await this.#listener.close();
    await this.#session.close();
    this.#logger.info(`disconnected from ${this.host}:${this.port}`);
  }

  // Pin level

  getMode(gpio: number): DaemonResult {
    assertPin(gpio);
    return this.#session.sendCommand(Command.MODEG, gpio);
  }

  setMode(gpio: number, mode: GpioMode): DaemonResult {
    assertPin(gpio);
    assertIntegerInRange("mode", mode, Mode.INPUT, Mode.ALT3);
    return this.#session.sendCommand(Command.MODES, gpio, mode);
  }

  setPullUpDown(gpio: number, pud: PullSetting): DaemonResult {
    assertPin(gpio);
    assertIntegerInRange("pud", pud, Pull.OFF, Pull.UP);
    return this.#session.sendCommand(Command.PUD, gpio, pud);
  }

  read(gpio: number): DaemonResult {
    assertPin(gpio);
    return this.#session.sendCommand(Command.READ, gpio);
  }

  write(gpio: number, level: DigitalLevel): DaemonResult {
    assertPin(gpio);
    assertLevel(level);
    return this.#session.sendCommand(Command.WRITE, gpio, level);
  }

  /**
   * Arm (or with 0, cancel) a watchdog: the daemon reports
   * `Level.TIMEOUT` to callbacks on `gpio` when it sees no change for
   * `timeoutMs`.
   */
  setWatchdog(gpio: number, timeoutMs: number): DaemonResult {
    assertGpio(gpio);
    assertIntegerInRange("timeout", timeoutMs, 0, MAX_WATCHDOG_MS);
    return this.#setWatchdog(gpio, timeoutMs);
  }

  /** Pulse `gpio` at `level` for `pulseLen` µs. */
  gpioTrigger(gpio: number, pulseLen: number, level: DigitalLevel): DaemonResult {
    assertPin(gpio);
    assertIntegerInRange("pulseLen", pulseLen, 1, MAX_TRIGGER_PULSE_US);
    assertLevel(level);
    return this.#session.sendExtended(Command.TRIG, gpio, pulseLen, [level]);
  }

  // Banks

  /** Levels of GPIO 0-31, one bit each. */
  async readBank1(): DaemonResult {
    return unsigned(await this.#session.sendCommand(Command.BR1, 0));
  }

  /** Levels of GPIO 32-53, one bit each. */
  async readBank2(): DaemonResult {
    return unsigned(await this.#session.sendCommand(Command.BR2, 0));
  }

  /** Drive low every GPIO 0-31 whose bit is set. */
  clearBank1(bits: number): DaemonResult {
    assertUint32("bits", bits);
    return this.#session.sendCommand(Command.BC1, bits);
  }

  clearBank2(bits: number): DaemonResult {
    assertUint32("bits", bits);
    return this.#session.sendCommand(Command.BC2, bits);
  }

  /** Drive high every GPIO 0-31 whose bit is set. */
  setBank1(bits: number): DaemonResult {
    assertUint32("bits", bits);
    return this.#session.sendCommand(Command.BS1, bits);
  }

  setBank2(bits: number): DaemonResult {
    assertUint32("bits", bits);
    return this.#session.sendCommand(Command.BS2, bits);
  }

  // Daemon info

  /** Microseconds since daemon start, wrapping at 2^32. */
  async getCurrentTick(): DaemonResult {
    return unsigned(await this.#session.sendCommand(Command.TICK, 0));
  }

  getHardwareRevision(): DaemonResult {
    return this.#session.sendCommand(Command.HWVER, 0);
  }

  getPigpioVersion(): DaemonResult {
    return this.#session.sendCommand(Command.PIGPV, 0);
  }

  // SPI

  /** Open SPI `channel`; resolves with a handle. */
  spiOpen(channel: number, baud: number, flags = 0): DaemonResult {
    assertIntegerInRange("channel", channel, 0, SPI_MAX_CHANNEL);
    assertIntegerInRange("baud", baud, 1, SPI_MAX_BAUD);
    assertUint32("flags", flags);
    return this.#session.sendExtended(Command.SPIO, channel, baud, [flags]);
  }

  spiClose(handle: number): DaemonResult {
    assertUint32("handle", handle);
    return this.#session.sendCommand(Command.SPIC, handle);
  }

  spiRead(handle: number, count: number): DaemonResult<PayloadResponse> {
    assertUint32("handle", handle);
    assertIntegerInRange("count", count, 1, 0xffff);
    return this.#session.sendForPayload(Command.SPIR, handle, count, {
      maxCount: count,
    });
  }

  spiWrite(handle: number, data: Uint8Array): DaemonResult {
    assertUint32("handle", handle);
    assertBytes("data", data);
    return this.#session.sendRawPayload(Command.SPIW, handle, 0, data);
  }

  /** Write `data` while reading the same number of bytes. */
  spiXfer(handle: number, data: Uint8Array): DaemonResult<PayloadResponse> {
    assertUint32("handle", handle);
    assertBytes("data", data);
    return this.#session.sendForPayload(Command.SPIX, handle, 0, {
      maxCount: data.length,
      payload: data,
    });
  }

  // Serial

  /** Open a serial device such as `/dev/ttyAMA0`; resolves with a handle. */
  serialOpen(tty: string, baud: number, flags = 0): DaemonResult {
    if (typeof tty !== "string" || tty.length === 0) {
      throw new TypeError("tty must be a non-empty string");
    }
    assertUint32("baud", baud);
    assertUint32("flags", flags);
    return this.#session.sendRawPayload(
      Command.SERO,
      baud,
      flags,
      new TextEncoder().encode(tty),
    );
  }

  serialClose(handle: number): DaemonResult {
    assertUint32("handle", handle);
    return this.#session.sendCommand(Command.SERC, handle);
  }

  serialReadByte(handle: number): DaemonResult {
    assertUint32("handle", handle);
    return this.#session.sendCommand(Command.SERRB, handle);
  }

  serialWriteByte(handle: number, byte: number): DaemonResult {
    assertUint32("handle", handle);
    assertIntegerInRange("byte", byte, 0, 0xff);
    return this.#session.sendCommand(Command.SERWB, handle, byte);
  }

  /** Read up to `count` bytes that are already waiting. */
  serialRead(handle: number, count: number): DaemonResult<PayloadResponse> {
    assertUint32("handle", handle);
    assertIntegerInRange("count", count, 1, 0xffff);
    return this.#session.sendForPayload(Command.SERR, handle, count, {
      maxCount: count,
    });
  }

  serialWrite(handle: number, data: Uint8Array): DaemonResult {
    assertUint32("handle", handle);
    assertBytes("data", data);
    return this.#session.sendRawPayload(Command.SERW, handle, 0, data);
  }

  /** Number of bytes waiting to be read. */
  serialDataAvailable(handle: number): DaemonResult {
    assertUint32("handle", handle);
    return this.#session.sendCommand(Command.SERDA, handle);
  }

  // Callbacks

  /**
   * Call `handler` on every `edge` change of `gpio`, and with
   * `Level.TIMEOUT` when its watchdog fires. Replaces any earlier handler
   * for the pin.
   */
  callback(
    gpio: number,
    edge: EdgeSelector,
    handler: CallbackHandler,
  ): DaemonResult {
    return this.#listener.subscribe(gpio, edge, handler);
  }

  cancelCallback(gpio: number): DaemonResult {
    return this.#listener.unsubscribe(gpio);
  }

  async #setWatchdog(gpio: number, timeoutMs: number): DaemonResult {
    const result = await this.#session.sendCommand(
      Command.WDOG,
      gpio,
      timeoutMs,
    );
    if (!isErr(result) && unwrapOk(result) >= 0) {
      if (timeoutMs > 0) this.#watchdogs.add(gpio);
      else this.#watchdogs.delete(gpio);
    }
    return result;
  }
}
