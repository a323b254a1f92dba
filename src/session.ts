/**
 * Command session: one stream to one daemon endpoint, strict
 * request/response pairing.
 *
 * Every exchange (write a request, read its 16-byte response, and for some
 * commands a trailing payload) runs through a FIFO scheduler, so concurrent
 * callers never interleave on the socket. A transport found disconnected
 * when an exchange starts is reopened first. A write failure, short read or
 * mismatched response closes the transport; the failed command is not
 * retried, and the next exchange reconnects.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { commandLabel } from "./commands.ts";
import {
  ConnectionError,
  PigpioError,
  ProtocolError,
  toError,
} from "./errors.ts";
import {
  COMMAND_HEADER_SIZE,
  encodeCommand,
  encodeExtended,
  packWords,
} from "./frameBuilder.ts";
import { parseResponse } from "./frameParser.ts";
import { type Logger, silentLogger } from "./logger.ts";
import { RequestScheduler, type SchedulerStats } from "./scheduler/index.ts";
import { ByteReader, byteStreamFromTransport } from "./stream.ts";
import type { IPigpioTransport } from "./transport/transport.ts";

/** A result count followed by that many payload bytes. */
export interface PayloadResponse {
  /** Daemon result: byte count on success, negative error code otherwise. */
  result: number;
  /** Payload bytes; empty when `result <= 0`. */
  data: Uint8Array;
}

/**
 * Operations available inside {@link CommandSession.transaction}, while the
 * session is held exclusively.
 */
export interface CommandChannel {
  /** Write `frame` (header plus optional payload) and read its response. */
  exchange(frame: Uint8Array): Promise<Result<number, PigpioError>>;
  /** Read exactly `count` bytes following a response. */
  readBytes(count: number): Promise<Result<Uint8Array, PigpioError>>;
}

export interface CommandSessionOptions {
  logger?: Logger;
  /** Label used in log lines. */
  name?: string;
}

/** Owns one transport and serializes exchanges over it. */
export class CommandSession {
  readonly #transport: IPigpioTransport;
  readonly #scheduler = new RequestScheduler();
  readonly #logger: Logger;
  readonly #name: string;
  #reader: ByteReader | null = null;
  #closed = false;

  constructor(transport: IPigpioTransport, options: CommandSessionOptions = {}) {
    this.#transport = transport;
    this.#logger = options.logger ?? silentLogger;
    this.#name = options.name ?? "command";
  }

  /** True when the underlying transport is connected. */
  get connected(): boolean {
    return this.#transport.connected && this.#reader !== null;
  }

  /** The transport this session writes to. */
  get transport(): IPigpioTransport {
    return this.#transport;
  }

  /** Connect now rather than on the first command. */
  open(): Promise<Result<void, PigpioError>> {
    return this.#schedule(async () => {
      const ready = await this.#ensureOpen();
      if (isErr(ready)) return ready;
      return createOk(undefined);
    });
  }

  /** Send a simple command and return the daemon's signed result. */
  sendCommand(
    command: number,
    p1: number,
    p2 = 0,
  ): Promise<Result<number, PigpioError>> {
    const frame = encodeCommand(command, p1, p2);
    return this.transaction((channel) => channel.exchange(frame));
  }

  /** Send an extended command whose payload is uint32 LE words. */
  sendExtended(
    command: number,
    p1: number,
    p2: number,
    words: readonly number[],
  ): Promise<Result<number, PigpioError>> {
    const frame = encodeExtended(command, p1, p2, packWords(words));
    return this.transaction((channel) => channel.exchange(frame));
  }

  /** Send an extended command whose payload is a raw byte string. */
  sendRawPayload(
    command: number,
    p1: number,
    p2: number,
    bytes: Uint8Array,
  ): Promise<Result<number, PigpioError>> {
    const frame = encodeExtended(command, p1, p2, bytes);
    return this.transaction((channel) => channel.exchange(frame));
  }

  /**
   * Send a command whose positive result is a byte count followed by that
   * many bytes (SPI read / transfer, serial read).
   *
   * @param maxCount - Largest count the caller asked for; a larger count
   *   from the daemon means the stream is out of step.
   */
  sendForPayload(
    command: number,
    p1: number,
    p2: number,
    options: { payload?: Uint8Array; maxCount?: number } = {},
  ): Promise<Result<PayloadResponse, PigpioError>> {
    const { payload, maxCount } = options;
    const frame = payload
      ? encodeExtended(command, p1, p2, payload)
      : encodeCommand(command, p1, p2);
    return this.transaction(async (channel) => {
      const response = await channel.exchange(frame);
      if (isErr(response)) return response;
      const result = unwrapOk(response);
      if (result <= 0) return createOk({ data: new Uint8Array(0), result });
      if (maxCount !== undefined && result > maxCount) {
        return createErr(
          this.#invalidate(
            new ProtocolError(
              `${commandLabel(command)} returned ${result} bytes, expected at most ${maxCount}`,
            ),
          ),
        );
      }
      const data = await channel.readBytes(result);
      if (isErr(data)) return data;
      return createOk({ data: unwrapOk(data), result });
    });
  }

  /**
   * Run `fn` with exclusive use of the session. Use this when a response is
   * followed by bytes that must be read before anything else is sent.
   */
  transaction<T>(
    fn: (channel: CommandChannel) => Promise<Result<T, PigpioError>>,
  ): Promise<Result<T, PigpioError>> {
    return this.#schedule(async () => {
      const ready = await this.#ensureOpen();
      if (isErr(ready)) return ready;
      const reader = unwrapOk(ready);
      return fn({
        exchange: (frame) => this.#exchange(reader, frame),
        readBytes: (count) => this.#readBytes(reader, count),
      });
    });
  }

  /** Exchange statistics. */
  getStats(): SchedulerStats {
    return this.#scheduler.getStats();
  }

  /**
   * Reject queued exchanges and close the transport. The session cannot be
   * used afterwards.
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#scheduler.stop(new ConnectionError("Session closed"));
    this.#reader = null;
    await this.#transport.disconnect();
  }

  async #schedule<T>(
    task: () => Promise<Result<T, PigpioError>>,
  ): Promise<Result<T, PigpioError>> {
    if (this.#closed) return createErr(new ConnectionError("Session closed"));
    try {
      return await this.#scheduler.schedule(task);
    } catch (error) {
      const cause = toError(error);
      return createErr(
        cause instanceof PigpioError
          ? cause
          : new ConnectionError(cause.message, { cause }),
      );
    }
  }

  async #ensureOpen(): Promise<Result<ByteReader, ConnectionError>> {
    if (this.#closed) return createErr(new ConnectionError("Session closed"));
    if (this.#reader && this.#transport.connected) {
      return createOk(this.#reader);
    }
    const { config } = this.#transport;
    const endpoint =
      config.type === "tcp" ? `${config.host}:${config.port}` : config.type;
    if (this.#reader) {
      this.#logger.info(`${this.#name}: reconnecting to ${endpoint}`);
    }
    // Listen before connecting so no early bytes are missed.
    const detach = new AbortController();
    const reader = new ByteReader(
      byteStreamFromTransport(this.#transport, { signal: detach.signal }),
    );
    try {
      await this.#transport.connect();
      this.#reader = reader;
      this.#logger.debug(`${this.#name}: connected to ${endpoint}`);
      return createOk(reader);
    } catch (error) {
      detach.abort();
      this.#reader = null;
      const cause = toError(error);
      return createErr(
        new ConnectionError(`Unable to connect to ${endpoint}: ${cause.message}`, {
          cause,
        }),
      );
    }
  }

  async #exchange(
    reader: ByteReader,
    frame: Uint8Array,
  ): Promise<Result<number, PigpioError>> {
    const command = new DataView(frame.buffer, frame.byteOffset).getUint32(
      0,
      true,
    );
    try {
      this.#transport.postMessage(frame);
    } catch (error) {
      const cause = toError(error);
      return createErr(
        this.#invalidate(
          new ConnectionError(
            `${commandLabel(command)}: write failed: ${cause.message}`,
            { cause },
          ),
        ),
      );
    }

    const bytes = await reader.readExact(COMMAND_HEADER_SIZE);
    if (isErr(bytes)) return createErr(this.#invalidate(bytes.err));

    const parsed = parseResponse(unwrapOk(bytes));
    if (isErr(parsed)) return createErr(this.#invalidate(parsed.err));
    const response = unwrapOk(parsed);
    if (response.command !== command) {
      return createErr(
        this.#invalidate(
          new ProtocolError(
            `response echoes command ${response.command}, sent ${command}`,
          ),
        ),
      );
    }
    this.#logger.debug(
      `${this.#name}: ${commandLabel(command)} -> ${response.result}`,
    );
    return createOk(response.result);
  }

  async #readBytes(
    reader: ByteReader,
    count: number,
  ): Promise<Result<Uint8Array, PigpioError>> {
    const bytes = await reader.readExact(count);
    if (isErr(bytes)) return createErr(this.#invalidate(bytes.err));
    return bytes;
  }

  /** Drop the connection after a transport or framing failure. */
  #invalidate<E extends PigpioError>(error: E): E {
    this.#logger.warn(`${this.#name}: ${error.message}; closing connection`);
    this.#reader = null;
    void this.#transport.disconnect().catch((cause: unknown) => {
      this.#logger.error(
        `${this.#name}: disconnect failed: ${toError(cause).message}`,
      );
    });
    return error;
  }
}
