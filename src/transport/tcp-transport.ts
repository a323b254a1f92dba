/**
 * TCP transport to a pigpio daemon, backed by `node:net`.
 */
import { Socket } from "node:net";
import {
  createErrorEvent,
  type IPigpioTransport,
  type TcpTransportConfig,
  type TransportEventMap,
  type TransportState,
} from "./transport.ts";

const DEFAULT_CONNECT_TIMEOUT = 10_000;

/**
 * Concrete transport over one TCP stream.
 *
 * Responsibilities:
 * - Opening the socket (with a connect timeout) and re-opening it on demand
 * - Propagating socket data / errors / closure as transport events
 * - Minimal state machine bridging imperative connect/disconnect lifecycle
 */
export class TcpTransport implements IPigpioTransport {
  #state: TransportState = "disconnected";
  #socket: Socket | null = null;
  readonly #target = new EventTarget();

  constructor(public readonly config: TcpTransportConfig) {}

  get state(): TransportState {
    return this.#state;
  }

  get connected(): boolean {
    return this.#state === "connected";
  }

  /**
   * Open the socket. Resolves once connected; rejects on refusal, DNS
   * failure or timeout. Safe to call again after a disconnect.
   */
  async connect(): Promise<void> {
    if (this.#state === "connected") return;
    this.#setState("connecting");

    const socket = new Socket();
    try {
      await this.#open(socket);
    } catch (error) {
      socket.destroy();
      this.#setState("error");
      throw error;
    }

    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => {
      this.#dispatch(
        new CustomEvent<Uint8Array>("message", {
          detail: new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.length),
        }),
      );
    });
    socket.on("error", (error: Error) => {
      this.#dispatch(createErrorEvent(error));
    });
    socket.on("close", () => this.#closed(socket));

    this.#socket = socket;
    this.#setState("connected");
    this.#dispatch(new Event("open"));
  }

  /** Destroy the socket if open. Safe to call repeatedly. */
  async disconnect(): Promise<void> {
    const socket = this.#socket;
    if (!socket) {
      this.#setState("disconnected");
      return;
    }
    this.#closed(socket);
    socket.destroy();
  }

  /**
   * Send raw bytes. Write failures surface through an `error` event, which
   * is followed by the socket closing.
   */
  postMessage(data: Uint8Array): void {
    if (!this.#socket || this.#state !== "connected") {
      throw new Error("Transport not connected");
    }
    this.#socket.write(data, (error) => {
      if (error) this.#dispatch(createErrorEvent(error));
    });
  }

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.#target.addEventListener(type, listener as EventListener, options);
  }

  #dispatch(event: Event): void {
    this.#target.dispatchEvent(event);
  }

  #open(socket: Socket): Promise<void> {
    const timeout = this.config.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.off("error", onError);
        reject(
          new Error(
            `Connection to ${this.config.host}:${this.config.port} timed out`,
          ),
        );
      }, timeout);
      const onError = (error: Error) => {
        clearTimeout(timer);
        reject(error);
      };
      socket.once("error", onError);
      socket.connect(this.config.port, this.config.host, () => {
        clearTimeout(timer);
        socket.off("error", onError);
        resolve();
      });
    });
  }

  #closed(socket: Socket): void {
    if (this.#socket !== socket) return;
    this.#socket = null;
    this.#setState("disconnected");
    this.#dispatch(new Event("close"));
  }

  #setState(next: TransportState): void {
    if (this.#state !== next) {
      this.#state = next;
      this.#dispatch(
        new CustomEvent<TransportState>("statechange", { detail: next }),
      );
    }
  }
}
