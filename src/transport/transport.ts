/**
 * Transport abstraction for daemon communication (MessagePort-like interface).
 *
 * This layer provides a small, implementation‑agnostic contract used by the
 * command session and the notification listener. Implementations mirror a
 * subset of the `MessagePort`/`WebSocket` style so they can be swapped
 * (TCP / in-memory mock).
 *
 * Design notes:
 * - Uses DOM `addEventListener` semantics instead of a custom EventEmitter
 * - Narrow surface: `connect()`, `disconnect()`, `postMessage()`
 * - All inbound data is delivered as `Uint8Array` via `message` events.
 * - State changes are observable via a dedicated `statechange` event whose
 *   `detail` carries the new {@link TransportState}.
 */

/** Configuration for a TCP transport to a daemon endpoint. */
export interface TcpTransportConfig {
  type: "tcp";
  host: string;
  port: number;
  /** Give up on a connect attempt after this many ms. */
  connectTimeout?: number;
}

/** Configuration for the in‑memory / test oriented mock transport. */
export interface MockTransportConfig {
  type: "mock";
  name?: string;
}

/** Discriminated union of all supported transport configuration objects. */
export type TransportConfig = TcpTransportConfig | MockTransportConfig;

/** Lifecycle states reported by a transport. */
export type TransportState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

/** Event emitted when raw bytes are received from the underlying link. */
export interface TransportMessageEvent extends CustomEvent<Uint8Array> {}
/** Event emitted on transport level errors (I/O, disconnection, etc.). */
export interface TransportErrorEvent extends CustomEvent<Error> {
  /** Shortcut reference to the error object (mirrors WebSocket semantics). */
  readonly error: Error;
}
/** Strongly typed event map used by transports. */
export type TransportEventMap = {
  /** Fired after a successful `connect()`. */
  open: Event;
  /** Fired after `disconnect()` or an unexpected closure. */
  close: Event;
  /** Fired whenever {@link TransportState} transitions. New state in `detail`. */
  statechange: CustomEvent<TransportState>;
  /** Fired for each received chunk of bytes. */
  message: TransportMessageEvent;
  /** Fired on I/O errors; the error is available via `detail` and `.error`. */
  error: TransportErrorEvent;
};

/**
 * Minimal contract implemented by every transport.
 *
 * Implementations emit raw chunks as they are observed on the medium; chunk
 * boundaries carry no meaning; framing is the reader's job.
 */
export interface IPigpioTransport {
  /** User supplied configuration discriminator for the transport. */
  readonly config: TransportConfig;
  /** Current lifecycle state. */
  readonly state: TransportState;
  /** Convenience boolean alias for `state === "connected"`. */
  readonly connected: boolean;

  /** Establish a connection / open underlying resources. */
  connect(): Promise<void>;
  /** Close the transport if open. */
  disconnect(): Promise<void>;
  /** Send raw bytes. Throws if not connected. */
  postMessage(data: Uint8Array): void;
  /** Register an event listener. Pass `signal` to detach it later. */
  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void;
}

/** Factory function responsible for instantiating a transport for `config`. */
export type TransportFactory<T extends TransportConfig = TransportConfig> = (
  config: T,
) => IPigpioTransport;

/** Internal registry of transport factories, keyed by config discriminator. */
const factories = new Map<string, TransportFactory>();

/**
 * Public registry helper for managing available transports.
 *
 * Typical usage: `TransportRegistry.register("tcp", cfg => new TcpTransport(cfg))`.
 */
export const TransportRegistry = {
  /** Create a concrete transport instance for the given config. */
  create(config: TransportConfig): IPigpioTransport {
    const factory = factories.get(config.type);
    if (!factory) {
      throw new Error(`Unknown transport type: ${config.type}`);
    }
    return factory(config);
  },

  /** List currently registered transport type discriminators. */
  getRegisteredTypes(): string[] {
    return Array.from(factories.keys());
  },

  /** Register (or overwrite) a transport factory for a given discriminator. */
  register(type: TransportConfig["type"], factory: TransportFactory) {
    factories.set(type, factory);
  },
} as const;

/** Build an `error` event carrying `error` in both `detail` and `.error`. */
export function createErrorEvent(error: Error): TransportErrorEvent {
  return Object.assign(new CustomEvent<Error>("error", { detail: error }), {
    error,
  });
}
