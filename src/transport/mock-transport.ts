// Mock transport implementation for testing
// Provides a controllable transport that can simulate various scenarios

import {
  createErrorEvent,
  type IPigpioTransport,
  type MockTransportConfig,
  type TransportEventMap,
  type TransportState,
} from "./transport.ts";

/**
 * Computes the reply to one outbound message. Each returned chunk is
 * delivered as a separate `message` event, in order.
 */
export type MockResponder = (
  data: Uint8Array,
) => Uint8Array | Uint8Array[] | undefined;

/** Options controlling test / simulation behaviour of {@link MockTransport}. */
export interface MockTransportOptions {
  /** Artificial delay before a successful connect resolves (ms). */
  connectDelay?: number;
  /** Delay before replies are delivered (ms). */
  responseDelay?: number;
  /** When true `connect()` will reject with `errorMessage`. */
  shouldFailConnect?: boolean;
  /** When true sending data triggers an error event & throws. */
  shouldFailSend?: boolean;
  /** Error message used for simulated failures. */
  errorMessage?: string;
  /** Produces replies for outbound messages. */
  responder?: MockResponder;
}

/**
 * In‑memory transport used for unit tests and demos.
 *
 * Provides deterministic control over timing, error injection and automatic
 * responses so session and listener logic can be validated without a
 * running daemon.
 */
export class MockTransport implements IPigpioTransport {
  private _state: TransportState = "disconnected";
  private options: MockTransportOptions;
  private readonly target = new EventTarget();

  /** Every outbound message, in send order. */
  public sentData: Uint8Array[] = [];
  /** Number of successful `connect()` calls. */
  public connectCount = 0;

  constructor(
    public readonly config: MockTransportConfig,
    options: MockTransportOptions = {},
  ) {
    this.options = {
      connectDelay: 0,
      errorMessage: "Mock transport error",
      responseDelay: 0,
      shouldFailConnect: false,
      shouldFailSend: false,
      ...options,
    };
  }

  get state(): TransportState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === "connected";
  }

  /** Establish a simulated connection (optionally delayed / failed). */
  async connect(): Promise<void> {
    if (this._state === "connected") {
      return;
    }

    this.setState("connecting");

    const connectDelay = this.options.connectDelay ?? 0;
    if (connectDelay > 0) {
      await this.delay(connectDelay);
    }

    if (this.options.shouldFailConnect) {
      this.setState("error");
      throw new Error(this.options.errorMessage);
    }

    this.connectCount++;
    this.setState("connected");
    this.dispatch("open");
  }

  /** Terminate the simulated connection. */
  async disconnect(): Promise<void> {
    if (this._state === "disconnected") {
      return;
    }
    this.setState("disconnected");
    this.dispatch("close");
  }

  /**
   * Record outbound bytes and schedule the responder's reply, if any.
   */
  postMessage(data: Uint8Array): void {
    if (this._state !== "connected") {
      throw new Error("Transport not connected");
    }
    if (this.options.shouldFailSend) {
      const error = new Error(this.options.errorMessage);
      this.dispatch("error", createErrorEvent(error));
      throw error;
    }
    const copy = new Uint8Array(data);
    this.sentData.push(copy);
    const reply = this.options.responder?.(copy);
    if (!reply) return;
    const chunks = Array.isArray(reply) ? reply : [reply];
    setTimeout(() => {
      for (const chunk of chunks) {
        if (this._state !== "connected") return;
        this.dispatchMessage(chunk);
      }
    }, this.options.responseDelay ?? 0);
  }

  // Testing utilities
  /** Manually inject inbound data as if it was received from the peer. */
  public simulateData(data: Uint8Array): void {
    if (this._state === "connected") {
      this.dispatchMessage(data);
    }
  }

  /** Simulate a transport level error (transitions to `error` state). */
  public simulateError(error: Error): void {
    this.setState("error");
    this.dispatch("error", createErrorEvent(error));
  }

  /** Simulate an abrupt disconnect (fires `close`). */
  public simulateDisconnect(): void {
    if (this._state === "connected") {
      this.setState("disconnected");
      this.dispatch("close");
    }
  }

  /** Replace the responder. */
  public setResponder(responder: MockResponder | undefined): void {
    this.options.responder = responder;
  }

  /** Toggle connect failures (e.g. to test reconnect errors). */
  public setFailConnect(fail: boolean): void {
    this.options.shouldFailConnect = fail;
  }

  /** Returns the last recorded outbound message (if any). */
  public getLastSentData(): Uint8Array | undefined {
    return this.sentData[this.sentData.length - 1];
  }

  /** Clear all recorded outbound messages. */
  public clearSentData(): void {
    this.sentData = [];
  }

  private setState(newState: TransportState): void {
    if (this._state !== newState) {
      this._state = newState;
      this.dispatch(
        "statechange",
        new CustomEvent("statechange", { detail: newState }),
      );
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.target.addEventListener(type, listener as EventListener, options);
  }

  private dispatch(type: keyof TransportEventMap, event?: Event) {
    this.target.dispatchEvent(event ?? new Event(type));
  }

  private dispatchMessage(data: Uint8Array) {
    const ev = new CustomEvent<Uint8Array>("message", { detail: data });
    this.dispatch("message", ev);
  }
}
