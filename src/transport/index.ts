// Transport module exports and registration
// Sets up the transport registry and exports transport implementations

import { MockTransport } from "./mock-transport.ts";
import { TcpTransport } from "./tcp-transport.ts";
import {
  type IPigpioTransport,
  type TransportConfig,
  TransportRegistry,
} from "./transport.ts";

/**
 * Register the built-in transports with the TransportRegistry.
 *
 * Each factory validates the incoming config and returns a transport
 * instance for it.
 */
TransportRegistry.register("tcp", (config) => {
  if (config.type !== "tcp") {
    throw new Error("Invalid config type for tcp transport");
  }
  return new TcpTransport(config);
});

TransportRegistry.register("mock", (config) => {
  if (config.type !== "mock") {
    throw new Error("Invalid config type for mock transport");
  }
  return new MockTransport(config);
});

export {
  MockTransport,
  type MockResponder,
  type MockTransportOptions,
} from "./mock-transport.ts";
export { TcpTransport } from "./tcp-transport.ts";
export type {
  IPigpioTransport,
  MockTransportConfig,
  TcpTransportConfig,
  TransportConfig,
  TransportEventMap,
  TransportFactory,
  TransportState,
} from "./transport.ts";
export { createErrorEvent, TransportRegistry } from "./transport.ts";

/** Convenience helper to create transports via the registry. */
export function createTransport(config: TransportConfig): IPigpioTransport {
  return TransportRegistry.create(config);
}
